/**
 * ExemptionPolicy Tests
 *
 * Tests:
 * - Field policy: only private fields with runtime storage that are not
 *   constants or decorated are tracked
 * - Parameter policy: synthesized, bodiless, contract-bound, discarded and
 *   decorated parameters are exempt
 * - Local policy: using declarations, rest siblings, discarded names
 * - The first applicable exemption gives the reason
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  createFieldPolicy,
  createLocalPolicy,
  createParameterPolicy,
  createPolicySet,
} from '@unread/core';
import type { CallableInfo, FieldSite, LocalSite, ParameterSite, SourceSpan } from '@unread/types';

// =============================================================================
// Test Helpers
// =============================================================================

const LOCATION: SourceSpan = { file: 'a.ts', line: 1, column: 0, endLine: 1, endColumn: 1, start: 0, end: 1 };

function fieldSite(overrides: Partial<FieldSite> = {}): FieldSite {
  return {
    key: 'a.ts#C@1:0.x',
    name: 'x',
    kind: 'field',
    location: LOCATION,
    className: 'C',
    accessibility: 'private',
    isStatic: false,
    isReadonly: false,
    isDeclare: false,
    isAccessorStorage: false,
    isParameterProperty: false,
    hasLiteralInitializer: false,
    decoratorCount: 0,
    ...overrides,
  };
}

function callable(overrides: Partial<CallableInfo> = {}): CallableInfo {
  return {
    form: 'function',
    name: 'f',
    hasBody: true,
    isAbstract: false,
    isDeclare: false,
    isOverride: false,
    satisfiesExternalContract: false,
    ...overrides,
  };
}

function parameterSite(overrides: Partial<ParameterSite> = {}): ParameterSite {
  return {
    key: 'a.ts@10',
    name: 'value',
    kind: 'parameter',
    location: LOCATION,
    position: 0,
    callable: callable(),
    decoratorCount: 0,
    isThisParameter: false,
    isParameterProperty: false,
    ...overrides,
  };
}

function localSite(overrides: Partial<LocalSite> = {}): LocalSite {
  return {
    key: 'a.ts@20',
    name: 'temp',
    kind: 'local-variable',
    location: LOCATION,
    declarationKind: 'const',
    hasRestSibling: false,
    ...overrides,
  };
}

// =============================================================================
// TESTS: fields
// =============================================================================

describe('field policy', () => {
  const policy = createFieldPolicy();

  it('should track a private field', () => {
    assert.deepStrictEqual(policy.evaluate(fieldSite()), { tracked: true });
  });

  it('should track a #private field', () => {
    assert.strictEqual(policy.shouldTrack(fieldSite({ accessibility: 'hash-private', name: '#x' })), true);
  });

  for (const accessibility of ['public', 'protected', 'none'] as const) {
    it(`should exempt ${accessibility} fields as not-private`, () => {
      assert.deepStrictEqual(policy.evaluate(fieldSite({ accessibility })), { tracked: false, reason: 'not-private' });
    });
  }

  it('should exempt declare fields and accessor storage', () => {
    assert.deepStrictEqual(policy.evaluate(fieldSite({ isDeclare: true })), { tracked: false, reason: 'compiler-synthesized' });
    assert.deepStrictEqual(policy.evaluate(fieldSite({ isAccessorStorage: true })), { tracked: false, reason: 'compiler-synthesized' });
  });

  it('should exempt readonly fields with a literal initializer', () => {
    assert.deepStrictEqual(
      policy.evaluate(fieldSite({ isReadonly: true, hasLiteralInitializer: true })),
      { tracked: false, reason: 'compile-time-constant' }
    );
  });

  it('should track a readonly field without a literal initializer', () => {
    assert.strictEqual(policy.shouldTrack(fieldSite({ isReadonly: true })), true);
  });

  it('should track a mutable field with a literal initializer', () => {
    assert.strictEqual(policy.shouldTrack(fieldSite({ hasLiteralInitializer: true })), true);
  });

  it('should exempt decorated fields', () => {
    assert.deepStrictEqual(policy.evaluate(fieldSite({ decoratorCount: 1 })), { tracked: false, reason: 'decorated' });
  });

  it('should report the first applicable reason', () => {
    const site = fieldSite({ accessibility: 'public', decoratorCount: 2, isDeclare: true });
    assert.deepStrictEqual(policy.evaluate(site), { tracked: false, reason: 'not-private' });
  });

  it('should list its exemptions in evaluation order', () => {
    assert.deepStrictEqual(policy.reasons, ['not-private', 'compiler-synthesized', 'compile-time-constant', 'decorated']);
  });
});

// =============================================================================
// TESTS: parameters
// =============================================================================

describe('parameter policy', () => {
  const policy = createParameterPolicy();

  it('should track an ordinary parameter', () => {
    assert.strictEqual(policy.shouldTrack(parameterSite()), true);
  });

  it('should exempt this and parameter properties as synthesized', () => {
    assert.deepStrictEqual(policy.evaluate(parameterSite({ name: 'this', isThisParameter: true })), { tracked: false, reason: 'synthesized' });
    assert.deepStrictEqual(policy.evaluate(parameterSite({ isParameterProperty: true })), { tracked: false, reason: 'synthesized' });
  });

  it('should exempt parameters of bodiless, abstract and declared callables', () => {
    for (const info of [callable({ hasBody: false }), callable({ isAbstract: true }), callable({ isDeclare: true })]) {
      assert.deepStrictEqual(policy.evaluate(parameterSite({ callable: info })), { tracked: false, reason: 'no-body' });
    }
  });

  it('should exempt overrides, contract implementations and setters', () => {
    for (const info of [
      callable({ form: 'method', isOverride: true }),
      callable({ form: 'method', satisfiesExternalContract: true }),
      callable({ form: 'setter' }),
    ]) {
      assert.deepStrictEqual(policy.evaluate(parameterSite({ callable: info })), { tracked: false, reason: 'external-contract' });
    }
  });

  it('should exempt names matching the discard pattern', () => {
    assert.deepStrictEqual(policy.evaluate(parameterSite({ name: '_event' })), { tracked: false, reason: 'discarded' });
    assert.strictEqual(policy.shouldTrack(parameterSite({ name: 'event_' })), true);
  });

  it('should use a custom discard pattern', () => {
    const custom = createParameterPolicy({ discardPattern: /^unused/ });
    assert.strictEqual(custom.shouldTrack(parameterSite({ name: '_event' })), true);
    assert.strictEqual(custom.shouldTrack(parameterSite({ name: 'unusedEvent' })), false);
  });

  it('should give the same verdict repeatedly with a global pattern', () => {
    const custom = createParameterPolicy({ discardPattern: /^_/g });
    assert.strictEqual(custom.shouldTrack(parameterSite({ name: '_a' })), false);
    assert.strictEqual(custom.shouldTrack(parameterSite({ name: '_a' })), false);
  });

  it('should exempt decorated parameters', () => {
    assert.deepStrictEqual(policy.evaluate(parameterSite({ decoratorCount: 1 })), { tracked: false, reason: 'attributed' });
  });
});

// =============================================================================
// TESTS: locals
// =============================================================================

describe('local policy', () => {
  const policy = createLocalPolicy();

  it('should track let, const and var', () => {
    for (const declarationKind of ['let', 'const', 'var'] as const) {
      assert.strictEqual(policy.shouldTrack(localSite({ declarationKind })), true);
    }
  });

  it('should exempt using declarations', () => {
    for (const declarationKind of ['using', 'await using'] as const) {
      assert.deepStrictEqual(policy.evaluate(localSite({ declarationKind })), { tracked: false, reason: 'using-declaration' });
    }
  });

  it('should exempt rest siblings', () => {
    assert.deepStrictEqual(policy.evaluate(localSite({ hasRestSibling: true })), { tracked: false, reason: 'rest-sibling' });
  });

  it('should exempt discarded names', () => {
    assert.deepStrictEqual(policy.evaluate(localSite({ name: '_ignored' })), { tracked: false, reason: 'discarded' });
  });
});

describe('createPolicySet', () => {
  it('should share the discard pattern between parameters and locals', () => {
    const policies = createPolicySet({ discardPattern: /^ignored/ });

    assert.strictEqual(policies.parameter.shouldTrack(parameterSite({ name: 'ignoredArg' })), false);
    assert.strictEqual(policies.local.shouldTrack(localSite({ name: 'ignoredLocal' })), false);
    assert.strictEqual(policies.field.name, 'field');
  });
});
