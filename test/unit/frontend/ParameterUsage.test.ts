/**
 * Parameter usage Tests
 *
 * Single-body tracking of parameters through the full pipeline.
 *
 * Tests:
 * - Unused parameters of functions, methods, nested functions and lambdas
 * - Signatures dictated from outside (override, implements, setter, overloads)
 * - Output-only bindings count as writes
 * - Positional placeholders before a read parameter (opt-in)
 * - Discarded and decorated parameters
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { analyzeSources, unusedIn } from '../../helpers/analyzeSources.js';

const PARAMETERS_ONLY = { rules: ['unused-parameter' as const] };

// =============================================================================
// TESTS: kinds
// =============================================================================

describe('parameter kinds', () => {
  it('should report an unused trailing parameter', async () => {
    const code = 'export function total(a: number, b: number) { return a; }';
    assert.deepStrictEqual(await unusedIn(code), ['parameter:b']);
  });

  it('should give nested functions and lambdas their own kinds', async () => {
    const code = [
      'export function outer(flag: boolean) {',
      '  function inner(unusedInner: number) { return 1; }',
      '  const cb = (unusedLambda: number) => 2;',
      '  return [inner, cb];',
      '}',
    ].join('\n');

    const result = await analyzeSources({ 'src/outer.ts': code });

    assert.deepStrictEqual(
      result.unused.map(d => [d.kind, d.name, d.location.line]),
      [
        ['parameter', 'flag', 1],
        ['local-function-parameter', 'unusedInner', 2],
        ['lambda-parameter', 'unusedLambda', 3],
      ]
    );
  });

  it('should report unused method and constructor parameters', async () => {
    const code = [
      'export class Greeter {',
      '  constructor(config: object) {}',
      '  greet(name: string, loud: boolean) { return name; }',
      '}',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), ['parameter:config', 'parameter:loud']);
  });

  it('should report unused object method parameters', async () => {
    const code = 'export const handlers = { onClick(event: unknown) { return 1; } };';
    assert.deepStrictEqual(await unusedIn(code), ['parameter:event']);
  });

  it('should not report a parameter read only in a nested closure', async () => {
    const code = 'export function later(value: number) { return () => value; }';
    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should count a read inside another parameter default', async () => {
    const code = 'export function range(start: number, end = start + 10) { return end; }';
    assert.deepStrictEqual(await unusedIn(code), []);
  });
});

// =============================================================================
// TESTS: external contracts
// =============================================================================

describe('signatures dictated from outside', () => {
  it('should not report parameters of a method that overrides a superclass member', async () => {
    const code = [
      'class Base { handle(event: string) { return event; } }',
      'export class Derived extends Base { handle(event: string) { return 1; } }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should not report parameters of an explicit override', async () => {
    const code = [
      'class Base { run(input: string) { return input; } }',
      'export class Child extends Base { override run(input: string) { return 2; } }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should resolve superclasses declared in other units', async () => {
    const base = 'export class Base { handle(event: string) { return event; } }';
    const derived = [
      "import { Base } from './base';",
      'export class Derived extends Base {',
      '  handle(event: string) { return 1; }',
      '  extra(unused: number) { return 2; }',
      '}',
    ].join('\n');

    const result = await analyzeSources({ 'src/base.ts': base, 'src/derived.ts': derived });

    assert.deepStrictEqual(result.unused.map(d => `${d.location.file}:${d.name}`), ['src/derived.ts:unused']);
  });

  it('should not report parameters of interface implementations', async () => {
    const code = [
      'interface Handler { handle(event: string): void; }',
      'export class Impl implements Handler { handle(event: string) {} }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should follow interface inheritance', async () => {
    const code = [
      'interface Named { rename(next: string): void; }',
      'interface Entity extends Named {}',
      'export class User implements Entity { rename(next: string) {} }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should treat every method of a class with an unresolvable superclass as a contract', async () => {
    const code = [
      "import { Component } from 'some-framework';",
      'export class Widget extends Component { render(props: object) { return null; } }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should report a new method on a class whose superclass is known', async () => {
    const code = [
      'class Base { handle(event: string) { return event; } }',
      'export class Plain extends Base { other(x: number) { return 1; } }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), ['parameter:x']);
  });

  it('should not treat constructors as contracts', async () => {
    const code = [
      "import { Component } from 'some-framework';",
      'export class Widget extends Component { constructor(options: object) { super(); } }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), ['parameter:options']);
  });

  it('should not report setter, abstract, declared and overload parameters', async () => {
    const code = [
      'export abstract class Shape {',
      '  private size = 0;',
      '  set area(next: number) {}',
      '  get area() { return this.size; }',
      '  abstract scale(factor: number): void;',
      '}',
      'export declare function external(a: number): void;',
      'export function parse(input: string): number;',
      'export function parse(input: unknown) { return Number(input); }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), []);
  });
});

// =============================================================================
// TESTS: output-only bindings
// =============================================================================

describe('output-only bindings', () => {
  it('should report a parameter bound only by a for-of head', async () => {
    const code = [
      'export function drain(items: string[], last: string) {',
      '  for (last of items) {}',
      '  return items.length;',
      '}',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), ['parameter:last']);
  });

  it('should report parameters that are only destructuring targets', async () => {
    const code = 'export function fill(a: number, b: number) { [a, b] = [1, 2]; }';
    assert.deepStrictEqual(await unusedIn(code), ['parameter:a', 'parameter:b']);
  });

  it('should not report a parameter that is also read', async () => {
    const code = 'export function bump(n: number) { n = n + 1; return n; }';
    assert.deepStrictEqual(await unusedIn(code), []);
  });
});

// =============================================================================
// TESTS: placeholders and exemptions
// =============================================================================

describe('positional placeholders', () => {
  const code = 'export function pick(first: string, second: string) { return second; }';
  const PLACEHOLDERS = { config: { ignorePositionalPlaceholders: true } };

  it('should report an unused parameter that precedes a read one by default', async () => {
    assert.deepStrictEqual(await unusedIn(code), ['parameter:first']);
  });

  it('should keep it when placeholders are ignored', async () => {
    assert.deepStrictEqual(await unusedIn(code, PLACEHOLDERS), []);
  });

  it('should apply to callback parameters', async () => {
    const callback = 'export function log(items: string[]) { items.forEach((item, index) => console.log(index)); }';
    assert.deepStrictEqual(await unusedIn(callback), ['lambda-parameter:item']);
    assert.deepStrictEqual(await unusedIn(callback, PLACEHOLDERS), []);
  });

  it('should report a written parameter before a read one by default', async () => {
    const assigned = 'export function f(a: number, b: number) { a = 1; return b; }';
    const destructured = 'export function f(a: number[], b: number) { [a] = [[1]]; return b; }';

    assert.deepStrictEqual(await unusedIn(assigned), ['parameter:a']);
    assert.deepStrictEqual(await unusedIn(destructured), ['parameter:a']);
  });

  it('should report a written parameter even when placeholders are ignored', async () => {
    const assigned = 'export function f(a: number, b: number) { a = 1; return b; }';
    const bumped = 'export function g(a: number, b: number) { a++; return b; }';

    assert.deepStrictEqual(await unusedIn(assigned, PLACEHOLDERS), ['parameter:a']);
    assert.deepStrictEqual(await unusedIn(bumped, PLACEHOLDERS), ['parameter:a']);
  });

  it('should still report an unused sibling in the same destructured parameter', async () => {
    const destructured = 'export function read({ a, b }: { a: number; b: number }) { return a; }';
    const result = await analyzeSources({ 'src/read.ts': destructured });

    assert.deepStrictEqual(result.unused.map(d => d.name), ['b']);
    assert.strictEqual(result.unused[0].siblingGroup, 'src/read.ts:21');
  });
});

describe('parameter exemptions', () => {
  it('should not report discarded names', async () => {
    const code = 'export function ignore(_context: unknown, _: number) { return 1; }';
    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should honour a configured discard pattern', async () => {
    const code = 'export function ignore(_context: unknown, unusedFlag: boolean) { return 1; }';
    assert.deepStrictEqual(
      await unusedIn(code, { config: { discardPattern: '^unused' } }),
      ['parameter:_context']
    );
  });

  it('should not report this or decorated parameters', async () => {
    const code = [
      'declare function Inject(): ParameterDecorator;',
      'export function bound(this: Window, a: number) { return a; }',
      'export class Controller { handle(@Inject() dep: string) { return 1; } }',
    ].join('\n');

    assert.deepStrictEqual(await unusedIn(code), []);
  });

  it('should count exemptions by reason', async () => {
    const code = [
      'export function f(_a: number) { return 1; }',
      'export class S { set v(next: number) {} }',
    ].join('\n');

    const result = await analyzeSources({ 'src/s.ts': code }, PARAMETERS_ONLY);
    assert.deepStrictEqual(result.stats.exempt, { 'discarded': 1, 'external-contract': 1 });
  });
});
