/**
 * ExemptionPolicy - per-kind predicate chains deciding what gets tracked
 *
 * A policy is an ordered list of named exemptions, cheapest first. The first
 * exemption that applies wins and its name becomes the verdict's reason.
 * Exemptions are pure functions of declaration metadata.
 *
 * Usage:
 *   const policy = createParameterPolicy({ discardPattern: /^_/ });
 *   if (policy.shouldTrack(site)) tracker.declare(site);
 */

import type {
  ExemptionPolicy,
  FieldSite,
  LocalSite,
  ParameterSite,
  PolicyVerdict,
} from '@unread/types';

/**
 * One link of the chain.
 */
export interface Exemption<TSite> {
  reason: string;
  applies(site: TSite): boolean;
}

export class PolicyChain<TSite> implements ExemptionPolicy<TSite> {
  readonly name: string;
  private readonly exemptions: readonly Exemption<TSite>[];

  constructor(name: string, exemptions: readonly Exemption<TSite>[]) {
    this.name = name;
    this.exemptions = exemptions;
  }

  evaluate(site: TSite): PolicyVerdict {
    for (const exemption of this.exemptions) {
      if (exemption.applies(site)) {
        return { tracked: false, reason: exemption.reason };
      }
    }
    return { tracked: true };
  }

  shouldTrack(site: TSite): boolean {
    return this.evaluate(site).tracked;
  }

  /** Names of the links, in evaluation order */
  get reasons(): string[] {
    return this.exemptions.map(e => e.reason);
  }
}

export interface PolicyOptions {
  /** Names matching this pattern are treated as intentionally discarded */
  discardPattern?: RegExp;
}

export const DEFAULT_DISCARD_PATTERN = /^_/;

function isDiscarded(name: string, pattern: RegExp): boolean {
  // A global/sticky pattern would carry lastIndex between calls
  pattern.lastIndex = 0;
  return pattern.test(name);
}

// === FIELDS ===

export const FIELD_EXEMPTIONS: readonly Exemption<FieldSite>[] = [
  {
    reason: 'not-private',
    applies: site => site.accessibility !== 'private' && site.accessibility !== 'hash-private',
  },
  {
    reason: 'compiler-synthesized',
    applies: site => site.isDeclare || site.isAccessorStorage,
  },
  {
    reason: 'compile-time-constant',
    applies: site => site.isReadonly && site.hasLiteralInitializer,
  },
  {
    reason: 'decorated',
    applies: site => site.decoratorCount > 0,
  },
];

export function createFieldPolicy(): PolicyChain<FieldSite> {
  return new PolicyChain('field', FIELD_EXEMPTIONS);
}

// === PARAMETERS ===

export function createParameterPolicy(options: PolicyOptions = {}): PolicyChain<ParameterSite> {
  const discardPattern = options.discardPattern ?? DEFAULT_DISCARD_PATTERN;

  return new PolicyChain<ParameterSite>('parameter', [
    {
      reason: 'synthesized',
      applies: site => site.isThisParameter || site.isParameterProperty,
    },
    {
      reason: 'no-body',
      applies: site => !site.callable.hasBody || site.callable.isAbstract || site.callable.isDeclare,
    },
    {
      reason: 'external-contract',
      applies: site =>
        site.callable.isOverride
        || site.callable.satisfiesExternalContract
        || site.callable.form === 'setter',
    },
    {
      reason: 'discarded',
      applies: site => isDiscarded(site.name, discardPattern),
    },
    {
      reason: 'attributed',
      applies: site => site.decoratorCount > 0,
    },
  ]);
}

// === LOCALS ===

export function createLocalPolicy(options: PolicyOptions = {}): PolicyChain<LocalSite> {
  const discardPattern = options.discardPattern ?? DEFAULT_DISCARD_PATTERN;

  return new PolicyChain<LocalSite>('local', [
    {
      reason: 'using-declaration',
      applies: site => site.declarationKind === 'using' || site.declarationKind === 'await using',
    },
    {
      reason: 'rest-sibling',
      applies: site => site.hasRestSibling,
    },
    {
      reason: 'discarded',
      applies: site => isDiscarded(site.name, discardPattern),
    },
  ]);
}

/**
 * The three policies of a run, built once and shared by every unit.
 */
export interface PolicySet {
  field: PolicyChain<FieldSite>;
  parameter: PolicyChain<ParameterSite>;
  local: PolicyChain<LocalSite>;
}

export function createPolicySet(options: PolicyOptions = {}): PolicySet {
  return {
    field: createFieldPolicy(),
    parameter: createParameterPolicy(options),
    local: createLocalPolicy(options),
  };
}
