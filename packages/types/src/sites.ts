/**
 * Declaration Sites - metadata the exemption policies decide on
 *
 * A site is what the front-end sees at a declaration before anything is
 * registered. Policies are pure predicates over these shapes; they never see
 * occurrences.
 */

import type { DeclarationInput, ParameterKind } from './declarations.js';

/**
 * Member accessibility as written in source.
 * 'hash-private' is an ECMAScript `#name`.
 */
export type Accessibility = 'public' | 'protected' | 'private' | 'hash-private' | 'none';

export interface FieldSite extends DeclarationInput {
  kind: 'field';
  className: string;
  accessibility: Accessibility;
  isStatic: boolean;
  isReadonly: boolean;
  /** `declare x: T;` - type-only, no runtime storage */
  isDeclare: boolean;
  /** `accessor x` - storage synthesized behind a getter/setter pair */
  isAccessorStorage: boolean;
  /** `constructor(private x: T)` */
  isParameterProperty: boolean;
  /** Initializer is a literal (number, string, boolean, bigint, null, plain template) */
  hasLiteralInitializer: boolean;
  decoratorCount: number;
}

export type CallableForm =
  | 'function'
  | 'function-expression'
  | 'arrow'
  | 'method'
  | 'constructor'
  | 'getter'
  | 'setter'
  | 'object-method';

/**
 * The callable a parameter belongs to.
 */
export interface CallableInfo {
  form: CallableForm;
  /** Best-effort display name; '<anonymous>' when there is none */
  name: string;
  hasBody: boolean;
  isAbstract: boolean;
  /** `declare function`, overload signatures, `declare` methods */
  isDeclare: boolean;
  /** Explicit `override` modifier */
  isOverride: boolean;
  /**
   * Signature must match something outside the callable: overrides a member
   * of a superclass, or implements an interface member. Resolved by the
   * front-end's class index; unresolvable hierarchies count as contracts.
   */
  satisfiesExternalContract: boolean;
}

export interface ParameterSite extends DeclarationInput {
  kind: ParameterKind;
  /** Position in the parameter list; bindings of one pattern share it */
  position: number;
  callable: CallableInfo;
  decoratorCount: number;
  /** TypeScript `this: T` pseudo-parameter */
  isThisParameter: boolean;
  isParameterProperty: boolean;
}

export interface LocalSite extends DeclarationInput {
  kind: 'local-variable';
  declarationKind: 'var' | 'let' | 'const' | 'using' | 'await using';
  /** Sits next to a `...rest` element in an object pattern */
  hasRestSibling: boolean;
}

export type DeclarationSite = FieldSite | ParameterSite | LocalSite;

/**
 * Outcome of an exemption policy evaluation.
 */
export type PolicyVerdict =
  | { tracked: true }
  | { tracked: false; reason: string };

/**
 * One capability shared by every declaration-kind policy.
 */
export interface ExemptionPolicy<TSite> {
  readonly name: string;
  shouldTrack(site: TSite): boolean;
  evaluate(site: TSite): PolicyVerdict;
}
