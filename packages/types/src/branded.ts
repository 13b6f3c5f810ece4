/**
 * Branded Types - type-safe declaration identities
 *
 * A DeclarationId is a plain integer at runtime. The brand makes sure ids can
 * only come out of a DeclarationRegistry, never from arbitrary arithmetic.
 *
 * @example
 * const id = registry.intern(input);  // DeclarationId
 * tracker.recordAccess(id, context); // OK
 *
 * tracker.recordAccess(42, context);  // ERROR - not a DeclarationId
 */

/**
 * Unique symbol for branding ids.
 * Declared but never actually exists at runtime - purely for type checking.
 */
declare const DECLARATION_ID_BRAND: unique symbol;

export type DeclarationId = number & {
  readonly [DECLARATION_ID_BRAND]: true;
};

/**
 * Internal helper for DeclarationRegistry to brand a freshly assigned id.
 * This should ONLY be used inside the registry.
 *
 * @internal
 */
export function brandDeclarationId(value: number): DeclarationId {
  return value as DeclarationId;
}
