/**
 * Declaration Types - trackable bindings and their identities
 */

import type { DeclarationId } from './branded.js';

// === DECLARATION KINDS ===
export const DECLARATION_KIND = {
  FIELD: 'field',
  PARAMETER: 'parameter',
  LOCAL_FUNCTION_PARAMETER: 'local-function-parameter',
  LAMBDA_PARAMETER: 'lambda-parameter',
  LOCAL_VARIABLE: 'local-variable',
} as const;

export type DeclarationKind = typeof DECLARATION_KIND[keyof typeof DECLARATION_KIND];

/**
 * Where accesses to a declaration may come from.
 *
 * - whole-program: any source unit of the run (fields)
 * - single-body: the enclosing callable only (parameters, locals)
 */
export type DeclarationScope = 'whole-program' | 'single-body';

/**
 * Parameter-like kinds, all of which live in a single callable body.
 */
export type ParameterKind =
  | typeof DECLARATION_KIND.PARAMETER
  | typeof DECLARATION_KIND.LOCAL_FUNCTION_PARAMETER
  | typeof DECLARATION_KIND.LAMBDA_PARAMETER;

export function isParameterKind(kind: DeclarationKind): kind is ParameterKind {
  return kind === DECLARATION_KIND.PARAMETER
    || kind === DECLARATION_KIND.LOCAL_FUNCTION_PARAMETER
    || kind === DECLARATION_KIND.LAMBDA_PARAMETER;
}

export function scopeOfKind(kind: DeclarationKind): DeclarationScope {
  return kind === DECLARATION_KIND.FIELD ? 'whole-program' : 'single-body';
}

// === LOCATIONS ===
/**
 * Primary source span of a declaration.
 * Lines are 1-based, columns 0-based (babel convention).
 * start/end are character offsets, used by edit tooling.
 */
export interface SourceSpan {
  file: string;
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  start: number;
  end: number;
}

// === DECLARATIONS ===
/**
 * Everything the front-end knows about a binding when it declares it.
 */
export interface DeclarationInput {
  /**
   * Binding identity. Two occurrences referring to the same binding
   * produce the same key, even from different source units.
   */
  key: string;
  name: string;
  kind: DeclarationKind;
  location: SourceSpan;
  /** Co-declared group (`let a, b`, `{ a, b }` parameter), kept for edit tooling */
  siblingGroup?: string;
}

/**
 * A trackable binding. Frozen once created; `id` is assigned exactly once.
 */
export interface Declaration extends Readonly<DeclarationInput> {
  readonly id: DeclarationId;
  readonly scope: DeclarationScope;
  readonly location: Readonly<SourceSpan>;
}

/**
 * Report tuple handed to formatters and edit tooling. Carries no
 * DeclarationId: ids follow the order units were read in and are only
 * meaningful inside one run.
 */
export interface UnusedDeclaration {
  name: string;
  kind: DeclarationKind;
  location: SourceSpan;
  siblingGroup?: string;
}

/**
 * Order used by every finalize(): file, line, column, then id.
 */
export function compareDeclarations(a: Declaration, b: Declaration): number {
  if (a.location.file !== b.location.file) {
    return a.location.file < b.location.file ? -1 : 1;
  }
  if (a.location.line !== b.location.line) return a.location.line - b.location.line;
  if (a.location.column !== b.location.column) return a.location.column - b.location.column;
  return a.id - b.id;
}
