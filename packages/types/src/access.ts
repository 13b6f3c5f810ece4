/**
 * Access Types - syntactic contexts of occurrences and the roles they play
 */

import type { DeclarationId } from './branded.js';

/**
 * Role of a single occurrence.
 */
export type AccessRole = 'read' | 'write-only' | 'read-write';

export type CompoundAssignmentOperator =
  | '+=' | '-=' | '*=' | '/=' | '%=' | '**='
  | '<<=' | '>>=' | '>>>='
  | '&=' | '|=' | '^='
  | '&&=' | '||=' | '??=';

/**
 * How a value is produced into an existing binding without being consumed.
 */
export type OutputBindingForm = 'destructuring-assignment' | 'for-in' | 'for-of';

/**
 * Immediate syntactic shape around an occurrence.
 * Closed union; the classifier matches on `kind`.
 */
export type AccessContext =
  | { kind: 'assignment-left-simple' }
  | { kind: 'assignment-left-compound'; operator: CompoundAssignmentOperator }
  | { kind: 'assignment-right' }
  | { kind: 'increment-decrement'; operator: '++' | '--'; prefix: boolean; valueUsed: boolean }
  | { kind: 'output-binding'; binding: OutputBindingForm }
  | { kind: 'other'; shape?: string };

export type AccessContextKind = AccessContext['kind'];

/**
 * One syntactic appearance of an identifier resolved to a declaration.
 */
export interface Occurrence {
  declarationId: DeclarationId;
  context: AccessContext;
}

/**
 * Aggregated role history for one declaration (monotonic OR).
 */
export interface UsageRecord {
  hasRead: boolean;
  hasWrite: boolean;
}

const COMPOUND_OPERATORS: ReadonlySet<string> = new Set<CompoundAssignmentOperator>([
  '+=', '-=', '*=', '/=', '%=', '**=',
  '<<=', '>>=', '>>>=',
  '&=', '|=', '^=',
  '&&=', '||=', '??=',
]);

export function isCompoundAssignmentOperator(operator: string): operator is CompoundAssignmentOperator {
  return COMPOUND_OPERATORS.has(operator);
}
