/**
 * AccessClassifier - maps an occurrence's syntactic context to a role
 *
 * Rules, first match wins:
 * 1. right operand of `=`                 -> read
 * 2. left operand of `=`                  -> write-only
 * 3. left operand of a compound operator  -> read-write
 * 4. operand of ++ / --                   -> read-write
 * 5. output-only binding position         -> write-only
 * 6. anything else                        -> read
 *
 * Pure-write shapes are a closed list. Read shapes are open ended, so
 * unknown contexts fall through to `read`.
 *
 * A read-write occurrence counts as a read of the stored value, except an
 * increment or decrement whose result is discarded (`n++;`).
 */

import type { AccessContext, AccessRole, UsageRecord } from '@unread/types';

export function classifyAccess(context: AccessContext): AccessRole {
  switch (context.kind) {
    case 'assignment-right':
      return 'read';
    case 'assignment-left-simple':
      return 'write-only';
    case 'assignment-left-compound':
      return 'read-write';
    case 'increment-decrement':
      return 'read-write';
    case 'output-binding':
      return 'write-only';
    case 'other':
      return 'read';
    default:
      // Contexts added by newer front-ends
      return 'read';
  }
}

export function roleReads(role: AccessRole): boolean {
  return role !== 'write-only';
}

export function roleWrites(role: AccessRole): boolean {
  return role !== 'read';
}

export function accessReads(context: AccessContext): boolean {
  if (context.kind === 'increment-decrement' && !context.valueUsed) return false;
  return roleReads(classifyAccess(context));
}

/**
 * OR-merge an occurrence into a usage record. Order of merges does not matter.
 */
export function mergeAccess(record: UsageRecord | undefined, context: AccessContext): UsageRecord {
  return {
    hasRead: (record?.hasRead ?? false) || accessReads(context),
    hasWrite: (record?.hasWrite ?? false) || roleWrites(classifyAccess(context)),
  };
}
