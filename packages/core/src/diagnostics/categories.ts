/**
 * Rule, code and declaration-kind mappings in one place
 */

import type { DeclarationKind, RuleId } from '@unread/types';

export const RULE_CODES: Record<RuleId, string> = {
  'unused-private-field': 'UNUSED_PRIVATE_FIELD',
  'unused-parameter': 'UNUSED_PARAMETER',
  'unused-local': 'UNUSED_LOCAL',
};

export const KIND_TO_RULE: Record<DeclarationKind, RuleId> = {
  'field': 'unused-private-field',
  'parameter': 'unused-parameter',
  'local-function-parameter': 'unused-parameter',
  'lambda-parameter': 'unused-parameter',
  'local-variable': 'unused-local',
};

export function codeForKind(kind: DeclarationKind): string {
  return RULE_CODES[KIND_TO_RULE[kind]];
}
