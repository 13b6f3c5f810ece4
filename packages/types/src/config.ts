/**
 * Configuration shape of `.unread/config.yaml`, after defaults are merged.
 */

export const RULE_IDS = ['unused-private-field', 'unused-parameter', 'unused-local'] as const;

export type RuleId = typeof RULE_IDS[number];

export function isRuleId(value: unknown): value is RuleId {
  return typeof value === 'string' && RULE_IDS.some(id => id === value);
}

export type RuleSettings = Record<RuleId, boolean>;

export interface UnreadConfig {
  /**
   * Config schema version (major.minor.patch). Omitted means no check.
   * @example "0.1.0"
   */
  version?: string;
  /** Globs of files to analyse, relative to the project root */
  include: string[];
  /** Globs removed from `include` */
  exclude: string[];
  rules: RuleSettings;
  /** Source of the RegExp for intentionally discarded names */
  discardPattern: string;
  /** Keep unused parameters that precede a read parameter */
  ignorePositionalPlaceholders: boolean;
  /** Units in flight at once */
  concurrency: number;
}
