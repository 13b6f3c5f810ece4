import { readFileSync, existsSync } from 'fs';
import { join, extname } from 'path';
import { parse as parseYAML } from 'yaml';
import { RULE_IDS, isRuleId, type Logger, type RuleSettings, type UnreadConfig } from '@unread/types';
import { ConfigError } from '../errors/UnreadError.js';
import { UNREAD_VERSION, getSchemaVersion } from '../version.js';

/**
 * unread configuration.
 *
 * Location: .unread/config.yaml (preferred) or .unread/config.json
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * include:
 *   - "src/**\/*.ts"
 * exclude:
 *   - "**\/*.test.ts"
 * rules:
 *   unused-private-field: true
 *   unused-parameter: true
 *   unused-local: false
 * discardPattern: "^_"
 * ignorePositionalPlaceholders: false
 * concurrency: 8
 * ```
 *
 * Every key is optional; missing keys take DEFAULT_CONFIG values.
 */

export const CONFIG_DIR = '.unread';

export const DEFAULT_CONFIG: UnreadConfig = {
  version: getSchemaVersion(UNREAD_VERSION),
  include: ['**/*.{ts,tsx,mts,cts,js,jsx,mjs,cjs}'],
  exclude: ['**/*.d.ts', '**/node_modules/**', '**/dist/**'],
  rules: {
    'unused-private-field': true,
    'unused-parameter': true,
    'unused-local': true,
  },
  discardPattern: '^_',
  ignorePositionalPlaceholders: false,
  concurrency: 8,
};

type WarnLogger = Pick<Logger, 'warn'>;

function configError(message: string, context: Record<string, unknown> = {}): ConfigError {
  return new ConfigError(
    `Config error: ${message}`,
    'ERR_CONFIG_INVALID',
    context,
    `Fix the value in ${CONFIG_DIR}/config.yaml or run: unread init --force`
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load config from `<projectPath>/.unread/`, or from `configPath` when given.
 *
 * Priority:
 * 1. explicit configPath
 * 2. config.yaml
 * 3. config.json
 * 4. DEFAULT_CONFIG
 *
 * A file that does not parse logs a warning and yields the defaults.
 * A file that parses but holds invalid values throws ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: WarnLogger = console,
  configPath?: string
): UnreadConfig {
  const candidates = configPath
    ? [configPath]
    : [join(projectPath, CONFIG_DIR, 'config.yaml'), join(projectPath, CONFIG_DIR, 'config.json')];

  const file = candidates.find(candidate => existsSync(candidate));
  if (!file) {
    if (configPath) {
      throw new ConfigError(
        `Config error: config file not found: ${configPath}`,
        'ERR_CONFIG_MISSING_FIELD',
        { filePath: configPath },
        'Check the --config path'
      );
    }
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    const content = readFileSync(file, 'utf-8');
    parsed = extname(file) === '.json' ? JSON.parse(content) : parseYAML(content);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${file}: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(parsed)) {
    throw configError(`config must be a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`, { filePath: file });
  }

  return mergeConfig(DEFAULT_CONFIG, parsed, logger);
}

/**
 * Config version must match the running schema version.
 * Omitted version passes.
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): string | undefined {
  if (configVersion === undefined || configVersion === null) {
    return undefined;
  }

  if (typeof configVersion !== 'string') {
    throw configError(`version must be a string, got ${typeof configVersion}`);
  }

  if (!configVersion.trim()) {
    throw configError('version cannot be empty');
  }

  const current = currentVersion ?? UNREAD_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw configError(
      `config version "${configVersion}" is not compatible with ` +
      `unread ${current}. Expected "${currentSchema}".`,
      { configVersion, currentVersion: current }
    );
  }
  return configVersion;
}

function validatePatternList(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;

  if (!Array.isArray(value)) {
    throw configError(`${field} must be an array, got ${typeof value}`);
  }

  const patterns: string[] = [];
  value.forEach((pattern: unknown, i) => {
    if (typeof pattern !== 'string') {
      throw configError(`${field}[${i}] must be a string, got ${typeof pattern}`);
    }
    if (!pattern.trim()) {
      throw configError(`${field}[${i}] cannot be empty or whitespace-only`);
    }
    patterns.push(pattern);
  });
  return patterns;
}

/**
 * include/exclude must be arrays of non-empty strings.
 * An empty include only warns: nothing will be analysed.
 */
export function validatePatterns(
  include: unknown,
  exclude: unknown,
  logger: WarnLogger
): { include?: string[]; exclude?: string[] } {
  const includePatterns = validatePatternList(include, 'include');
  const excludePatterns = validatePatternList(exclude, 'exclude');

  if (includePatterns && includePatterns.length === 0) {
    logger.warn('Warning: include is an empty array - no files will be processed');
  }

  return { include: includePatterns, exclude: excludePatterns };
}

/**
 * rules: mapping of known rule id to boolean.
 */
export function validateRules(rules: unknown): Partial<RuleSettings> {
  if (rules === undefined || rules === null) return {};

  if (!isRecord(rules)) {
    throw configError(`rules must be a mapping, got ${Array.isArray(rules) ? 'array' : typeof rules}`);
  }

  const settings: Partial<RuleSettings> = {};
  for (const [id, enabled] of Object.entries(rules)) {
    if (!isRuleId(id)) {
      throw configError(`unknown rule "${id}". Known rules: ${RULE_IDS.join(', ')}`, { rule: id });
    }
    if (typeof enabled !== 'boolean') {
      throw configError(`rules.${id} must be a boolean, got ${typeof enabled}`);
    }
    settings[id] = enabled;
  }
  return settings;
}

/**
 * discardPattern must compile as a RegExp.
 */
export function validateDiscardPattern(pattern: unknown): string | undefined {
  if (pattern === undefined || pattern === null) return undefined;

  if (typeof pattern !== 'string') {
    throw configError(`discardPattern must be a string, got ${typeof pattern}`);
  }
  try {
    new RegExp(pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw configError(`discardPattern is not a valid regular expression: ${reason}`, { discardPattern: pattern });
  }
  return pattern;
}

export function validateConcurrency(concurrency: unknown): number | undefined {
  if (concurrency === undefined || concurrency === null) return undefined;

  if (typeof concurrency !== 'number' || !Number.isInteger(concurrency) || concurrency < 1) {
    throw configError(`concurrency must be a positive integer, got ${String(concurrency)}`);
  }
  return concurrency;
}

function validateFlag(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw configError(`${field} must be a boolean, got ${typeof value}`);
  }
  return value;
}

/**
 * Validate a raw mapping and lay it over the defaults.
 * YAML null counts as absent.
 */
export function mergeConfig(
  defaults: UnreadConfig,
  raw: Record<string, unknown>,
  logger: WarnLogger = console
): UnreadConfig {
  const version = validateVersion(raw.version);
  const patterns = validatePatterns(raw.include, raw.exclude, logger);

  return {
    version: version ?? defaults.version,
    include: patterns.include ?? defaults.include,
    exclude: patterns.exclude ?? defaults.exclude,
    rules: { ...defaults.rules, ...validateRules(raw.rules) },
    discardPattern: validateDiscardPattern(raw.discardPattern) ?? defaults.discardPattern,
    ignorePositionalPlaceholders:
      validateFlag(raw.ignorePositionalPlaceholders, 'ignorePositionalPlaceholders')
      ?? defaults.ignorePositionalPlaceholders,
    concurrency: validateConcurrency(raw.concurrency) ?? defaults.concurrency,
  };
}
