/**
 * Check command - report declarations that are never read
 *
 * Exit codes:
 *   0  nothing reported
 *   1  unused declarations found
 *   2  the run itself failed (config, unreadable or unparseable file, ...)
 */

import { Command } from 'commander';
import { resolve } from 'path';
import {
  AnalysisError,
  DiagnosticReporter,
  Orchestrator,
  UnreadError,
  closeLogger,
  createLogger,
  loadConfig,
} from '@unread/core';
import { RULE_IDS, isLogLevel, isRuleId, type LogLevel, type RuleId } from '@unread/types';
import { formatError } from '../utils/errorFormatter.js';
import { ProgressRenderer } from '../utils/progressRenderer.js';

export const EXIT_CLEAN = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_FAILURE = 2;

export interface CheckOptions {
  json?: boolean;
  config?: string;
  logLevel?: string;
  logFile?: string;
  concurrency?: string;
  rule?: string[];
  progress?: boolean;
}

/**
 * Where a check run writes; tests pass collectors.
 */
export interface CheckOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultOutput: CheckOutput = {
  stdout: text => console.log(text),
  stderr: text => console.error(text),
};

/**
 * Thrown for invalid command-line values; reported like a config error.
 */
export class UsageError extends Error {
  constructor(message: string, readonly nextSteps: string[] = []) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseConcurrency(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`Invalid --concurrency: ${value}`, ['Use a positive integer, e.g. --concurrency 4']);
  }
  return parsed;
}

export function parseRules(values: string[] | undefined): RuleId[] | undefined {
  if (values === undefined || values.length === 0) return undefined;
  const rules: RuleId[] = [];
  for (const value of values) {
    if (!isRuleId(value)) {
      throw new UsageError(`Unknown rule: ${value}`, [`Available: ${RULE_IDS.join(', ')}`]);
    }
    if (!rules.includes(value)) rules.push(value);
  }
  return rules;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  if (!isLogLevel(value)) {
    throw new UsageError(`Invalid --log-level: ${value}`, ['Use one of: silent, errors, warnings, info, debug']);
  }
  return value;
}

function reportFailure(error: Error, options: CheckOptions, output: CheckOutput): void {
  if (options.json) {
    const payload = error instanceof UnreadError
      ? {
          error: error.toJSON(),
          ...(error instanceof AnalysisError ? { causes: error.causes.map(cause => cause.message) } : {}),
        }
      : { error: { code: 'ERR_UNKNOWN', severity: 'fatal', message: error.message } };
    output.stdout(JSON.stringify(payload, null, 2));
    return;
  }

  const nextSteps: string[] = [];
  if (error instanceof AnalysisError) {
    nextSteps.push(...error.causes.map(cause => cause.message));
  }
  if (error instanceof UsageError) {
    nextSteps.push(...error.nextSteps);
  }
  if (error instanceof UnreadError && error.suggestion) {
    nextSteps.push(error.suggestion);
  }
  output.stderr(formatError(error.message, nextSteps).join('\n'));
}

/**
 * Run a check and return the exit code. Never calls process.exit.
 */
export async function runCheck(
  path: string,
  options: CheckOptions,
  output: CheckOutput = defaultOutput
): Promise<number> {
  const projectPath = resolve(path);

  let logLevel: LogLevel;
  let concurrency: number | undefined;
  let rules: RuleId[] | undefined;
  try {
    logLevel = parseLogLevel(options.logLevel, 'warnings');
    concurrency = parseConcurrency(options.concurrency);
    rules = parseRules(options.rule);
  } catch (error) {
    reportFailure(error instanceof Error ? error : new Error(String(error)), options, output);
    return EXIT_FAILURE;
  }

  const logger = createLogger(logLevel, options.logFile ? { logFile: options.logFile } : undefined);
  const renderer = options.progress && !options.json ? new ProgressRenderer() : null;

  try {
    const config = loadConfig(projectPath, logger, options.config ? resolve(options.config) : undefined);
    const orchestrator = new Orchestrator({
      config,
      logger,
      concurrency,
      rules,
      onProgress: renderer ? info => renderer.update(info) : undefined,
    });

    const result = await orchestrator.run(projectPath);
    if (renderer) {
      output.stderr(renderer.finish(result.stats.durationMs / 1000));
    }

    const reporter = new DiagnosticReporter(result.diagnostics);
    if (options.json) {
      output.stdout(reporter.report({ format: 'json', includeSummary: true }));
    } else {
      output.stdout(reporter.report({ format: 'text', includeSummary: true }));
    }

    return result.unused.length > 0 ? EXIT_FINDINGS : EXIT_CLEAN;
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    logger.debug('Check failed', { error: failure });
    reportFailure(failure, options, output);
    return EXIT_FAILURE;
  } finally {
    await closeLogger(logger);
  }
}

export const checkCommand = new Command('check')
  .description('Report private fields, parameters and locals that are never read')
  .argument('[path]', 'Project path', '.')
  .option('-j, --json', 'Output results as JSON')
  .option('-c, --config <file>', 'Config file (default: .unread/config.yaml)')
  .option('-l, --log-level <level>', 'silent, errors, warnings, info or debug')
  .option('--log-file <file>', 'Also write a debug log to this file')
  .option('--concurrency <n>', 'Source units analysed at once')
  .option('-r, --rule <id...>', `Only these rules (${RULE_IDS.join(', ')})`)
  .option('--progress', 'Show progress on stderr')
  .addHelpText('after', `
Examples:
  unread check                              Check the current directory
  unread check ./my-project --json          Machine-readable output
  unread check --rule unused-parameter      One rule only
  unread check --log-level debug --log-file run.log
`)
  .action(async (path: string, options: CheckOptions) => {
    process.exitCode = await runCheck(path, options);
  });
