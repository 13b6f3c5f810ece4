/**
 * Orchestrator types - options, progress and results of an analysis run
 */

import type { LogLevel, Logger, RuleId, UnreadConfig, UnusedDeclaration } from '@unread/types';
import type { DiagnosticCollector } from './diagnostics/DiagnosticCollector.js';
import type { UsageTrackerStats } from './usage/UsageTracker.js';

export type RunPhase = 'discovery' | 'index' | 'usage' | 'finalize';

export interface ProgressInfo {
  phase: RunPhase;
  message?: string;
  totalFiles?: number;
  processedFiles?: number;
  currentFile?: string;
}

export type ProgressCallback = (info: ProgressInfo) => void;

export interface OrchestratorOptions {
  /** Merged configuration; DEFAULT_CONFIG when omitted */
  config?: UnreadConfig;
  logger?: Logger;
  /** Used only when no logger is given */
  logLevel?: LogLevel;
  onProgress?: ProgressCallback;
  /** Overrides config.concurrency */
  concurrency?: number;
  /** Restrict the run to these rules (still subject to config.rules) */
  rules?: RuleId[];
  /** Source reader; fs/promises readFile by default */
  readSource?: (absolutePath: string) => Promise<string>;
}

export interface AnalysisStats {
  files: number;
  /** Classes and interfaces in the program-wide index */
  types: number;
  fields: UsageTrackerStats;
  /** Summed over every per-callable tracker */
  callables: UsageTrackerStats;
  /** Exemption reason -> declarations it kept out of tracking */
  exempt: Record<string, number>;
  durationMs: number;
}

export interface AnalysisResult {
  /** Sorted by file, line, column, then id */
  unused: UnusedDeclaration[];
  diagnostics: DiagnosticCollector;
  stats: AnalysisStats;
}
