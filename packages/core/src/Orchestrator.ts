/**
 * Orchestrator - runs an analysis over a project in phases
 *
 * 1. discovery: source files matching include/exclude
 * 2. index: read, parse, class index, field declarations (every unit)
 * 3. usage: parameters, locals and occurrences (every unit)
 * 4. finalize: whole-program sweep, merged with per-callable results
 *
 * Each phase drains its own queue on the worker pool before the next one
 * starts; the usage phase needs the complete class index and every field.
 * While a unit feeds the field tracker it holds a producer handle, so the
 * finalize barrier is enforced by the tracker itself.
 *
 * A unit that fails in any phase fails the run with AnalysisError; no
 * partial report is produced.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import {
  compareDeclarations,
  RULE_IDS,
  type Declaration,
  type Logger,
  type RuleId,
  type UnreadConfig,
  type UnusedDeclaration,
} from '@unread/types';
import { DEFAULT_CONFIG } from './config/ConfigLoader.js';
import { UnitQueue } from './core/UnitQueue.js';
import type { AnalysisPhase, UnitTask } from './core/UnitTask.js';
import { WorkerPool, type TaskHandler, type WorkerTaskCompletedEvent, type WorkerTaskFailedEvent } from './core/WorkerPool.js';
import { DiagnosticCollector } from './diagnostics/DiagnosticCollector.js';
import { discoverSourceFiles, type DiscoveredFile } from './discovery/FileDiscovery.js';
import { AnalysisError, FileAccessError } from './errors/UnreadError.js';
import { collectCallables } from './frontend/CallableCollector.js';
import { ClassIndex } from './frontend/ClassIndex.js';
import { collectFields, PrivateFieldNameIndex, type FieldTables } from './frontend/FieldCollector.js';
import { recordOccurrences } from './frontend/OccurrenceRecorder.js';
import { parseSourceUnit, type SourceUnit } from './frontend/SourceUnit.js';
import { createLogger } from './logging/Logger.js';
import { DeclarationRegistry } from './usage/DeclarationRegistry.js';
import { createPolicySet, type PolicySet } from './usage/ExemptionPolicy.js';
import {
  WholeProgramUsageTracker,
  addTrackerStats,
  emptyTrackerStats,
  type UsageTrackerStats,
} from './usage/UsageTracker.js';
import type {
  AnalysisResult,
  AnalysisStats,
  OrchestratorOptions,
  ProgressCallback,
} from './OrchestratorTypes.js';

export type {
  AnalysisResult,
  AnalysisStats,
  OrchestratorOptions,
  ProgressCallback,
  ProgressInfo,
  RunPhase,
} from './OrchestratorTypes.js';

interface IndexedUnit {
  unit: SourceUnit;
  fieldTables: FieldTables;
}

/**
 * Everything one run accumulates; discarded when run() returns.
 */
interface RunState {
  registry: DeclarationRegistry;
  fieldTracker: WholeProgramUsageTracker;
  classIndex: ClassIndex;
  privateNames: PrivateFieldNameIndex;
  policies: PolicySet;
  units: Map<string, IndexedUnit>;
  callableUnused: Declaration[];
  callableStats: UsageTrackerStats;
  exempt: Map<string, number>;
}

export function toUnusedDeclaration(declaration: Declaration): UnusedDeclaration {
  return {
    name: declaration.name,
    kind: declaration.kind,
    location: { ...declaration.location },
    ...(declaration.siblingGroup !== undefined ? { siblingGroup: declaration.siblingGroup } : {}),
  };
}

function mergeCounts(into: Map<string, number>, from: Map<string, number>): void {
  for (const [reason, count] of from) {
    into.set(reason, (into.get(reason) ?? 0) + count);
  }
}

export class Orchestrator {
  private readonly config: UnreadConfig;
  private readonly logger: Logger;
  private readonly onProgress: ProgressCallback;
  private readonly concurrency: number;
  private readonly enabledRules: ReadonlySet<RuleId>;
  private readonly readSource: (absolutePath: string) => Promise<string>;

  constructor(options: OrchestratorOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? createLogger(options.logLevel ?? 'info');
    this.onProgress = options.onProgress ?? (() => {});
    this.concurrency = options.concurrency ?? this.config.concurrency;
    this.readSource = options.readSource ?? (path => readFile(path, 'utf-8'));

    const requested = options.rules;
    this.enabledRules = new Set(
      RULE_IDS.filter(rule => this.config.rules[rule] && (!requested || requested.includes(rule)))
    );
  }

  isRuleEnabled(rule: RuleId): boolean {
    return this.enabledRules.has(rule);
  }

  /**
   * Analyse every matching file under projectPath.
   * @throws AnalysisError when any unit fails
   */
  async run(projectPath: string): Promise<AnalysisResult> {
    const startTime = Date.now();
    const absoluteProjectPath = resolve(projectPath);

    this.onProgress({ phase: 'discovery', message: 'Discovering source files...' });
    const files = discoverSourceFiles(absoluteProjectPath, this.config.include, this.config.exclude);
    this.logger.info('Discovery complete', { files: files.length, projectPath: absoluteProjectPath });

    return this.analyzeFiles(files, startTime);
  }

  /**
   * Analyse an explicit file list, read through the configured readSource.
   * Unit ids are the files' relative paths.
   * @throws AnalysisError when any unit fails
   */
  async analyzeFiles(files: readonly DiscoveredFile[], startTime: number = Date.now()): Promise<AnalysisResult> {
    const registry = new DeclarationRegistry();
    const state: RunState = {
      registry,
      fieldTracker: new WholeProgramUsageTracker(registry),
      classIndex: new ClassIndex(),
      privateNames: new PrivateFieldNameIndex(),
      policies: createPolicySet({ discardPattern: new RegExp(this.config.discardPattern) }),
      units: new Map(),
      callableUnused: [],
      callableStats: emptyTrackerStats(),
      exempt: new Map(),
    };

    await this.runPhase('index', files, task => this.indexUnit(state, task));
    this.logger.info('Index phase complete', { units: state.units.size, types: state.classIndex.size });

    await this.runPhase('usage', files, task => this.analyzeUnit(state, task));
    this.logger.info('Usage phase complete', { units: state.units.size });

    this.onProgress({ phase: 'finalize', message: 'Collecting unused declarations...' });
    const fieldUnused = state.fieldTracker.finalize();

    const unused = [...fieldUnused, ...state.callableUnused]
      .sort(compareDeclarations)
      .map(toUnusedDeclaration);

    const diagnostics = new DiagnosticCollector();
    diagnostics.addUnused(unused);

    const stats: AnalysisStats = {
      files: files.length,
      types: state.classIndex.size,
      fields: state.fieldTracker.getStats(),
      callables: state.callableStats,
      exempt: Object.fromEntries(state.exempt),
      durationMs: Date.now() - startTime,
    };
    this.logger.debug('Tracker statistics', {
      fields: stats.fields,
      callables: stats.callables,
      exempt: stats.exempt,
    });
    this.logger.info('Analysis complete', {
      unused: unused.length,
      duration: (stats.durationMs / 1000).toFixed(2),
    });

    return { unused, diagnostics, stats };
  }

  /**
   * Run one phase over every file; throws once the pool drained if any unit failed.
   */
  private async runPhase(phase: AnalysisPhase, files: readonly DiscoveredFile[], handler: TaskHandler): Promise<void> {
    const queue = new UnitQueue(phase, files);
    const pool = new WorkerPool(this.concurrency, handler);
    let processed = 0;

    pool.on('worker:task:completed', ({ task }: WorkerTaskCompletedEvent) => {
      processed++;
      this.onProgress({
        phase,
        totalFiles: files.length,
        processedFiles: processed,
        currentFile: task.unitId,
      });
    });
    pool.on('worker:task:failed', ({ task, error }: WorkerTaskFailedEvent) => {
      this.logger.error('Unit failed', { phase, file: task.unitId, error: error.message });
    });

    this.onProgress({ phase, totalFiles: files.length, processedFiles: 0 });
    await pool.processQueue(queue);

    const failed = [...queue.getFailedTasks()];
    if (failed.length > 0) {
      const causes = failed.map(task => task.error ?? new Error(`${task.id} failed`));
      throw new AnalysisError(
        `${failed.length} source unit(s) failed during the ${phase} phase`,
        'ERR_ANALYSIS_FAILED',
        { phase, failed: failed.map(task => task.unitId) },
        causes,
        'Fix or exclude the failing files; no report is produced for a partial program'
      );
    }
  }

  private async indexUnit(state: RunState, task: UnitTask): Promise<void> {
    const { unitId, path } = task;
    const producer = state.fieldTracker.openProducer(unitId);

    try {
      let code: string;
      try {
        code = await this.readSource(path);
      } catch (error) {
        throw new FileAccessError(
          `Cannot read ${unitId}: ${error instanceof Error ? error.message : String(error)}`,
          'ERR_FILE_UNREADABLE',
          { filePath: unitId, phase: 'index' }
        );
      }

      const unit = parseSourceUnit(unitId, path, code);
      state.classIndex.addUnit(unit);

      let fieldTables: FieldTables = new Map();
      if (this.isRuleEnabled('unused-private-field')) {
        const fields = collectFields(unit, {
          tracker: state.fieldTracker,
          policy: state.policies.field,
          privateNames: state.privateNames,
          logger: this.logger,
        });
        fieldTables = fields.tables;
        mergeCounts(state.exempt, fields.exempt);
      }

      state.units.set(unitId, { unit, fieldTables });
    } finally {
      producer.close();
    }
  }

  private async analyzeUnit(state: RunState, task: UnitTask): Promise<void> {
    const { unitId } = task;
    const indexed = state.units.get(unitId);
    if (!indexed) {
      throw new Error(`Unit ${unitId} was not indexed`);
    }

    const producer = state.fieldTracker.openProducer(unitId);
    try {
      const callables = collectCallables(indexed.unit, {
        registry: state.registry,
        classIndex: state.classIndex,
        parameterPolicy: state.policies.parameter,
        localPolicy: state.policies.local,
        trackParameters: this.isRuleEnabled('unused-parameter'),
        trackLocals: this.isRuleEnabled('unused-local'),
        logger: this.logger,
      });
      mergeCounts(state.exempt, callables.exempt);

      const usage = recordOccurrences(indexed.unit, {
        fieldTracker: this.isRuleEnabled('unused-private-field') ? state.fieldTracker : null,
        fieldTables: indexed.fieldTables,
        privateNames: state.privateNames,
        callables,
        ignorePositionalPlaceholders: this.config.ignorePositionalPlaceholders,
        logger: this.logger,
      });

      state.callableUnused.push(...usage.unused);
      addTrackerStats(state.callableStats, usage.stats);
    } finally {
      producer.close();
    }
  }
}
