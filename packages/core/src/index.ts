/**
 * @unread/core - usage analysis engine
 */

// Error types
export {
  UnreadError,
  ConfigError,
  FileAccessError,
  LanguageError,
  AnalysisError,
  BarrierViolationError,
} from './errors/UnreadError.js';
export type { ErrorContext, ErrorSeverity, UnreadErrorJSON } from './errors/UnreadError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  formatMessage,
  safeStringify,
  LOG_LEVEL_PRIORITY,
} from './logging/Logger.js';

// Usage tracking
export * from './usage/index.js';

// Front-end
export * from './frontend/index.js';

// Diagnostics
export * from './diagnostics/index.js';

// Config
export * from './config/index.js';

// Discovery
export { discoverSourceFiles, matchesAny, toPosixPath } from './discovery/FileDiscovery.js';
export type { DiscoveredFile } from './discovery/FileDiscovery.js';

// Scheduling
export { UnitTask } from './core/UnitTask.js';
export type { AnalysisPhase, TaskStatus } from './core/UnitTask.js';
export { UnitQueue } from './core/UnitQueue.js';
export type { UnitSource } from './core/UnitQueue.js';
export { WorkerPool } from './core/WorkerPool.js';
export type { TaskHandler, WorkerTaskCompletedEvent, WorkerTaskFailedEvent } from './core/WorkerPool.js';

// Main orchestrator
export { Orchestrator, toUnusedDeclaration } from './Orchestrator.js';
export type {
  AnalysisResult,
  AnalysisStats,
  OrchestratorOptions,
  ProgressCallback,
  ProgressInfo,
  RunPhase,
} from './Orchestrator.js';

// Version
export { UNREAD_VERSION, getSchemaVersion } from './version.js';
