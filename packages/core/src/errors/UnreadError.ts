/**
 * UnreadError - Error hierarchy for unread
 *
 * All errors extend the native JavaScript Error class so they can travel
 * through Promise rejections and worker pool failure events unchanged.
 *
 * Error types:
 * - ConfigError: Configuration parsing/validation errors (fatal)
 * - FileAccessError: File system access errors (error)
 * - LanguageError: Unparseable source (warning)
 * - AnalysisError: A source unit failed, the run is aborted (fatal)
 * - BarrierViolationError: finalize() called out of order (fatal)
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  filePath?: string;
  lineNumber?: number;
  phase?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of UnreadError
 */
export interface UnreadErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all unread errors.
 */
export abstract class UnreadError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    // Capture stack trace (V8 specific)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for --json output and log files
   */
  toJSON(): UnreadErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Configuration error - config.yaml parsing, validation, missing required fields
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_MISSING_FIELD
 */
export class ConfigError extends UnreadError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable files, missing project directory
 *
 * Severity: error (default)
 * Codes: ERR_FILE_UNREADABLE, ERR_PROJECT_NOT_FOUND
 */
export class FileAccessError extends UnreadError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Language error - unparseable syntax
 *
 * Severity: warning (always). The orchestrator still aborts the run.
 * Codes: ERR_PARSE_FAILURE
 */
export class LanguageError extends UnreadError {
  readonly code: string;
  readonly severity = 'warning' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Analysis error - one or more source units failed; no partial report
 *
 * Severity: fatal
 * Codes: ERR_ANALYSIS_FAILED
 */
export class AnalysisError extends UnreadError {
  readonly code: string;
  readonly severity = 'fatal' as const;
  readonly causes: Error[];

  constructor(message: string, code: string, context: ErrorContext = {}, causes: Error[] = [], suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
    this.causes = causes;
  }
}

/**
 * Barrier violation - finalize() called while producers are still feeding a
 * whole-program tracker, called twice, or events arriving after finalize.
 *
 * Severity: fatal
 * Codes: ERR_FINALIZE_BEFORE_BARRIER, ERR_FINALIZE_TWICE, ERR_EVENT_AFTER_FINALIZE
 */
export class BarrierViolationError extends UnreadError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}
