/**
 * Diagnostics - findings collected and formatted
 */

export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic } from './DiagnosticCollector.js';

export { DiagnosticReporter } from './DiagnosticReporter.js';
export type { ReportOptions, SummaryStats } from './DiagnosticReporter.js';

export { KIND_TO_RULE, RULE_CODES, codeForKind } from './categories.js';
