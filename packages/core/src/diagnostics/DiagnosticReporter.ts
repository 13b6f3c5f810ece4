/**
 * DiagnosticReporter - Formats diagnostics for output
 *
 * Formats:
 * - text: one line per diagnostic, `file:line:column` first
 * - json: `{ diagnostics, summary? }` for CI
 */

import { RULE_IDS, type RuleId } from '@unread/types';
import type { Diagnostic, DiagnosticCollector } from './DiagnosticCollector.js';

export interface ReportOptions {
  format: 'text' | 'json';
  includeSummary?: boolean;
}

export interface SummaryStats {
  total: number;
  /** Rules with at least one finding, in rule order */
  byRule: Partial<Record<RuleId, number>>;
}

export class DiagnosticReporter {
  constructor(private readonly collector: DiagnosticCollector) {}

  report(options: ReportOptions): string {
    const diagnostics = this.collector.getAll();
    return options.format === 'json'
      ? this.jsonReport(diagnostics, options)
      : this.textReport(diagnostics, options);
  }

  getStats(): SummaryStats {
    const byRule: Partial<Record<RuleId, number>> = {};
    for (const rule of RULE_IDS) {
      const count = this.collector.getByRule(rule).length;
      if (count > 0) byRule[rule] = count;
    }
    return { total: this.collector.count(), byRule };
  }

  /**
   * e.g. "Found 3 unused declarations (unused-private-field: 1, unused-parameter: 2)"
   */
  summary(): string {
    const { total, byRule } = this.getStats();
    if (total === 0) return 'No unused declarations found.';

    const counts = RULE_IDS.flatMap(rule => {
      const count = byRule[rule];
      return count === undefined ? [] : [`${rule}: ${count}`];
    });
    const noun = total === 1 ? 'declaration' : 'declarations';
    return `Found ${total} unused ${noun} (${counts.join(', ')})`;
  }

  private textReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    if (diagnostics.length === 0) {
      return 'No unused declarations found.';
    }

    const lines: string[] = [];
    for (const diag of diagnostics) {
      lines.push(`${diag.file}:${diag.line}:${diag.column} [WARN] ${diag.code} ${diag.message}`);
      lines.push(`   Suggestion: ${diag.suggestion}`);
    }

    if (options.includeSummary) {
      lines.push('');
      lines.push(this.summary());
    }

    return lines.join('\n');
  }

  private jsonReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    const result: { diagnostics: Diagnostic[]; summary?: SummaryStats } = { diagnostics };

    if (options.includeSummary) {
      result.summary = this.getStats();
    }

    return JSON.stringify(result, null, 2);
  }
}
