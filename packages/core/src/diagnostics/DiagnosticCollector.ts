/**
 * DiagnosticCollector - one warning per unused declaration
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   collector.addUnused(result.unused);
 *   console.log(new DiagnosticReporter(collector).report({ format: 'text' }));
 */

import type { DeclarationKind, RuleId, UnusedDeclaration } from '@unread/types';
import { KIND_TO_RULE, codeForKind } from './categories.js';

export interface Diagnostic {
  code: string;
  severity: 'warning';
  message: string;
  file: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  rule: RuleId;
  /** Declared name of the unused binding */
  name: string;
  kind: DeclarationKind;
  siblingGroup?: string;
  suggestion: string;
}

const KIND_LABELS: Record<DeclarationKind, string> = {
  'field': 'Private field',
  'parameter': 'Parameter',
  'local-function-parameter': 'Local function parameter',
  'lambda-parameter': 'Lambda parameter',
  'local-variable': 'Local variable',
};

const KIND_SUGGESTIONS: Record<DeclarationKind, string> = {
  'field': 'Remove the field, or read it where it is assigned',
  'parameter': 'Remove the parameter, or prefix it with "_" if the signature is fixed',
  'local-function-parameter': 'Remove the parameter, or prefix it with "_" if the signature is fixed',
  'lambda-parameter': 'Prefix the parameter with "_" if the callback signature is fixed',
  'local-variable': 'Remove the variable, or keep only the expression that initializes it',
};

export class DiagnosticCollector {
  private readonly diagnostics: Diagnostic[] = [];

  /**
   * Appends in the order given; the orchestrator passes report order.
   */
  addUnused(unused: readonly UnusedDeclaration[]): void {
    for (const declaration of unused) {
      const { kind, name, location } = declaration;
      this.diagnostics.push({
        code: codeForKind(kind),
        severity: 'warning',
        message: `${KIND_LABELS[kind]} "${name}" is never read`,
        file: location.file,
        line: location.line,
        column: location.column + 1,
        rule: KIND_TO_RULE[kind],
        name,
        kind,
        ...(declaration.siblingGroup !== undefined ? { siblingGroup: declaration.siblingGroup } : {}),
        suggestion: KIND_SUGGESTIONS[kind],
      });
    }
  }

  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByRule(rule: RuleId): Diagnostic[] {
    return this.diagnostics.filter(d => d.rule === rule);
  }

  count(): number {
    return this.diagnostics.length;
  }
}
