/**
 * DiagnosticReporter Tests
 *
 * Text and JSON output plus the summary printed by `unread check`.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { DiagnosticCollector, DiagnosticReporter } from '@unread/core';
import type { DeclarationKind, UnusedDeclaration } from '@unread/types';

function unused(kind: DeclarationKind, name: string, line: number, column: number): UnusedDeclaration {
  return {
    name,
    kind,
    location: { file: 'src/app.ts', line, column, endLine: line, endColumn: column, start: 0, end: 0 },
  };
}

function reporterFor(declarations: UnusedDeclaration[]): DiagnosticReporter {
  const collector = new DiagnosticCollector();
  collector.addUnused(declarations);
  return new DiagnosticReporter(collector);
}

const SAMPLE = [
  unused('field', 'cache', 3, 10),
  unused('parameter', 'flag', 7, 14),
  unused('lambda-parameter', 'item', 9, 20),
];

describe('DiagnosticReporter', () => {
  describe('text format', () => {
    it('should print one line per finding with its suggestion', () => {
      const output = reporterFor([SAMPLE[0]]).report({ format: 'text' });

      assert.strictEqual(output, [
        'src/app.ts:3:11 [WARN] UNUSED_PRIVATE_FIELD Private field "cache" is never read',
        '   Suggestion: Remove the field, or read it where it is assigned',
      ].join('\n'));
    });

    it('should append the summary when asked', () => {
      const lines = reporterFor(SAMPLE).report({ format: 'text', includeSummary: true }).split('\n');

      assert.strictEqual(lines.length, 8);
      assert.strictEqual(lines[6], '');
      assert.strictEqual(lines[7], 'Found 3 unused declarations (unused-private-field: 1, unused-parameter: 2)');
    });

    it('should say so when nothing is unused', () => {
      assert.strictEqual(reporterFor([]).report({ format: 'text', includeSummary: true }), 'No unused declarations found.');
    });
  });

  describe('json format', () => {
    it('should include diagnostics and summary', () => {
      const parsed = JSON.parse(reporterFor(SAMPLE).report({ format: 'json', includeSummary: true }));

      assert.strictEqual(parsed.diagnostics.length, 3);
      assert.strictEqual(parsed.diagnostics[1].name, 'flag');
      assert.strictEqual(parsed.diagnostics[1].column, 15);
      assert.deepStrictEqual(parsed.summary, { total: 3, byRule: { 'unused-private-field': 1, 'unused-parameter': 2 } });
    });

    it('should omit the summary by default', () => {
      const parsed = JSON.parse(reporterFor([]).report({ format: 'json' }));
      assert.deepStrictEqual(parsed, { diagnostics: [] });
    });
  });

  describe('summary()', () => {
    it('should use the singular for one finding', () => {
      const reporter = reporterFor([unused('local-variable', 'tmp', 12, 8)]);
      assert.strictEqual(reporter.summary(), 'Found 1 unused declaration (unused-local: 1)');
    });

    it('should list rules in rule order whatever the finding order', () => {
      const reporter = reporterFor([unused('local-variable', 'tmp', 1, 0), SAMPLE[1], SAMPLE[0]]);
      assert.strictEqual(
        reporter.summary(),
        'Found 3 unused declarations (unused-private-field: 1, unused-parameter: 1, unused-local: 1)'
      );
    });
  });
});
