/**
 * Tests for ProgressRenderer
 *
 * Tests the CLI progress display formatting:
 * - Phase transitions and indexing
 * - TTY vs non-TTY output modes
 * - Display throttling
 * - Final summary message
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ProgressRenderer } from '../src/utils/progressRenderer.js';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Helper to capture output for testing.
 */
class OutputCapture {
  public lines: string[] = [];

  write = (text: string): void => {
    this.lines.push(text);
  };

  getLastLine(): string {
    return this.lines[this.lines.length - 1] ?? '';
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe('ProgressRenderer', () => {
  let output: OutputCapture;

  beforeEach(() => {
    output = new OutputCapture();
  });

  describe('phase tracking', () => {
    it('should index phases in run order', () => {
      const renderer = new ProgressRenderer({ isInteractive: false, throttle: 0, write: output.write });

      renderer.update({ phase: 'usage', totalFiles: 4, processedFiles: 1 });

      assert.deepStrictEqual(renderer.getState(), {
        phaseIndex: 2,
        phase: 'usage',
        processedFiles: 1,
        totalFiles: 4,
        spinnerIndex: 1,
      });
    });

    it('should reset counts when the phase changes', () => {
      const renderer = new ProgressRenderer({ isInteractive: false, throttle: 0, write: output.write });

      renderer.update({ phase: 'index', totalFiles: 10, processedFiles: 10 });
      renderer.update({ phase: 'finalize' });

      const state = renderer.getState();
      assert.strictEqual(state.phaseIndex, 3);
      assert.strictEqual(state.totalFiles, 0);
      assert.strictEqual(state.processedFiles, 0);
    });

    it('should keep totals across updates of one phase', () => {
      const renderer = new ProgressRenderer({ isInteractive: false, throttle: 0, write: output.write });

      renderer.update({ phase: 'index', totalFiles: 10, processedFiles: 0 });
      renderer.update({ phase: 'index', processedFiles: 6 });

      assert.strictEqual(renderer.getState().totalFiles, 10);
      assert.strictEqual(renderer.getState().processedFiles, 6);
    });
  });

  describe('non-interactive output', () => {
    it('should print the message of an event', () => {
      const renderer = new ProgressRenderer({ isInteractive: false, throttle: 0, write: output.write });

      renderer.update({ phase: 'discovery', message: 'Discovering source files...' });

      assert.match(output.getLastLine(), /^\[discovery\] Discovering source files\.\.\. \(\d+\.\ds\)\n$/);
    });

    it('should print file counts when there is no message', () => {
      const renderer = new ProgressRenderer({ isInteractive: false, throttle: 0, write: output.write });

      renderer.update({ phase: 'index', totalFiles: 10, processedFiles: 3 });

      assert.match(output.getLastLine(), /^\[index\] 3\/10 files \(\d+\.\ds\)\n$/);
    });
  });

  describe('interactive output', () => {
    it('should rewrite one padded line with spinner and phase label', () => {
      const renderer = new ProgressRenderer({ isInteractive: true, throttle: 0, write: output.write });

      renderer.update({ phase: 'index', totalFiles: 10, processedFiles: 3 });

      const line = output.getLastLine();
      assert.strictEqual(line.length, 81);
      assert.match(line, /^\r⠙ \[2\/4\] Indexing\.\.\. 3\/10 files \| \d+\.\ds +$/);
    });
  });

  describe('throttling', () => {
    it('should skip displays inside the throttle window but keep state', () => {
      const renderer = new ProgressRenderer({ isInteractive: false, throttle: 60_000, write: output.write });

      renderer.update({ phase: 'index', totalFiles: 10, processedFiles: 1 });
      renderer.update({ phase: 'index', processedFiles: 2 });
      renderer.update({ phase: 'index', processedFiles: 3 });

      assert.strictEqual(output.lines.length, 1);
      assert.strictEqual(renderer.getState().processedFiles, 3);
    });
  });

  describe('finish()', () => {
    it('should return a plain line when not interactive', () => {
      const renderer = new ProgressRenderer({ isInteractive: false, write: output.write });
      assert.strictEqual(renderer.finish(1.234), 'Analysis complete in 1.23s');
    });

    it('should overwrite the spinner line when interactive', () => {
      const renderer = new ProgressRenderer({ isInteractive: true, write: output.write });
      assert.strictEqual(renderer.finish(0.5), `\r${'Analysis complete in 0.50s'.padEnd(80, ' ')}`);
    });
  });
});
