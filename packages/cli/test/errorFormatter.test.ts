/**
 * Tests for formatError
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { formatError } from '../src/utils/errorFormatter.js';

describe('formatError', () => {
  it('should print the title alone without next steps', () => {
    assert.deepStrictEqual(formatError('Config file not found'), ['✗ Config file not found']);
    assert.deepStrictEqual(formatError('Config file not found', []), ['✗ Config file not found']);
  });

  it('should list next steps after a blank line', () => {
    assert.deepStrictEqual(formatError('Config file not found', ['Run: unread init', 'Check the --config path']), [
      '✗ Config file not found',
      '',
      '→ Run: unread init',
      '→ Check the --config path',
    ]);
  });
});
