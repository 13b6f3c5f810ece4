/**
 * Error formatting shared by every command
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

/**
 * Lines printed for an error, without the trailing exit.
 */
export function formatError(title: string, nextSteps?: string[]): string[] {
  const lines = [`✗ ${title}`];

  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }

  return lines;
}

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Actionable suggestions
 * @param exitCode - 2 for failures of the tool itself
 *
 * @example
 * exitWithError('Config file not found', [
 *   'Run: unread init'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[], exitCode: number = 2): never {
  for (const line of formatError(title, nextSteps)) {
    console.error(line);
  }

  process.exit(exitCode);
}
