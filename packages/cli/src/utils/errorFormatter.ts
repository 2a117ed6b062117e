/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { BridgeError } from '@polybridge/core';

export function formatError(title: string, nextSteps?: string[]): string {
  const lines = [`✗ ${title}`];
  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines.join('\n');
}

/**
 * Print a standardized error message and exit with status 1.
 *
 * @example
 * exitWithError('Hierarchy file not found', ['Run: polybridge check path/to/hierarchy.yaml']);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(formatError(title, nextSteps));
  process.exit(1);
}

/**
 * Report a BridgeError through exitWithError; anything else is rethrown.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof BridgeError) {
    exitWithError(err.message, err.suggestion ? [err.suggestion] : undefined);
  }
  throw err;
}
