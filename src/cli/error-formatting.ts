/**
 * Formatting of failures for the terminal
 */

import type { ErrorGuidance } from '@/types';

/**
 * Lines describing a failure: the message, then hint and resolution when the
 * guidance adds something beyond the message.
 */
export function formatFailure(error: string, guidance?: ErrorGuidance): string[] {
  const lines = [`Error: ${error}`];

  if (guidance?.hint && guidance.hint !== error) {
    lines.push(`  Hint: ${guidance.hint}`);
  }
  if (guidance?.resolution) {
    lines.push(`  Resolution: ${guidance.resolution}`);
  }

  return lines;
}

/**
 * Lines for CLI option validation errors
 */
export function formatOptionErrors(errors: string[]): string[] {
  return ['Configuration errors:', ...errors.map((error) => `  • ${error}`), '', 'Use --help for usage information'];
}
