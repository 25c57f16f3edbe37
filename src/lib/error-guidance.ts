/**
 * Pattern matching for turning raw errors into operator guidance
 */

import type { ErrorGuidance } from '@/types';
import { extractErrorCode, extractErrorMessage } from './error-utils';

/**
 * Pattern definition for matching errors and generating guidance
 */
export interface ErrorPattern {
  /** Test if this pattern matches the given error */
  match: (error: unknown) => boolean;
  /** Generate guidance for a matched error */
  guidance: (error: unknown) => ErrorGuidance;
}

/**
 * Reads an HTTP status code attached to an error, as dockerode does via
 * `statusCode`.
 */
export function extractStatusCode(error: unknown): number | undefined {
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Create error guidance builder with pattern matching. Patterns are tried in
 * order; the first match wins.
 *
 * @example
 * ```typescript
 * const extractGuidance = createErrorGuidanceBuilder([
 *   statusCodePattern(409, {
 *     message: 'Name already in use',
 *     resolution: 'Remove the existing resource',
 *   }),
 * ]);
 * const guidance = extractGuidance(error);
 * ```
 */
export function createErrorGuidanceBuilder(
  patterns: ErrorPattern[],
  defaultGuidance?: (error: unknown) => ErrorGuidance,
) {
  return function extractGuidance(error: unknown): ErrorGuidance {
    for (const pattern of patterns) {
      if (pattern.match(error)) {
        return pattern.guidance(error);
      }
    }

    if (defaultGuidance) {
      return defaultGuidance(error);
    }

    return {
      message: extractErrorMessage(error),
      hint: 'An unexpected error occurred',
      resolution: 'Check the error message and logs for more details',
    };
  };
}

/**
 * Matches error message substrings (case-insensitive)
 */
export function messagePattern(
  substring: string,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return customPattern((error: unknown) => {
    const message = extractErrorMessage(error).toLowerCase();
    return message.includes(substring.toLowerCase());
  }, guidance);
}

/**
 * Matches a Node system error code such as ECONNREFUSED
 */
export function codePattern(
  code: string,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return customPattern((error: unknown) => extractErrorCode(error) === code, guidance);
}

/**
 * Matches an HTTP status code returned by the daemon
 */
export function statusCodePattern(
  statusCode: number,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return customPattern((error: unknown) => extractStatusCode(error) === statusCode, guidance);
}

/**
 * Create pattern with custom match function
 */
export function customPattern(
  matchFn: (error: unknown) => boolean,
  guidance: ErrorGuidance | ((error: unknown) => ErrorGuidance),
): ErrorPattern {
  return {
    match: matchFn,
    guidance: typeof guidance === 'function' ? guidance : () => guidance,
  };
}
