/**
 * Core type definitions for the Jenkins DinD setup procedure.
 * Result types shared by every step and infrastructure client.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** What went wrong, in operator terms */
  hint?: string;
  /** Specific resolution steps to fix the issue */
  resolution?: string;
  /** Additional context or details */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling
 *
 * Steps and clients return a Result instead of throwing, so the orchestrator
 * can map every failure to an abort without try/catch at each call site.
 *
 * @example
 * ```typescript
 * const result = await docker.networkExists('jenkins');
 * if (!result.ok) {
 *   console.error(result.error);
 *   if (result.guidance?.resolution) {
 *     console.error('Resolution:', result.guidance.resolution);
 *   }
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/** Failed branch of a Result */
export type FailureResult = Extract<Result<never>, { ok: false }>;

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Error message
 * @param guidance - Optional structured guidance for operators
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  // Copy so the caller's guidance object is never mutated
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};

/**
 * Re-type a failed result so it can be returned from a function with a different
 * success type.
 */
export const propagateFailure = <T>(failure: FailureResult): Result<T> =>
  Failure<T>(failure.error, failure.guidance);
