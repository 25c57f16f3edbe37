/**
 * CLI Options Validation Module
 * Validates parsed commander options and derives the prompt policies
 */

import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_DOCKERFILE, VALID_LOG_LEVELS } from '@/config/constants';
import type { ConfirmationPolicy, PromptKind } from '@/lib/confirm';
import { extractErrorMessage } from '@/lib/error-utils';

/**
 * Validation result containing the typed options or the error messages
 */
export type ValidationResult =
  | { valid: true; options: CLIOptions; errors: [] }
  | { valid: false; errors: string[] };

export const cliOptionsSchema = z.object({
  yes: z.boolean().default(false),
  recreateNetwork: z.boolean().default(false),
  replaceContainers: z.boolean().default(false),
  nonInteractive: z.boolean().default(false),
  check: z.boolean().default(false),
  context: z.string().min(1, 'Build context path must not be empty'),
  dockerfile: z.string().min(1, 'Dockerfile path must not be empty').default(DEFAULT_DOCKERFILE),
  dockerSocket: z.string().optional(),
  dockerCertPath: z.string().optional(),
  logLevel: z.enum(VALID_LOG_LEVELS, {
    errorMap: (_issue, ctx) => ({
      message: `Invalid log level: ${String(ctx.data)}. Valid options: ${VALID_LOG_LEVELS.join(', ')}`,
    }),
  }),
});

export type CLIOptions = z.infer<typeof cliOptionsSchema>;

/**
 * Validates the build context directory exists and is accessible
 */
function validateContext(context: string): string[] {
  try {
    if (!statSync(context).isDirectory()) {
      return [`Build context is not a directory: ${context}`];
    }
    return [];
  } catch (error) {
    const errorMsg = extractErrorMessage(error);
    if (errorMsg.includes('ENOENT')) {
      return [`Build context directory does not exist: ${context}`];
    }
    if (errorMsg.includes('EACCES')) {
      return [`Permission denied accessing build context: ${context}`];
    }
    return [`Cannot access build context directory: ${context} (${errorMsg})`];
  }
}

/**
 * Validates raw CLI options
 *
 * @param raw - Options object as produced by commander
 */
export function validateOptions(raw: Record<string, unknown>): ValidationResult {
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    return { valid: false, errors: parsed.error.issues.map((issue) => issue.message) };
  }

  const options: CLIOptions = { ...parsed.data, context: resolve(parsed.data.context) };
  const errors = validateContext(options.context);
  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, options, errors: [] };
}

/**
 * Map flags onto a policy per prompt: a forcing flag answers yes,
 * --non-interactive answers the default (no), otherwise the operator is asked.
 */
export function resolvePromptPolicies(
  options: Pick<CLIOptions, 'yes' | 'recreateNetwork' | 'replaceContainers' | 'nonInteractive'>,
): Record<PromptKind, ConfirmationPolicy> {
  const policyFor = (forced: boolean): ConfirmationPolicy => {
    if (options.yes || forced) return 'yes';
    return options.nonInteractive ? 'no' : 'prompt';
  };

  return {
    network: policyFor(options.recreateNetwork),
    container: policyFor(options.replaceContainers),
  };
}
