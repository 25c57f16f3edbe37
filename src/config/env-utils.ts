/**
 * Environment Variable Parsing Utilities
 *
 * Typed reads of environment variables with consistent default handling.
 */

/**
 * Parse integer from environment variable with default
 *
 * @example
 * parseIntEnv('DOCKER_TIMEOUT', 0) // Returns 0 if DOCKER_TIMEOUT is unset or not a number
 */
export function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse string from environment variable with default
 *
 * @example
 * parseStringEnv('LOG_LEVEL', 'warn') // Returns 'warn' if LOG_LEVEL not set
 */
export function parseStringEnv(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined ? defaultValue : value;
}
