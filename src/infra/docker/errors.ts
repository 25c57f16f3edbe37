/**
 * Docker error handling built on dockerode's error structure
 */

import type { ErrorGuidance } from '@/types';
import {
  codePattern,
  createErrorGuidanceBuilder,
  customPattern,
  extractStatusCode,
  messagePattern,
  statusCodePattern,
  type ErrorPattern,
} from '@/lib/error-guidance';
import { extractErrorMessage } from '@/lib/error-utils';

/**
 * Fields dockerode attaches to errors coming back from the daemon
 */
interface DockerodeErrorFields {
  statusCode?: number;
  json?: unknown;
  reason?: string;
  code?: string;
}

function readErrorFields(error: unknown): DockerodeErrorFields {
  if (!(error instanceof Error)) return {};
  const fields: DockerodeErrorFields = {};
  const statusCode = extractStatusCode(error);
  if (statusCode !== undefined) fields.statusCode = statusCode;
  if ('json' in error && error.json !== null && error.json !== undefined) fields.json = error.json;
  if ('reason' in error && typeof error.reason === 'string') fields.reason = error.reason;
  if ('code' in error && typeof error.code === 'string') fields.code = error.code;
  return fields;
}

/**
 * The daemon's own message lives in `json.message`; fall back to the error text.
 */
export function extractDaemonMessage(error: unknown): string {
  const { json, reason } = readErrorFields(error);
  if (json && typeof json === 'object' && 'message' in json && typeof json.message === 'string') {
    if (json.message.length > 0) return json.message;
  }
  const message = extractErrorMessage(error);
  return message || reason || 'Docker operation failed';
}

function buildDetails(error: unknown): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  const fields = readErrorFields(error);
  if (fields.statusCode !== undefined) details.statusCode = fields.statusCode;
  if (fields.json !== undefined) details.json = fields.json;
  if (fields.reason !== undefined) details.reason = fields.reason;
  if (fields.code !== undefined) details.code = fields.code;
  return details;
}

/**
 * Patterns in order of specificity. Daemon text patterns come before the
 * generic status codes because the daemon reuses 500 and 409 for many causes.
 */
const dockerErrorPatterns: ErrorPattern[] = [
  codePattern('ECONNREFUSED', (error) => ({
    message: 'Docker daemon is not available',
    hint: 'Connection to Docker daemon was refused',
    resolution:
      'Ensure Docker is running: `docker info` should succeed. Check the daemon logs if the service is up.',
    details: buildDetails(error),
  })),

  codePattern('EACCES', (error) => ({
    message: 'Permission denied on the Docker socket',
    hint: 'Your user cannot open the Docker daemon socket',
    resolution:
      'Add your user to the docker group (`sudo usermod -aG docker $USER`) and log in again, or run with sufficient privileges.',
    details: buildDetails(error),
  })),

  messagePattern('connect ENOENT', (error) => ({
    message: 'Docker daemon is not running',
    hint: 'Cannot connect to Docker socket',
    resolution:
      'Start Docker daemon: `sudo systemctl start docker` (Linux) or start Docker Desktop (Mac/Windows).',
    details: buildDetails(error),
  })),

  messagePattern('port is already allocated', (error) => ({
    message: extractDaemonMessage(error),
    hint: 'Another process or container already publishes this host port',
    resolution: 'Free the port (stop the process or container using it) and run the setup again.',
    details: buildDetails(error),
  })),

  messagePattern('has active endpoints', (error) => ({
    message: extractDaemonMessage(error),
    hint: 'Containers are still attached to the network',
    resolution: 'Stop or disconnect the attached containers before removing the network.',
    details: buildDetails(error),
  })),

  customPattern(
    (error: unknown) =>
      /dockerfile parse error|unknown instruction|dockerfile must begin with|no build stage/i.test(
        extractErrorMessage(error),
      ),
    (error: unknown) => ({
      message: extractErrorMessage(error),
      hint: 'Dockerfile structure is invalid',
      resolution: 'Ensure the Dockerfile starts with a FROM instruction and follows proper syntax.',
    }),
  ),

  customPattern(
    (error: unknown) =>
      /cannot locate specified dockerfile|no such file.*dockerfile|ENOENT.*dockerfile/i.test(
        extractErrorMessage(error),
      ),
    (error: unknown) => ({
      message: extractErrorMessage(error),
      hint: 'Dockerfile not found in the build context',
      resolution: 'Verify the Dockerfile path is correct and the file exists in the build context.',
    }),
  ),

  statusCodePattern(409, (error) => ({
    message: extractDaemonMessage(error),
    hint: 'A resource with this name already exists',
    resolution: 'Remove or rename the conflicting resource and run the setup again.',
    details: buildDetails(error),
  })),

  statusCodePattern(404, (error) => ({
    message: extractDaemonMessage(error),
    hint: 'The requested image, container or network does not exist',
    resolution: 'Verify the name is correct. Use `docker images`, `docker ps -a` or `docker network ls`.',
    details: buildDetails(error),
  })),

  customPattern(
    (error: unknown) => {
      const statusCode = extractStatusCode(error);
      return statusCode !== undefined && statusCode >= 500 && statusCode <= 599;
    },
    (error: unknown) => ({
      message: extractDaemonMessage(error),
      hint: `Docker daemon returned HTTP ${extractStatusCode(error)}`,
      resolution: 'Check the Docker daemon logs for details and run the setup again.',
      details: buildDetails(error),
    }),
  ),
];

function defaultDockerGuidance(error: unknown): ErrorGuidance {
  return {
    message: extractDaemonMessage(error),
    hint: 'An error occurred during the Docker operation',
    resolution: 'Check Docker daemon logs and ensure Docker is functioning correctly.',
    details: buildDetails(error),
  };
}

const extractGuidance = createErrorGuidanceBuilder(dockerErrorPatterns, defaultDockerGuidance);

/**
 * Extract an error with actionable guidance for operators
 */
export function extractDockerErrorGuidance(error: unknown): ErrorGuidance {
  return extractGuidance(error);
}

/** True when the daemon answered 404 for the requested object */
export function isNotFound(error: unknown): boolean {
  return extractStatusCode(error) === 404;
}
