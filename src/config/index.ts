/**
 * Process-wide configuration read once from the environment.
 */
import { autoDetectDockerSocket, defaultDockerCertPath } from '@/infra/docker/socket-validation';
import { parseIntEnv, parseStringEnv } from './env-utils';

export * from './constants';

export const config = {
  logLevel: parseStringEnv('LOG_LEVEL', 'warn'),

  docker: {
    socketPath: parseStringEnv('DOCKER_SOCKET', autoDetectDockerSocket()),
    /** Request timeout in ms; 0 leaves daemon calls unbounded */
    timeout: parseIntEnv('DOCKER_TIMEOUT', 0),
    /** Client certificates for https:// endpoints */
    certPath: parseStringEnv('DOCKER_CERT_PATH', defaultDockerCertPath()),
  },
} as const;
