/**
 * Docker daemon endpoint detection and validation
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { extractErrorMessage } from '@/lib/error-utils';
import { Failure, Success, propagateFailure, type Result } from '@/types';

/**
 * Where the daemon listens
 */
export type DockerEndpoint =
  | { kind: 'socket'; socketPath: string }
  | { kind: 'tcp'; host: string; port: number; protocol: 'http' | 'https' };

/**
 * Result of Docker socket validation
 */
export interface SocketValidationResult {
  /** The validated Docker socket path (empty string if invalid) */
  dockerSocket: string;
  /** Warning messages encountered during validation */
  warnings: string[];
}

/**
 * Client certificate material for an `https://` daemon endpoint
 */
export interface DockerTlsFiles {
  ca: string;
  cert: string;
  key: string;
}

/**
 * Endpoint plus the TLS material it needs, ready for the client
 */
export interface DockerConnection {
  socketPath: string;
  tls?: DockerTlsFiles;
}

const TLS_FILES = { ca: 'ca.pem', cert: 'cert.pem', key: 'key.pem' } as const;

const WINDOWS_PIPE = 'npipe://./pipe/docker_engine';

/**
 * Colima socket paths in order of preference.
 */
function getColimaSockets(): string[] {
  const homeDir = homedir();
  return [
    join(homeDir, '.colima/default/docker.sock'),
    join(homeDir, '.colima/docker/docker.sock'),
    join(homeDir, '.lima/colima/sock/docker.sock'),
  ];
}

function findAvailableDockerSocket(socketPaths: string[]): string | null {
  for (const socketPath of socketPaths) {
    try {
      if (existsSync(socketPath) && statSync(socketPath).isSocket()) {
        return socketPath;
      }
    } catch {
      // unreadable path, try the next one
    }
  }
  return null;
}

/**
 * Auto-detect the Docker socket path, with Colima support.
 */
export function autoDetectDockerSocket(): string {
  if (process.platform === 'win32') {
    return WINDOWS_PIPE;
  }

  const available = findAvailableDockerSocket(['/var/run/docker.sock', ...getColimaSockets()]);
  return available || '/var/run/docker.sock';
}

/**
 * Directory the Docker CLI reads client certificates from when
 * DOCKER_CERT_PATH is unset
 */
export function defaultDockerCertPath(): string {
  return join(homedir(), '.docker');
}

function readTlsFile(certPath: string, fileName: string): Result<string> {
  const filePath = join(certPath, fileName);
  try {
    return Success(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    return Failure(`Cannot read Docker TLS file: ${filePath}`, {
      message: `Cannot read Docker TLS file: ${filePath}`,
      hint: extractErrorMessage(error),
      resolution:
        'Point DOCKER_CERT_PATH or --docker-cert-path at a directory holding ca.pem, cert.pem and key.pem.',
      details: { certPath, file: fileName },
    });
  }
}

/**
 * Read `ca.pem`, `cert.pem` and `key.pem` from a certificate directory.
 */
export function loadDockerTlsFiles(certPath: string): Result<DockerTlsFiles> {
  const ca = readTlsFile(certPath, TLS_FILES.ca);
  if (!ca.ok) return propagateFailure(ca);
  const cert = readTlsFile(certPath, TLS_FILES.cert);
  if (!cert.ok) return propagateFailure(cert);
  const key = readTlsFile(certPath, TLS_FILES.key);
  if (!key.ok) return propagateFailure(key);

  return Success({ ca: ca.value, cert: cert.value, key: key.value });
}

/**
 * Attach client certificates to an `https://` endpoint; other endpoints pass
 * through unchanged.
 */
export function resolveDockerConnection(target: string, certPath: string): Result<DockerConnection> {
  const endpoint = parseDockerEndpoint(target);
  if (endpoint.kind !== 'tcp' || endpoint.protocol !== 'https') {
    return Success({ socketPath: target });
  }

  const tls = loadDockerTlsFiles(certPath);
  if (!tls.ok) {
    return propagateFailure(tls);
  }
  return Success({ socketPath: target, tls: tls.value });
}

/**
 * Turn a socket path or `tcp://` / `unix://` URL into an endpoint description.
 */
export function parseDockerEndpoint(value: string): DockerEndpoint {
  if (value.startsWith('unix://')) {
    return { kind: 'socket', socketPath: value.slice('unix://'.length) };
  }

  if (/^(tcp|http|https):\/\//.test(value)) {
    const url = new URL(value.replace(/^tcp:/, 'http:'));
    const protocol = url.protocol === 'https:' ? 'https' : 'http';
    const defaultPort = protocol === 'https' ? 2376 : 2375;
    return {
      kind: 'tcp',
      host: url.hostname,
      port: url.port ? Number(url.port) : defaultPort,
      protocol,
    };
  }

  if (value.startsWith('npipe://')) {
    return { kind: 'socket', socketPath: value.replace(/^npipe:\/\//, '').replace(/\//g, '\\') };
  }

  return { kind: 'socket', socketPath: value };
}

/**
 * Validate the Docker socket path and collect warnings if it is unusable.
 *
 * Priority: explicit option, then DOCKER_SOCKET, then auto-detection.
 */
export function validateDockerSocket(options: { dockerSocket?: string }): SocketValidationResult {
  const warnings: string[] = [];
  const dockerSocket = options.dockerSocket || process.env.DOCKER_SOCKET || autoDetectDockerSocket();

  const endpoint = parseDockerEndpoint(dockerSocket);
  // Named pipes cannot be stat()'d and TCP endpoints are checked by the ping
  if (endpoint.kind === 'tcp' || dockerSocket.includes('pipe')) {
    return { dockerSocket, warnings };
  }

  const unusable = (reason: string): SocketValidationResult => ({
    dockerSocket: '',
    warnings: [
      reason,
      'No valid Docker socket found',
      'Consider: 1) Starting Docker Desktop or the docker service, 2) Specifying --docker-socket <path>',
    ],
  });

  try {
    if (!statSync(endpoint.socketPath).isSocket()) {
      return unusable(`${endpoint.socketPath} exists but is not a socket`);
    }
  } catch (error) {
    return unusable(
      `Cannot access Docker socket: ${endpoint.socketPath} - ${extractErrorMessage(error)}`,
    );
  }

  return { dockerSocket, warnings };
}
