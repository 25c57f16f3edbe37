/**
 * Docker client for the setup procedure: networks, containers, images.
 *
 * Wraps dockerode so every call resolves to a Result and no daemon error
 * escapes as an exception.
 */

import Docker, { type ContainerCreateOptions, type DockerOptions } from 'dockerode';
import tar from 'tar-fs';
import type { Logger } from 'pino';
import { Success, Failure, type Result, type ContainerRunSpec, type ContainerState } from '@/types';
import { extractDockerErrorGuidance, isNotFound } from './errors';
import { autoDetectDockerSocket, parseDockerEndpoint, type DockerTlsFiles } from './socket-validation';

/**
 * Docker client configuration options.
 */
export interface DockerClientConfig {
  /** Socket path or `tcp://host:port` URL (defaults to auto-detection) */
  socketPath?: string;
  /** Request timeout in milliseconds; unset or 0 means no timeout */
  timeout?: number;
  /** Client certificates, used for `https://` endpoints */
  tls?: DockerTlsFiles;
}

/**
 * Options for building a Docker image.
 */
export interface DockerBuildOptions {
  /** Build context directory */
  context: string;
  /** Path to Dockerfile relative to context */
  dockerfile?: string;
  /** Tag for the built image */
  tag: string;
  /** Receives build output line by line */
  onOutput?: (line: string) => void;
}

/**
 * Result of a Docker image build operation.
 */
export interface DockerBuildResult {
  /** Image ID reported by the daemon, empty if none was reported */
  imageId: string;
  /** Build output */
  logs: string[];
}

/**
 * Docker client interface for the operations the setup needs.
 */
export interface DockerClient {
  /** Lightweight reachability check against the daemon */
  ping: () => Promise<Result<void>>;

  /** Daemon version string */
  version: () => Promise<Result<string>>;

  /** Whether a network with this name or id exists */
  networkExists: (name: string) => Promise<Result<boolean>>;

  /**
   * Creates a bridge network.
   * @returns the new network id
   */
  createNetwork: (name: string) => Promise<Result<string>>;

  removeNetwork: (name: string) => Promise<Result<void>>;

  /** Presence of a container by exact name, `absent` when the daemon has none */
  inspectContainer: (name: string) => Promise<Result<ContainerState>>;

  /**
   * Removes a container.
   * @param force - Stop it first if it is running
   */
  removeContainer: (name: string, force?: boolean) => Promise<Result<void>>;

  /** Whether an image reference is present locally */
  imageExists: (reference: string) => Promise<Result<boolean>>;

  /** Pulls an image and waits for the pull to finish */
  pullImage: (reference: string) => Promise<Result<void>>;

  /** Builds and tags an image from a local context */
  buildImage: (options: DockerBuildOptions) => Promise<Result<DockerBuildResult>>;

  /**
   * Creates and starts a detached container.
   * @returns the container id
   */
  runContainer: (spec: ContainerRunSpec) => Promise<Result<string>>;
}

interface DockerProgressEvent {
  stream?: string;
  status?: string;
  aux?: { ID?: string };
  error?: string;
  errorDetail?: { message?: string };
}

/**
 * Read host ports out of `NetworkSettings.Ports` ("8080/tcp" → [{ HostPort }]).
 */
function readPublishedPorts(ports: Docker.PortMap | undefined): number[] {
  const published = new Set<number>();
  for (const bindings of Object.values(ports ?? {})) {
    for (const binding of bindings ?? []) {
      const port = Number(binding.HostPort);
      if (Number.isInteger(port) && port > 0) {
        published.add(port);
      }
    }
  }
  return [...published].sort((a, b) => a - b);
}

/**
 * Translate a run spec into the Engine API create payload.
 */
export function toCreateOptions(spec: ContainerRunSpec): ContainerCreateOptions {
  const exposedPorts: Record<string, object> = {};
  const portBindings: Record<string, Array<{ HostPort: string }>> = {};
  for (const port of spec.ports) {
    const key = `${port.container}/tcp`;
    exposedPorts[key] = {};
    portBindings[key] = [{ HostPort: String(port.host) }];
  }

  const options: ContainerCreateOptions = {
    name: spec.name,
    Image: spec.image,
    Env: Object.entries(spec.env).map(([key, value]) => `${key}=${value}`),
    ExposedPorts: exposedPorts,
    HostConfig: {
      NetworkMode: spec.network,
      Privileged: spec.privileged ?? false,
      Binds: spec.volumes.map(
        (mount) => `${mount.volume}:${mount.target}${mount.readOnly ? ':ro' : ''}`,
      ),
      PortBindings: portBindings,
      RestartPolicy: { Name: spec.restartPolicy ?? 'no' },
    },
    NetworkingConfig: {
      EndpointsConfig: {
        [spec.network]: spec.networkAliases ? { Aliases: spec.networkAliases } : {},
      },
    },
  };

  return options;
}

/**
 * Create the client over an existing dockerode instance
 */
export function createBaseDockerClient(docker: Docker, logger: Logger): DockerClient {
  const fail = <T>(
    operation: string,
    error: unknown,
    context: Record<string, unknown>,
  ): Result<T> => {
    const guidance = extractDockerErrorGuidance(error);
    const errorMessage = `Failed to ${operation}: ${guidance.message}`;

    logger.error(
      {
        ...context,
        error: errorMessage,
        hint: guidance.hint,
        resolution: guidance.resolution,
        errorDetails: guidance.details,
      },
      `Docker ${operation} failed`,
    );

    return Failure(errorMessage, guidance);
  };

  const followProgress = (
    stream: NodeJS.ReadableStream,
    onEvent: (event: DockerProgressEvent) => void,
  ): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      let streamError: Error | null = null;

      docker.modem.followProgress(
        stream,
        (err: Error | null) => {
          if (err) {
            reject(err);
          } else if (streamError) {
            reject(streamError);
          } else {
            resolve();
          }
        },
        (event: DockerProgressEvent) => {
          if ((event.error || event.errorDetail) && !streamError) {
            logger.error({ errorEvent: event }, 'Docker error event received');
            // Keep the first error; later events usually repeat it
            streamError = new Error(event.error || event.errorDetail?.message || 'Step failed');
          }
          onEvent(event);
        },
      );
    });

  return {
    async ping(): Promise<Result<void>> {
      try {
        await docker.ping();
        logger.debug('Docker daemon answered ping');
        return Success(undefined);
      } catch (error) {
        return fail('reach Docker daemon', error, {});
      }
    },

    async version(): Promise<Result<string>> {
      try {
        const info = await docker.version();
        return Success(info.Version);
      } catch (error) {
        return fail('read Docker version', error, {});
      }
    },

    async networkExists(name: string): Promise<Result<boolean>> {
      try {
        await docker.getNetwork(name).inspect();
        return Success(true);
      } catch (error) {
        if (isNotFound(error)) {
          return Success(false);
        }
        return fail('inspect network', error, { network: name });
      }
    },

    async createNetwork(name: string): Promise<Result<string>> {
      try {
        const network = await docker.createNetwork({
          Name: name,
          Driver: 'bridge',
          CheckDuplicate: true,
        });
        logger.info({ network: name, id: network.id }, 'Network created');
        return Success(network.id);
      } catch (error) {
        return fail('create network', error, { network: name });
      }
    },

    async removeNetwork(name: string): Promise<Result<void>> {
      try {
        await docker.getNetwork(name).remove();
        logger.info({ network: name }, 'Network removed');
        return Success(undefined);
      } catch (error) {
        return fail('remove network', error, { network: name });
      }
    },

    async inspectContainer(name: string): Promise<Result<ContainerState>> {
      try {
        const info = await docker.getContainer(name).inspect();
        const running = info.State?.Running === true;
        return Success({
          name,
          presence: running ? 'running' : 'stopped',
          publishedPorts: running ? readPublishedPorts(info.NetworkSettings?.Ports) : [],
        });
      } catch (error) {
        if (isNotFound(error)) {
          return Success({ name, presence: 'absent', publishedPorts: [] });
        }
        return fail('inspect container', error, { container: name });
      }
    },

    async removeContainer(name: string, force = false): Promise<Result<void>> {
      try {
        logger.debug({ container: name, force }, 'Removing container');
        await docker.getContainer(name).remove({ force });
        logger.info({ container: name }, 'Container removed');
        return Success(undefined);
      } catch (error) {
        return fail('remove container', error, { container: name, force });
      }
    },

    async imageExists(reference: string): Promise<Result<boolean>> {
      try {
        await docker.getImage(reference).inspect();
        return Success(true);
      } catch (error) {
        if (isNotFound(error)) {
          return Success(false);
        }
        return fail('inspect image', error, { image: reference });
      }
    },

    async pullImage(reference: string): Promise<Result<void>> {
      try {
        logger.debug({ image: reference }, 'Pulling image');
        const stream = await docker.pull(reference);
        await followProgress(stream, (event) => {
          logger.debug({ image: reference, status: event.status }, 'Pull progress');
        });
        logger.info({ image: reference }, 'Image pulled');
        return Success(undefined);
      } catch (error) {
        return fail('pull image', error, { image: reference });
      }
    },

    async buildImage(options: DockerBuildOptions): Promise<Result<DockerBuildResult>> {
      const logs: string[] = [];
      let imageId = '';
      const { onOutput, ...buildContext } = options;

      try {
        logger.debug({ options: buildContext }, 'Starting Docker build');

        const stream = await docker.buildImage(tar.pack(options.context), {
          t: options.tag,
          dockerfile: options.dockerfile,
        });

        await followProgress(stream, (event) => {
          if (event.stream) {
            for (const line of event.stream.split('\n')) {
              if (line.trim().length === 0) continue;
              logs.push(line);
              onOutput?.(line);
            }
          }
          if (event.aux?.ID) {
            imageId = event.aux.ID;
          }
        });

        logger.info({ tag: options.tag, imageId }, 'Image built');
        return Success({ imageId, logs });
      } catch (error) {
        return fail('build image', error, { options: buildContext });
      }
    },

    async runContainer(spec: ContainerRunSpec): Promise<Result<string>> {
      try {
        const createOptions = toCreateOptions(spec);
        logger.debug({ createOptions }, 'Creating container');

        const container = await docker.createContainer(createOptions);
        await container.start();

        logger.info({ container: spec.name, id: container.id }, 'Container started');
        return Success(container.id);
      } catch (error) {
        return fail('start container', error, { container: spec.name, image: spec.image });
      }
    },
  };
}

/**
 * Create a Docker client connected to the configured or auto-detected daemon.
 */
export const createDockerClient = (logger: Logger, config: DockerClientConfig = {}): DockerClient => {
  const target = config.socketPath || autoDetectDockerSocket();
  const endpoint = parseDockerEndpoint(target);

  const dockerOptions: DockerOptions =
    endpoint.kind === 'tcp'
      ? { host: endpoint.host, port: endpoint.port, protocol: endpoint.protocol }
      : { socketPath: endpoint.socketPath };

  if (config.timeout && config.timeout > 0) {
    dockerOptions.timeout = config.timeout;
  }
  if (endpoint.kind === 'tcp' && endpoint.protocol === 'https' && config.tls) {
    dockerOptions.ca = config.tls.ca;
    dockerOptions.cert = config.tls.cert;
    dockerOptions.key = config.tls.key;
  }

  logger.debug(
    { endpoint, timeout: dockerOptions.timeout, tls: Boolean(dockerOptions.ca) },
    'Created Docker client',
  );
  return createBaseDockerClient(new Docker(dockerOptions), logger);
};
