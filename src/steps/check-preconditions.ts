/**
 * Precondition check: Docker CLI on PATH, daemon reachable, required ports free.
 *
 * Runs before anything is mutated; the first failure aborts the setup. A port
 * held by one of our own running containers is only free once the operator
 * agrees to replace that container, so the removal question is asked here.
 */

import { DOCKER_CLI } from '@/config/constants';
import { managedContainers, requiredPorts } from '@/config/plan';
import { createTimer } from '@/lib/logger';
import { Failure, Success, propagateFailure, type Result } from '@/types';
import type { StepContext } from './types';

export interface PreconditionReport {
  /** Resolved path of the docker executable */
  dockerPath: string;
  /** Daemon version, when the daemon reported one */
  daemonVersion?: string;
  /** Required ports currently published by a managed container, by port */
  portOwners: Record<number, string>;
  /** Managed containers the operator already agreed to remove */
  approvedRemovals: string[];
}

/**
 * Map host ports published by running managed containers to their container.
 * Those ports are released when the container is replaced.
 */
async function findManagedPortOwners(ctx: StepContext): Promise<Result<Map<number, string>>> {
  const owners = new Map<number, string>();
  for (const name of managedContainers(ctx.plan)) {
    const state = await ctx.docker.inspectContainer(name);
    if (!state.ok) {
      return propagateFailure(state);
    }
    for (const port of state.value.publishedPorts) {
      owners.set(port, name);
    }
  }
  return Success(owners);
}

export async function checkPreconditions(ctx: StepContext): Promise<Result<PreconditionReport>> {
  const { docker, host, reporter, logger } = ctx;
  const timer = createTimer(logger, 'check-preconditions');

  const dockerPath = host.findExecutable(DOCKER_CLI);
  if (!dockerPath) {
    timer.error('docker executable not found');
    return Failure('Docker is not installed or not available in PATH.', {
      message: 'Docker is not installed or not available in PATH.',
      hint: `The '${DOCKER_CLI}' command was not found on the search path`,
      resolution: 'Please install Docker and try again.',
    });
  }
  logger.debug({ dockerPath }, 'Docker CLI found');

  const ping = await docker.ping();
  if (!ping.ok) {
    timer.error(ping.error);
    return Failure('Docker daemon is not running or is not accessible.', {
      message: 'Docker daemon is not running or is not accessible.',
      hint: ping.guidance?.hint ?? ping.error,
      resolution:
        'Please start the Docker service and ensure your user has permission (e.g., in the docker group).',
      details: { cause: ping.error },
    });
  }
  reporter.info('Docker is installed and the daemon is running.');

  const version = await docker.version();
  if (!version.ok) {
    logger.warn({ error: version.error }, 'Could not read the Docker daemon version');
  }

  const owners = await findManagedPortOwners(ctx);
  if (!owners.ok) {
    timer.error(owners.error);
    return propagateFailure(owners);
  }

  const ports = requiredPorts(ctx.plan);
  const portOwners: Record<number, string> = {};
  const approvedRemovals: string[] = [];
  for (const port of ports) {
    const inUse = await host.isPortInUse(port);
    if (!inUse.ok) {
      timer.error(inUse.error, { port });
      return propagateFailure(inUse);
    }
    if (!inUse.value) continue;

    const owner = owners.value.get(port);
    if (owner === undefined) {
      timer.error('port in use', { port });
      return Failure(`Required port ${port} is already in use on this system.`, {
        message: `Required port ${port} is already in use on this system.`,
        hint: `Another process is listening on port ${port}`,
        resolution: `Please free up port ${port} or change the configuration before proceeding.`,
        details: { port },
      });
    }
    portOwners[port] = owner;
    reporter.info(`Port ${port} is held by existing container '${owner}', which must be replaced.`);
    if (approvedRemovals.includes(owner)) continue;

    const replace = await ctx.confirm.confirm(
      `Do you want to remove the existing container '${owner}'?`,
      'container',
    );
    if (!replace) {
      timer.error('port held by kept container', { port, container: owner });
      return Failure(`Required port ${port} is already in use on this system.`, {
        message: `Required port ${port} is already in use on this system.`,
        hint: `Port ${port} is held by existing container '${owner}', which was kept`,
        resolution: `Please remove the container '${owner}' or free up port ${port} before proceeding.`,
        details: { port, container: owner },
      });
    }
    approvedRemovals.push(owner);
  }

  reporter.info(`Ports ${ports.join(' ')} are free to use.`);
  timer.end({ portOwners, approvedRemovals });
  const report: PreconditionReport = { dockerPath, portOwners, approvedRemovals };
  if (version.ok) {
    report.daemonVersion = version.value;
  }
  return Success(report);
}
