/**
 * Starts the Docker-in-Docker daemon container on the setup network.
 */

import { dindContainerSpec } from '@/config/plan';
import { Failure, Success, type Result } from '@/types';
import type { StepContext } from './types';

function startFailure(ctx: StepContext, cause: string, hint?: string): Result<string> {
  const message = `Failed to start Docker (DinD) container. Ensure Docker image '${ctx.plan.dind.image}' is available and Docker daemon supports this.`;
  return Failure(message, {
    message,
    hint: hint ?? cause,
    resolution: 'Privileged containers must be allowed by the daemon; check its logs for details.',
    details: { cause },
  });
}

/**
 * Pulls the DinD image when it is not present locally, then runs it.
 * @returns id of the started container
 */
export async function launchDind(ctx: StepContext): Promise<Result<string>> {
  const { docker, reporter, plan } = ctx;
  const spec = dindContainerSpec(plan);

  const present = await docker.imageExists(spec.image);
  if (!present.ok) {
    return startFailure(ctx, present.error, present.guidance?.hint);
  }
  if (!present.value) {
    reporter.info(`Pulling image '${spec.image}'...`);
    const pulled = await docker.pullImage(spec.image);
    if (!pulled.ok) {
      return startFailure(ctx, pulled.error, pulled.guidance?.hint);
    }
  }

  reporter.info(`Starting Docker daemon container ('${spec.name}')...`);
  const started = await docker.runContainer(spec);
  if (!started.ok) {
    return startFailure(ctx, started.error, started.guidance?.hint);
  }

  reporter.info(`Docker DinD container '${spec.name}' is running.`);
  return Success(started.value);
}
