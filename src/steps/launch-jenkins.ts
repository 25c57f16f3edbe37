/**
 * Starts the Jenkins controller wired to the DinD daemon over TLS.
 */

import { jenkinsContainerSpec } from '@/config/plan';
import { Failure, Success, type Result } from '@/types';
import type { StepContext } from './types';

export async function launchJenkins(ctx: StepContext): Promise<Result<string>> {
  const { docker, reporter, plan } = ctx;
  const spec = jenkinsContainerSpec(plan);

  reporter.info(`Starting Jenkins container ('${spec.name}')...`);
  const started = await docker.runContainer(spec);
  if (!started.ok) {
    const message = 'Failed to start Jenkins container. Please check the Docker run commands and try again.';
    return Failure(message, {
      message,
      hint: started.guidance?.hint ?? started.error,
      resolution: started.guidance?.resolution ?? 'Check the Docker daemon logs for details.',
      details: { cause: started.error },
    });
  }

  reporter.info(`Jenkins container '${spec.name}' started successfully.`);
  return Success(started.value);
}
