/**
 * Image build from the local build context. Always rebuilds.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { DockerBuildResult } from '@/infra/docker/client';
import { createTimer } from '@/lib/logger';
import { Failure, Success, type Result } from '@/types';
import type { StepContext } from './types';

const BUILD_FAILED = 'Docker image build failed. Please check the Dockerfile and try again.';

export async function buildJenkinsImage(ctx: StepContext): Promise<Result<DockerBuildResult>> {
  const { docker, reporter, logger, plan } = ctx;
  const { directory, dockerfile } = plan.build;
  const tag = plan.jenkins.image;
  const timer = createTimer(logger, 'build-image', { tag, directory });

  const dockerfilePath = join(directory, dockerfile);
  if (!existsSync(dockerfilePath)) {
    timer.error('Dockerfile missing', { dockerfilePath });
    return Failure(BUILD_FAILED, {
      message: BUILD_FAILED,
      hint: `No Dockerfile found at ${dockerfilePath}`,
      resolution:
        'Run the setup from a directory containing a Dockerfile for Jenkins with Blue Ocean and the Docker CLI, or pass --context.',
      details: { dockerfilePath },
    });
  }

  reporter.info('Building the Jenkins Blue Ocean Docker image (this may take a few minutes)...');
  const built = await docker.buildImage({
    context: directory,
    dockerfile,
    tag,
    onOutput: (line) => reporter.detail(line),
  });

  if (!built.ok) {
    timer.error(built.error);
    return Failure(BUILD_FAILED, {
      message: BUILD_FAILED,
      hint: built.guidance?.hint ?? built.error,
      resolution: built.guidance?.resolution ?? 'Fix the Dockerfile and run the setup again.',
      details: { cause: built.error },
    });
  }

  reporter.info(`Successfully built Docker image '${tag}'.`);
  timer.end({ imageId: built.value.imageId });
  return Success(built.value);
}
