/**
 * Network reconciliation: create the bridge network, or recreate it when the
 * operator agrees.
 */

import { Failure, Success, propagateFailure, type NetworkOutcome, type Result } from '@/types';
import type { StepContext } from './types';

async function createNetwork(ctx: StepContext, outcome: NetworkOutcome): Promise<Result<NetworkOutcome>> {
  const name = ctx.plan.network;
  const created = await ctx.docker.createNetwork(name);
  if (!created.ok) {
    return Failure(`Failed to create Docker network '${name}'.`, {
      message: `Failed to create Docker network '${name}'.`,
      hint: created.guidance?.hint ?? created.error,
      resolution: created.guidance?.resolution ?? 'Check the Docker daemon logs and try again.',
      details: { cause: created.error },
    });
  }
  return Success(outcome);
}

export async function reconcileNetwork(ctx: StepContext): Promise<Result<NetworkOutcome>> {
  const { docker, reporter, confirm, logger } = ctx;
  const name = ctx.plan.network;

  const exists = await docker.networkExists(name);
  if (!exists.ok) {
    return propagateFailure(exists);
  }

  if (!exists.value) {
    reporter.info(`Creating Docker network '${name}'...`);
    return createNetwork(ctx, 'created');
  }

  reporter.info(`Docker network '${name}' already exists.`);
  const recreate = await confirm.confirm(
    `Do you want to delete and recreate the '${name}' network?`,
    'network',
  );

  if (!recreate) {
    reporter.info(`Keeping the existing Docker network '${name}'.`);
    return Success('kept');
  }

  reporter.info(`Removing existing Docker network '${name}'...`);
  const removed = await docker.removeNetwork(name);
  if (!removed.ok) {
    // Not fatal: containers may still be attached; they are replaced next
    logger.warn({ network: name, error: removed.error }, 'Network removal failed, keeping it');
    reporter.warn(`Could not remove network '${name}': ${removed.error}`);
    reporter.info(`Proceeding with the existing network '${name}'.`);
    return Success('kept');
  }

  reporter.info(`Recreating Docker network '${name}'...`);
  return createNetwork(ctx, 'recreated');
}
