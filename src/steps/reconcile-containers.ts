/**
 * Container name reconciliation. An existing container must be removed with
 * the operator's consent, otherwise the setup cannot continue.
 */

import { managedContainers } from '@/config/plan';
import { Failure, Success, propagateFailure, type Result } from '@/types';
import type { StepContext } from './types';

export interface ReconcileContainersOptions {
  /** Containers the operator already agreed to remove; not asked again */
  approved?: readonly string[];
  /** Called after each successful removal, before the next container is looked at */
  onRemoved?: (name: string) => void;
}

/**
 * @returns names of the containers that were removed
 */
export async function reconcileContainers(
  ctx: StepContext,
  options: ReconcileContainersOptions = {},
): Promise<Result<string[]>> {
  const { docker, reporter, confirm } = ctx;
  const approved = options.approved ?? [];
  const removed: string[] = [];

  for (const name of managedContainers(ctx.plan)) {
    const state = await docker.inspectContainer(name);
    if (!state.ok) {
      return propagateFailure(state);
    }
    if (state.value.presence === 'absent') continue;

    reporter.info(`Container '${name}' already exists.`);
    const remove =
      approved.includes(name) ||
      (await confirm.confirm(`Do you want to remove the existing container '${name}'?`, 'container'));

    if (!remove) {
      return Failure(`Cannot continue with an existing container '${name}'.`, {
        message: `Cannot continue with an existing container '${name}'.`,
        hint: 'A container with the same name already exists and was kept',
        resolution: 'Please remove or rename the container and run the script again.',
        details: { container: name, presence: state.value.presence },
      });
    }

    reporter.info(`Stopping and removing container '${name}'...`);
    const result = await docker.removeContainer(name, true);
    if (!result.ok) {
      return propagateFailure(result);
    }
    reporter.info(`Removed container ${name}.`);
    removed.push(name);
    options.onRemoved?.(name);
  }

  return Success(removed);
}
