/**
 * Setup Orchestrator
 *
 * Drives the setup state machine:
 * INIT → CHECKED → NETWORK_READY → CONTAINERS_CLEAR → IMAGE_BUILT →
 * DIND_RUNNING → JENKINS_RUNNING → DONE, with any failure landing in ABORTED.
 *
 * Steps run strictly one after another and none is retried. Resources created
 * before an abort are left in place for the operator to inspect.
 */

import type { Logger } from 'pino';
import type { DockerClient } from '@/infra/docker/client';
import type { HostProbe } from '@/infra/host';
import type { Confirmer } from '@/lib/confirm';
import type { Result, SetupPlan, SetupReport, SetupStage } from '@/types';
import {
  buildJenkinsImage,
  checkPreconditions,
  launchDind,
  launchJenkins,
  reconcileContainers,
  reconcileNetwork,
  type SetupReporter,
  type StepContext,
} from '@/steps';

export interface SetupDependencies {
  plan: SetupPlan;
  docker: DockerClient;
  host: HostProbe;
  confirm: Confirmer;
  reporter: SetupReporter;
  logger: Logger;
}

export interface RunOptions {
  /** Stop after the precondition check */
  checkOnly?: boolean;
}

type StepRunner<T> = (ctx: StepContext) => Promise<Result<T>>;

/**
 * Run the setup procedure and report where it ended.
 */
export async function runSetup(
  deps: SetupDependencies,
  options: RunOptions = {},
): Promise<SetupReport> {
  const { logger } = deps;
  const report: SetupReport = {
    stage: 'INIT',
    exitCode: 0,
    removedContainers: [],
    containers: {},
  };

  /**
   * Run one step; on success move the report to `next`, on failure mark it
   * ABORTED and keep the stage it failed from.
   */
  async function advance<T>(
    step: string,
    next: SetupStage,
    run: StepRunner<T>,
  ): Promise<Result<T>> {
    const stepLogger = logger.child({ step });
    stepLogger.debug({ from: report.stage }, 'Step started');

    const result = await run({ ...deps, logger: stepLogger });

    if (result.ok) {
      stepLogger.debug({ to: next }, 'Step completed');
      report.stage = next;
      return result;
    }

    stepLogger.error(
      { error: result.error, hint: result.guidance?.hint, stage: report.stage },
      'Setup aborted',
    );
    report.failedAt = report.stage;
    report.stage = 'ABORTED';
    report.exitCode = 1;
    report.error = result.error;
    if (result.guidance) {
      report.guidance = result.guidance;
    }
    return result;
  }

  const checked = await advance('check-preconditions', 'CHECKED', checkPreconditions);
  if (!checked.ok) return report;
  if (checked.value.daemonVersion) {
    report.daemonVersion = checked.value.daemonVersion;
  }
  if (options.checkOnly) return report;
  const { approvedRemovals } = checked.value;

  const network = await advance('reconcile-network', 'NETWORK_READY', reconcileNetwork);
  if (!network.ok) return report;
  report.network = network.value;

  const cleared = await advance('reconcile-containers', 'CONTAINERS_CLEAR', (ctx) =>
    reconcileContainers(ctx, {
      approved: approvedRemovals,
      onRemoved: (name) => report.removedContainers.push(name),
    }),
  );
  if (!cleared.ok) return report;

  const built = await advance('build-image', 'IMAGE_BUILT', buildJenkinsImage);
  if (!built.ok) return report;
  if (built.value.imageId) {
    report.imageId = built.value.imageId;
  }

  const dind = await advance('launch-dind', 'DIND_RUNNING', launchDind);
  if (!dind.ok) return report;
  report.containers[deps.plan.dind.container] = dind.value;

  const jenkins = await advance('launch-jenkins', 'JENKINS_RUNNING', launchJenkins);
  if (!jenkins.ok) return report;
  report.containers[deps.plan.jenkins.container] = jenkins.value;

  report.stage = 'DONE';
  logger.info({ containers: report.containers, network: report.network }, 'Setup complete');
  return report;
}
