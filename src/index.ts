/**
 * Programmatic API for provisioning a local Jenkins server with a
 * Docker-in-Docker daemon.
 */

/** @public */
export { runSetup, type SetupDependencies, type RunOptions } from './app/orchestrator';
/** @public */
export { runCli, createDefaultRuntime, type CliRuntime } from './cli/run';
/** @public */
export {
  createSetupPlan,
  dindContainerSpec,
  jenkinsContainerSpec,
  managedContainers,
  requiredPorts,
} from './config/plan';
/** @public */
export {
  createDockerClient,
  createBaseDockerClient,
  type DockerClient,
  type DockerClientConfig,
  type DockerBuildOptions,
  type DockerBuildResult,
} from './infra/docker/client';
/** @public */
export { createHostProbe, type HostProbe } from './infra/host';
/** @public */
export {
  createPolicyConfirmer,
  createPromptConfirmer,
  type Confirmer,
  type ConfirmationPolicy,
  type PromptKind,
} from './lib/confirm';
/** @public */
export { createLogger } from './lib/logger';
/** @public */
export type { SetupReporter, StepContext } from './steps';
/** @public */
export * from './types';
