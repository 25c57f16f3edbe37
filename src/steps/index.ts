export { checkPreconditions, type PreconditionReport } from './check-preconditions';
export { reconcileNetwork } from './reconcile-network';
export { reconcileContainers, type ReconcileContainersOptions } from './reconcile-containers';
export { buildJenkinsImage } from './build-image';
export { launchDind } from './launch-dind';
export { launchJenkins } from './launch-jenkins';
export type { SetupReporter, StepContext } from './types';
