/**
 * Domain types for the Jenkins DinD setup procedure.
 */

import type { ErrorGuidance } from './core';

/**
 * Stages of the setup state machine. A run only moves forward; any failure
 * lands in ABORTED.
 */
export const SETUP_STAGES = [
  'INIT',
  'CHECKED',
  'NETWORK_READY',
  'CONTAINERS_CLEAR',
  'IMAGE_BUILT',
  'DIND_RUNNING',
  'JENKINS_RUNNING',
  'DONE',
] as const;

export type SetupStage = (typeof SETUP_STAGES)[number] | 'ABORTED';

/** Existence state of a named container as reported by the daemon */
export type ContainerPresence = 'absent' | 'stopped' | 'running';

export interface ContainerState {
  name: string;
  presence: ContainerPresence;
  /** Host ports bound by the container while it runs */
  publishedPorts: number[];
}

/** Volume mount in `volume:path[:ro]` terms */
export interface VolumeMount {
  volume: string;
  target: string;
  readOnly?: boolean;
}

export interface PortMapping {
  host: number;
  container: number;
}

/**
 * Everything needed to start a detached container.
 */
export interface ContainerRunSpec {
  name: string;
  image: string;
  network: string;
  networkAliases?: string[];
  privileged?: boolean;
  restartPolicy?: 'no' | 'on-failure' | 'always' | 'unless-stopped';
  env: Record<string, string>;
  volumes: VolumeMount[];
  ports: PortMapping[];
}

export interface BuildContext {
  /** Build context directory */
  directory: string;
  /** Dockerfile path relative to the context */
  dockerfile: string;
}

/**
 * The fixed resources the procedure provisions.
 */
export interface SetupPlan {
  network: string;
  dind: {
    container: string;
    image: string;
    alias: string;
  };
  jenkins: {
    container: string;
    image: string;
  };
  volumes: {
    certs: string;
    home: string;
  };
  ports: {
    daemonTls: number;
    web: number;
    agent: number;
  };
  build: BuildContext;
}

export type NetworkOutcome = 'created' | 'recreated' | 'kept';

/**
 * Final outcome of a run.
 */
export interface SetupReport {
  stage: SetupStage;
  exitCode: 0 | 1;
  /** Last stage reached before the abort */
  failedAt?: SetupStage;
  error?: string;
  guidance?: ErrorGuidance;
  /** Docker daemon version seen by the precondition check */
  daemonVersion?: string;
  network?: NetworkOutcome;
  removedContainers: string[];
  imageId?: string;
  /** Container ids by name, for containers started in this run */
  containers: Record<string, string>;
}
