/**
 * The setup plan: which network, containers, volumes and ports get
 * provisioned, and how each container is started.
 */

import type { BuildContext, ContainerRunSpec, SetupPlan } from '@/types';
import {
  CERTS_ROOT,
  CERTS_VOLUME,
  CLIENT_CERTS_PATH,
  DEFAULT_DOCKERFILE,
  DIND_CONTAINER,
  DIND_IMAGE,
  DIND_NETWORK_ALIAS,
  JENKINS_CONTAINER,
  JENKINS_HOME_PATH,
  JENKINS_HOME_VOLUME,
  JENKINS_IMAGE,
  NETWORK_NAME,
  REQUIRED_PORTS,
} from './constants';

/**
 * Build the plan. Resource names are fixed; only the build context may be
 * overridden.
 */
export function createSetupPlan(build: Partial<BuildContext> = {}): SetupPlan {
  return {
    network: NETWORK_NAME,
    dind: {
      container: DIND_CONTAINER,
      image: DIND_IMAGE,
      alias: DIND_NETWORK_ALIAS,
    },
    jenkins: {
      container: JENKINS_CONTAINER,
      image: JENKINS_IMAGE,
    },
    volumes: {
      certs: CERTS_VOLUME,
      home: JENKINS_HOME_VOLUME,
    },
    ports: { ...REQUIRED_PORTS },
    build: {
      directory: build.directory ?? process.cwd(),
      dockerfile: build.dockerfile ?? DEFAULT_DOCKERFILE,
    },
  };
}

/** Ports that must be free before anything is provisioned */
export function requiredPorts(plan: SetupPlan): number[] {
  return [plan.ports.daemonTls, plan.ports.web, plan.ports.agent];
}

/** Containers to reconcile, DinD first */
export function managedContainers(plan: SetupPlan): string[] {
  return [plan.dind.container, plan.jenkins.container];
}

/**
 * Privileged Docker daemon that writes its TLS client certificates into the
 * shared certs volume.
 */
export function dindContainerSpec(plan: SetupPlan): ContainerRunSpec {
  return {
    name: plan.dind.container,
    image: plan.dind.image,
    network: plan.network,
    networkAliases: [plan.dind.alias],
    privileged: true,
    env: {
      DOCKER_TLS_CERTDIR: CERTS_ROOT,
    },
    volumes: [
      { volume: plan.volumes.certs, target: CLIENT_CERTS_PATH },
      { volume: plan.volumes.home, target: JENKINS_HOME_PATH },
    ],
    ports: [{ host: plan.ports.daemonTls, container: plan.ports.daemonTls }],
  };
}

/**
 * Jenkins controller that talks to the DinD daemon over TLS by its network
 * alias.
 */
export function jenkinsContainerSpec(plan: SetupPlan): ContainerRunSpec {
  return {
    name: plan.jenkins.container,
    image: plan.jenkins.image,
    network: plan.network,
    restartPolicy: 'on-failure',
    env: {
      DOCKER_HOST: `tcp://${plan.dind.alias}:${plan.ports.daemonTls}`,
      DOCKER_CERT_PATH: CLIENT_CERTS_PATH,
      DOCKER_TLS_VERIFY: '1',
    },
    volumes: [
      { volume: plan.volumes.home, target: JENKINS_HOME_PATH },
      { volume: plan.volumes.certs, target: CLIENT_CERTS_PATH, readOnly: true },
    ],
    ports: [
      { host: plan.ports.web, container: plan.ports.web },
      { host: plan.ports.agent, container: plan.ports.agent },
    ],
  };
}
