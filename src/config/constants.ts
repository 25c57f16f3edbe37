/**
 * Fixed resource names, images and ports for the Jenkins DinD setup.
 */

export const NETWORK_NAME = 'jenkins';

export const DIND_CONTAINER = 'jenkins-docker';
export const DIND_IMAGE = 'docker:dind';
/** Hostname the Jenkins container uses to reach the DinD daemon */
export const DIND_NETWORK_ALIAS = 'docker';

export const JENKINS_CONTAINER = 'jenkins-blueocean';
export const JENKINS_IMAGE = 'myjenkins-blueocean:latest';

export const CERTS_VOLUME = 'jenkins-docker-certs';
export const JENKINS_HOME_VOLUME = 'jenkins-data';

export const CERTS_ROOT = '/certs';
export const CLIENT_CERTS_PATH = '/certs/client';
export const JENKINS_HOME_PATH = '/var/jenkins_home';

export const REQUIRED_PORTS = {
  daemonTls: 2376,
  web: 8080,
  agent: 50000,
} as const;

/** Managed containers, in reconciliation order */
export const MANAGED_CONTAINERS = [DIND_CONTAINER, JENKINS_CONTAINER] as const;

export const DEFAULT_DOCKERFILE = 'Dockerfile';

export const DOCKER_CLI = 'docker';

export const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof VALID_LOG_LEVELS)[number];
