import { describe, it, expect } from '@jest/globals';
import {
  createSetupPlan,
  dindContainerSpec,
  jenkinsContainerSpec,
  managedContainers,
  requiredPorts,
} from '@/config/plan';

describe('setup plan', () => {
  const plan = createSetupPlan({ directory: '/srv/jenkins' });

  it('should fix every resource name', () => {
    expect(plan).toEqual({
      network: 'jenkins',
      dind: { container: 'jenkins-docker', image: 'docker:dind', alias: 'docker' },
      jenkins: { container: 'jenkins-blueocean', image: 'myjenkins-blueocean:latest' },
      volumes: { certs: 'jenkins-docker-certs', home: 'jenkins-data' },
      ports: { daemonTls: 2376, web: 8080, agent: 50000 },
      build: { directory: '/srv/jenkins', dockerfile: 'Dockerfile' },
    });
  });

  it('should default the build context to the working directory', () => {
    expect(createSetupPlan().build).toEqual({ directory: process.cwd(), dockerfile: 'Dockerfile' });
    expect(createSetupPlan({ dockerfile: 'jenkins/Dockerfile' }).build.dockerfile).toBe('jenkins/Dockerfile');
  });

  it('should list the required ports and managed containers in order', () => {
    expect(requiredPorts(plan)).toEqual([2376, 8080, 50000]);
    expect(managedContainers(plan)).toEqual(['jenkins-docker', 'jenkins-blueocean']);
  });

  it('should describe the DinD container', () => {
    expect(dindContainerSpec(plan)).toEqual({
      name: 'jenkins-docker',
      image: 'docker:dind',
      network: 'jenkins',
      networkAliases: ['docker'],
      privileged: true,
      env: { DOCKER_TLS_CERTDIR: '/certs' },
      volumes: [
        { volume: 'jenkins-docker-certs', target: '/certs/client' },
        { volume: 'jenkins-data', target: '/var/jenkins_home' },
      ],
      ports: [{ host: 2376, container: 2376 }],
    });
  });

  it('should describe the Jenkins container', () => {
    expect(jenkinsContainerSpec(plan)).toEqual({
      name: 'jenkins-blueocean',
      image: 'myjenkins-blueocean:latest',
      network: 'jenkins',
      restartPolicy: 'on-failure',
      env: {
        DOCKER_HOST: 'tcp://docker:2376',
        DOCKER_CERT_PATH: '/certs/client',
        DOCKER_TLS_VERIFY: '1',
      },
      volumes: [
        { volume: 'jenkins-data', target: '/var/jenkins_home' },
        { volume: 'jenkins-docker-certs', target: '/certs/client', readOnly: true },
      ],
      ports: [
        { host: 8080, container: 8080 },
        { host: 50000, container: 50000 },
      ],
    });
  });

  it('should not share port objects between plans', () => {
    const first = createSetupPlan();
    first.ports.web = 9090;

    expect(createSetupPlan().ports.web).toBe(8080);
  });
});
