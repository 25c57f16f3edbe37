import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { homedir } from 'node:os';
import { join } from 'node:path';

describe('config', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    jest.resetModules();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should read overrides from the environment', async () => {
    process.env.LOG_LEVEL = 'debug';
    process.env.DOCKER_SOCKET = 'tcp://127.0.0.1:2375';
    process.env.DOCKER_TIMEOUT = '30000';
    process.env.DOCKER_CERT_PATH = '/etc/docker/client-certs';

    const { config } = await import('@/config');

    expect(config.logLevel).toBe('debug');
    expect(config.docker).toEqual({
      socketPath: 'tcp://127.0.0.1:2375',
      timeout: 30000,
      certPath: '/etc/docker/client-certs',
    });
  });

  it('should leave daemon calls unbounded by default', async () => {
    delete process.env.DOCKER_TIMEOUT;
    delete process.env.LOG_LEVEL;
    delete process.env.DOCKER_CERT_PATH;

    const { config } = await import('@/config');

    expect(config.docker.timeout).toBe(0);
    expect(config.docker.certPath).toBe(join(homedir(), '.docker'));
    expect(config.logLevel).toBe('warn');
  });

  it('should re-export the fixed resource names', async () => {
    const { NETWORK_NAME, REQUIRED_PORTS } = await import('@/config');

    expect(NETWORK_NAME).toBe('jenkins');
    expect(REQUIRED_PORTS).toEqual({ daemonTls: 2376, web: 8080, agent: 50000 });
  });
});
