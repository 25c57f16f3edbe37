import { describe, it, expect } from '@jest/globals';
import { reconcileNetwork } from '@/steps';
import { createTestSetup } from '../../__support__/factories/setup-deps';
import { createFakeDocker, existingContainer } from '../../__support__/fakes/docker';

describe('reconcileNetwork', () => {
  it('should create a missing network without asking', async () => {
    const { deps, docker, confirm, reporter } = createTestSetup({ directory: '/work' });

    const result = await reconcileNetwork(deps);

    expect(result).toEqual({ ok: true, value: 'created' });
    expect(docker.state.networks.has('jenkins')).toBe(true);
    expect(confirm.questions).toEqual([]);
    expect(reporter.lines).toEqual(["Creating Docker network 'jenkins'..."]);
  });

  it('should keep an existing network when the operator declines', async () => {
    const docker = createFakeDocker({ networks: new Set(['jenkins']) });
    const { deps, reporter } = createTestSetup({ directory: '/work', docker, answers: { network: false } });

    const result = await reconcileNetwork(deps);

    expect(result).toEqual({ ok: true, value: 'kept' });
    expect(docker.mutations()).toEqual([]);
    expect(reporter.lines).toEqual([
      "Docker network 'jenkins' already exists.",
      "Keeping the existing Docker network 'jenkins'.",
    ]);
  });

  it('should recreate an existing network on confirmation', async () => {
    const docker = createFakeDocker({ networks: new Set(['jenkins']) });
    const { deps } = createTestSetup({ directory: '/work', docker, answers: { network: true } });

    const result = await reconcileNetwork(deps);

    expect(result).toEqual({ ok: true, value: 'recreated' });
    expect(docker.mutations()).toEqual(['removeNetwork:jenkins', 'createNetwork:jenkins']);
  });

  it('should warn and keep the network when it still has attached containers', async () => {
    const docker = createFakeDocker({
      networks: new Set(['jenkins']),
      containers: new Map([['jenkins-docker', existingContainer('docker:dind')]]),
    });
    const { deps, reporter } = createTestSetup({ directory: '/work', docker, answers: { network: true } });

    const result = await reconcileNetwork(deps);

    expect(result).toEqual({ ok: true, value: 'kept' });
    expect(reporter.warnings).toEqual([
      "Could not remove network 'jenkins': Failed to remove network: error while removing network: network jenkins has active endpoints",
    ]);
    expect(docker.state.networks.has('jenkins')).toBe(true);
  });

  it('should fail when the network cannot be created', async () => {
    const docker = createFakeDocker();
    docker.failOn('createNetwork', 'Failed to create network: Docker daemon returned HTTP 500');
    const { deps } = createTestSetup({ directory: '/work', docker });

    const result = await reconcileNetwork(deps);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe("Failed to create Docker network 'jenkins'.");
      expect(result.guidance?.hint).toBe('createNetwork was rejected');
    }
  });
});
