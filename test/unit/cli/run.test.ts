/**
 * CLI tests: argument handling, wiring and exit codes over in-memory fakes
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { runCli, type CliRuntime } from '@/cli/run';
import { createPolicyConfirmer, type ConfirmationPolicy, type PromptKind } from '@/lib/confirm';
import { createLogger } from '@/lib/logger';
import { createBuildContext } from '../../__support__/utilities/tmp-helpers';
import { createFakeDocker, existingContainer, type FakeDocker } from '../../__support__/fakes/docker';
import { createFakeHost } from '../../__support__/fakes/host';
import { createScriptedConfirmer } from '../../__support__/fakes/confirm';

interface Captured {
  text: string;
  write: (chunk: string) => boolean;
}

function capture(): Captured {
  const captured: Captured = {
    text: '',
    write: (chunk) => {
      captured.text += chunk;
      return true;
    },
  };
  return captured;
}

interface TestRuntime extends CliRuntime {
  out: Captured;
  err: Captured;
  policies: Array<Record<PromptKind, ConfirmationPolicy>>;
}

function createTestRuntime(
  docker: FakeDocker,
  options: { busyPorts?: number[]; answers?: Partial<Record<PromptKind, boolean>> } = {},
): TestRuntime {
  const out = capture();
  const err = capture();
  const policies: Array<Record<PromptKind, ConfirmationPolicy>> = [];
  return {
    out,
    err,
    policies,
    stdout: out,
    stderr: err,
    createLogger: () => createLogger({ level: 'silent' }),
    createDocker: () => docker.client,
    host: createFakeHost({ docker, busyPorts: options.busyPorts ?? [] }),
    createConfirmer: (resolved) => {
      policies.push(resolved);
      return createPolicyConfirmer(resolved, () => createScriptedConfirmer(options.answers));
    },
  };
}

describe('runCli', () => {
  let context: { directory: string; cleanup: () => void };

  beforeEach(() => {
    context = createBuildContext();
  });

  afterEach(() => {
    context.cleanup();
  });

  it('should provision everything and print where Jenkins runs', async () => {
    const docker = createFakeDocker();
    const runtime = createTestRuntime(docker);

    const code = await runCli(['--context', context.directory], runtime);

    expect(code).toBe(0);
    expect(runtime.out.text.endsWith(
      [
        'Setup complete! Jenkins is initializing.',
        'You can access Jenkins at: http://localhost:8080',
        'To follow Jenkins startup logs: docker logs -f jenkins-blueocean',
        '',
      ].join('\n'),
    )).toBe(true);
    expect(runtime.err.text).toBe('');
    expect(docker.state.containers.size).toBe(2);
  });

  it('should stop after the checks with --check', async () => {
    const docker = createFakeDocker();
    const runtime = createTestRuntime(docker);

    const code = await runCli(['--check', '--context', context.directory], runtime);

    expect(code).toBe(0);
    expect(runtime.out.text).toBe(
      [
        'Docker is installed and the daemon is running.',
        'Ports 2376 8080 50000 are free to use.',
        'Docker daemon version: 24.0.7',
        'All preconditions are met.',
        '',
      ].join('\n'),
    );
    expect(docker.mutations()).toEqual([]);
  });

  it('should print the failure with hint and resolution on stderr', async () => {
    const runtime = createTestRuntime(createFakeDocker(), { busyPorts: [8080] });

    const code = await runCli(['--context', context.directory], runtime);

    expect(code).toBe(1);
    expect(runtime.err.text).toBe(
      [
        'Error: Required port 8080 is already in use on this system.',
        '  Hint: Another process is listening on port 8080',
        '  Resolution: Please free up port 8080 or change the configuration before proceeding.',
        '',
      ].join('\n'),
    );
  });

  it('should list what was already changed when a later step aborts', async () => {
    const docker = createFakeDocker({
      containers: new Map([['jenkins-docker', existingContainer('docker:dind', { running: false })]]),
    });
    const runtime = createTestRuntime(docker, { answers: { container: false } });

    const code = await runCli(['--context', context.directory], runtime);

    expect(code).toBe(1);
    expect(runtime.err.text.split('\n')).toEqual([
      "Error: Cannot continue with an existing container 'jenkins-docker'.",
      '  Hint: A container with the same name already exists and was kept',
      '  Resolution: Please remove or rename the container and run the script again.',
      "  Already applied and left in place: network 'jenkins' (created)",
      '',
    ]);
  });

  it('should list a removed container when a later removal fails', async () => {
    const docker = createFakeDocker({
      containers: new Map([
        ['jenkins-docker', existingContainer('docker:dind', { running: false })],
        ['jenkins-blueocean', existingContainer('myjenkins-blueocean:latest', { running: false })],
      ]),
    });
    docker.failOn('removeContainer', 'Failed to remove container: Docker daemon returned HTTP 500', 'jenkins-blueocean');
    const runtime = createTestRuntime(docker);

    const code = await runCli(['-y', '--context', context.directory], runtime);

    expect(code).toBe(1);
    expect(runtime.err.text).toContain(
      "  Already applied and left in place: network 'jenkins' (created), container 'jenkins-docker' (removed)\n",
    );
  });

  it('should echo build output at info level', async () => {
    const runtime = createTestRuntime(createFakeDocker());

    await runCli(['--context', context.directory, '--log-level', 'info'], runtime);

    expect(runtime.out.text).toContain('  Step 1/2 : FROM jenkins/jenkins:lts-jdk17\n');
  });

  it('should hide build output at the default level', async () => {
    const runtime = createTestRuntime(createFakeDocker());

    await runCli(['--context', context.directory, '--log-level', 'warn'], runtime);

    expect(runtime.out.text).not.toContain('Step 1/2');
  });

  describe('prompt policies', () => {
    it('should prompt for both decisions by default', async () => {
      const runtime = createTestRuntime(createFakeDocker());

      await runCli(['--context', context.directory], runtime);

      expect(runtime.policies).toEqual([{ network: 'prompt', container: 'prompt' }]);
    });

    it('should answer yes everywhere with --yes', async () => {
      const runtime = createTestRuntime(createFakeDocker());

      await runCli(['-y', '--context', context.directory], runtime);

      expect(runtime.policies).toEqual([{ network: 'yes', container: 'yes' }]);
    });

    it('should combine a forcing flag with --non-interactive', async () => {
      const runtime = createTestRuntime(createFakeDocker());

      await runCli(['--recreate-network', '--non-interactive', '--context', context.directory], runtime);

      expect(runtime.policies).toEqual([{ network: 'yes', container: 'no' }]);
    });

    it('should replace existing containers without asking', async () => {
      const docker = createFakeDocker({
        networks: new Set(['jenkins']),
        containers: new Map([
          ['jenkins-docker', existingContainer('docker:dind', { ports: [2376] })],
          ['jenkins-blueocean', existingContainer('myjenkins-blueocean:latest', { ports: [8080, 50000] })],
        ]),
      });
      const runtime = createTestRuntime(docker);

      const code = await runCli(
        ['--replace-containers', '--non-interactive', '--context', context.directory],
        runtime,
      );

      expect(code).toBe(0);
      expect(runtime.out.text).toContain("Keeping the existing Docker network 'jenkins'.\n");
      expect(runtime.out.text).toContain('Removed container jenkins-docker.\n');
    });
  });

  describe('option errors', () => {
    it('should reject an unknown log level', async () => {
      const runtime = createTestRuntime(createFakeDocker());

      const code = await runCli(['--log-level', 'verbose', '--context', context.directory], runtime);

      expect(code).toBe(1);
      expect(runtime.err.text).toBe(
        [
          'Configuration errors:',
          '  • Invalid log level: verbose. Valid options: debug, info, warn, error',
          '',
          'Use --help for usage information',
          '',
        ].join('\n'),
      );
    });

    it('should reject a missing build context', async () => {
      const runtime = createTestRuntime(createFakeDocker());

      const code = await runCli(['--context', '/nonexistent/jenkins-context'], runtime);

      expect(code).toBe(1);
      expect(runtime.err.text).toContain('  • Build context directory does not exist: /nonexistent/jenkins-context\n');
    });

    it('should refuse an https daemon endpoint without client certificates', async () => {
      const docker = createFakeDocker();
      const runtime = createTestRuntime(docker);

      const code = await runCli(
        [
          '--docker-socket',
          'https://docker.internal:2376',
          '--docker-cert-path',
          '/nonexistent/certs',
          '--context',
          context.directory,
        ],
        runtime,
      );

      expect(code).toBe(1);
      expect(runtime.err.text.split('\n')[0]).toBe('Error: Cannot read Docker TLS file: /nonexistent/certs/ca.pem');
      expect(runtime.err.text).toContain(
        '  Resolution: Point DOCKER_CERT_PATH or --docker-cert-path at a directory holding ca.pem, cert.pem and key.pem.\n',
      );
      expect(docker.calls).toEqual([]);
    });

    it('should reject unknown options', async () => {
      const runtime = createTestRuntime(createFakeDocker());

      const code = await runCli(['--bogus'], runtime);

      expect(code).toBe(1);
      expect(runtime.err.text).toContain("error: unknown option '--bogus'");
    });
  });

  it('should print help and exit 0', async () => {
    const runtime = createTestRuntime(createFakeDocker());

    const code = await runCli(['--help'], runtime);

    expect(code).toBe(0);
    expect(runtime.out.text).toContain('Usage: jenkins-dind-setup [options]');
    expect(runtime.out.text).toContain('--replace-containers');
  });

  it('should print the package version', async () => {
    const runtime = createTestRuntime(createFakeDocker());

    const code = await runCli(['--version'], runtime);

    expect(code).toBe(0);
    expect(runtime.out.text).toBe('1.0.0\n');
  });
});
