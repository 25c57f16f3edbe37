/**
 * CLI program: option parsing, wiring of the real clients, exit status.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Command, CommanderError } from 'commander';
import { runSetup } from '@/app/orchestrator';
import { config } from '@/config';
import { createSetupPlan } from '@/config/plan';
import { createDockerClient, type DockerClient } from '@/infra/docker/client';
import {
  resolveDockerConnection,
  validateDockerSocket,
  type DockerConnection,
} from '@/infra/docker/socket-validation';
import { createHostProbe, type HostProbe } from '@/infra/host';
import { createPolicyConfirmer, type ConfirmationPolicy, type Confirmer, type PromptKind } from '@/lib/confirm';
import { extractErrorMessage } from '@/lib/error-utils';
import { createLogger, type Logger } from '@/lib/logger';
import { formatFailure, formatOptionErrors } from './error-formatting';
import { createConsoleReporter, renderAbort, renderCompletion, type OutputStream } from './render';
import { resolvePromptPolicies, validateOptions } from './validation';

export const APP_NAME = 'jenkins-dind-setup';

/**
 * Everything the CLI touches outside its own process, replaceable in tests.
 */
export interface CliRuntime {
  stdout: OutputStream;
  stderr: OutputStream;
  createLogger: (level: string) => Logger;
  createDocker: (logger: Logger, connection: DockerConnection) => DockerClient;
  host: HostProbe;
  createConfirmer: (policies: Record<PromptKind, ConfirmationPolicy>) => Confirmer;
}

function readVersion(): string {
  try {
    // src/cli and dist/cli both sit two levels below the package root
    const packageJson: unknown = JSON.parse(
      readFileSync(join(__dirname, '../../package.json'), 'utf-8'),
    );
    if (
      packageJson &&
      typeof packageJson === 'object' &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // fall through to the placeholder
  }
  return '0.0.0';
}

export function createDefaultRuntime(): CliRuntime {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    createLogger: (level) => createLogger({ name: APP_NAME, level }),
    createDocker: (logger, connection) =>
      createDockerClient(logger, { ...connection, timeout: config.docker.timeout }),
    host: createHostProbe(),
    createConfirmer: (policies) => createPolicyConfirmer(policies),
  };
}

function createProgram(runtime: CliRuntime): Command {
  const program = new Command();
  program
    .name(APP_NAME)
    .description(
      'Provision a local Jenkins (Blue Ocean) server that runs Docker builds through a Docker-in-Docker daemon',
    )
    .version(readVersion())
    .option('-y, --yes', 'answer yes to every confirmation prompt')
    .option('--recreate-network', "delete and recreate an existing 'jenkins' network without asking")
    .option('--replace-containers', 'remove existing Jenkins containers without asking')
    .option('--non-interactive', 'never prompt; unanswered prompts take their default (no)')
    .option('--check', 'run the precondition checks only and exit')
    .option('--context <dir>', 'build context for the Jenkins image', process.cwd())
    .option('--dockerfile <path>', 'Dockerfile path relative to the build context', 'Dockerfile')
    .option('--docker-socket <path>', 'Docker daemon socket path or tcp:// URL')
    .option('--docker-cert-path <dir>', 'directory with ca.pem, cert.pem and key.pem for https:// endpoints')
    .option('--log-level <level>', 'logging level: debug, info, warn, error', config.logLevel)
    .addHelpText(
      'after',
      `

Provisions:
  network    jenkins
  containers jenkins-docker (docker:dind), jenkins-blueocean (myjenkins-blueocean:latest)
  volumes    jenkins-docker-certs, jenkins-data
  ports      2376 (Docker TLS), 8080 (web UI), 50000 (agents)

Environment Variables:
  LOG_LEVEL        Logging level (debug, info, warn, error)
  DOCKER_SOCKET    Docker daemon socket path
  DOCKER_TIMEOUT   Docker request timeout in ms (default: none)
  DOCKER_CERT_PATH Client certificates for https:// endpoints (default: ~/.docker)
`,
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.stdout.write(text),
      writeErr: (text) => runtime.stderr.write(text),
    });
  return program;
}

function writeLines(stream: OutputStream, lines: string[]): void {
  for (const line of lines) {
    stream.write(`${line}\n`);
  }
}

function renderCheckSummary(daemonVersion: string | undefined): string[] {
  const lines = daemonVersion ? [`Docker daemon version: ${daemonVersion}`] : [];
  return [...lines, 'All preconditions are met.'];
}

/**
 * Parse `argv` (user arguments only) and run the setup.
 *
 * @returns process exit code
 */
export async function runCli(argv: string[], runtime: CliRuntime = createDefaultRuntime()): Promise<number> {
  const program = createProgram(runtime);

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end here with code 0
      return error.exitCode === 0 ? 0 : 1;
    }
    throw error;
  }

  const validation = validateOptions(program.opts());
  if (!validation.valid) {
    writeLines(runtime.stderr, formatOptionErrors(validation.errors));
    return 1;
  }
  const { options } = validation;

  const logger = runtime.createLogger(options.logLevel);
  const socketPath = options.dockerSocket || config.docker.socketPath;
  for (const warning of validateDockerSocket({ dockerSocket: socketPath }).warnings) {
    logger.warn({ socketPath }, warning);
  }
  const connection = resolveDockerConnection(socketPath, options.dockerCertPath || config.docker.certPath);
  if (!connection.ok) {
    writeLines(runtime.stderr, formatFailure(connection.error, connection.guidance));
    return 1;
  }

  const plan = createSetupPlan({ directory: options.context, dockerfile: options.dockerfile });
  const confirm = runtime.createConfirmer(resolvePromptPolicies(options));

  try {
    const report = await runSetup(
      {
        plan,
        docker: runtime.createDocker(logger, connection.value),
        host: runtime.host,
        confirm,
        reporter: createConsoleReporter({
          stdout: runtime.stdout,
          stderr: runtime.stderr,
          verbose: options.logLevel === 'debug' || options.logLevel === 'info',
        }),
        logger,
      },
      { checkOnly: options.check },
    );

    if (report.exitCode !== 0) {
      writeLines(runtime.stderr, renderAbort(report, plan));
      return 1;
    }

    writeLines(
      runtime.stdout,
      options.check ? renderCheckSummary(report.daemonVersion) : renderCompletion(plan),
    );
    return 0;
  } catch (error) {
    logger.error({ error: extractErrorMessage(error) }, 'Unexpected failure');
    writeLines(runtime.stderr, formatFailure(extractErrorMessage(error)));
    return 1;
  } finally {
    confirm.close();
  }
}
