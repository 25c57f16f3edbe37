/**
 * Wires fakes into the dependencies the orchestrator and steps take.
 */

import type { SetupDependencies } from '@/app/orchestrator';
import { createSetupPlan } from '@/config/plan';
import type { PromptKind } from '@/lib/confirm';
import { createLogger } from '@/lib/logger';
import type { SetupReporter } from '@/steps';
import { createFakeDocker, type FakeDocker } from '../fakes/docker';
import { createFakeHost, type FakeHostOptions } from '../fakes/host';
import { createScriptedConfirmer, type ScriptedConfirmer } from '../fakes/confirm';

export interface RecordingReporter extends SetupReporter {
  lines: string[];
  warnings: string[];
  details: string[];
}

export function createRecordingReporter(): RecordingReporter {
  const lines: string[] = [];
  const warnings: string[] = [];
  const details: string[] = [];
  return {
    lines,
    warnings,
    details,
    info: (message) => lines.push(message),
    warn: (message) => warnings.push(message),
    detail: (line) => details.push(line),
  };
}

export interface TestSetup {
  deps: SetupDependencies;
  docker: FakeDocker;
  confirm: ScriptedConfirmer;
  reporter: RecordingReporter;
}

export interface TestSetupOptions {
  /** Build context directory; must hold the Dockerfile unless a failure is wanted */
  directory: string;
  docker?: FakeDocker;
  answers?: Partial<Record<PromptKind, boolean>>;
  host?: Omit<FakeHostOptions, 'docker'>;
}

export function createTestSetup(options: TestSetupOptions): TestSetup {
  const docker = options.docker ?? createFakeDocker();
  const confirm = createScriptedConfirmer(options.answers);
  const reporter = createRecordingReporter();

  return {
    docker,
    confirm,
    reporter,
    deps: {
      plan: createSetupPlan({ directory: options.directory }),
      docker: docker.client,
      host: createFakeHost({ ...options.host, docker }),
      confirm,
      reporter,
      logger: createLogger({ level: 'silent' }),
    },
  };
}
