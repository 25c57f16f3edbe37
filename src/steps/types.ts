/**
 * Shared context handed to every setup step.
 */

import type { Logger } from 'pino';
import type { DockerClient } from '@/infra/docker/client';
import type { HostProbe } from '@/infra/host';
import type { Confirmer } from '@/lib/confirm';
import type { SetupPlan } from '@/types';

/**
 * Receives operator-facing progress lines.
 */
export interface SetupReporter {
  info: (message: string) => void;
  warn: (message: string) => void;
  /** Verbose output such as build logs */
  detail: (line: string) => void;
}

export interface StepContext {
  plan: SetupPlan;
  docker: DockerClient;
  host: HostProbe;
  confirm: Confirmer;
  reporter: SetupReporter;
  logger: Logger;
}
