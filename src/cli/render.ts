/**
 * Terminal output for setup progress and the final summary
 */

import type { SetupReporter } from '@/steps';
import type { SetupPlan, SetupReport } from '@/types';
import { formatFailure } from './error-formatting';

/** Minimal writable used for stdout and stderr */
export interface OutputStream {
  write: (chunk: string) => unknown;
}

export interface ConsoleReporterOptions {
  stdout: OutputStream;
  stderr: OutputStream;
  /** Echo build output */
  verbose: boolean;
}

/**
 * Progress lines to stdout, warnings to stderr, build output only when verbose.
 */
export function createConsoleReporter(options: ConsoleReporterOptions): SetupReporter {
  const { stdout, stderr, verbose } = options;
  return {
    info: (message) => stdout.write(`${message}\n`),
    warn: (message) => stderr.write(`Warning: ${message}\n`),
    detail: (line) => {
      if (verbose) stdout.write(`  ${line}\n`);
    },
  };
}

/**
 * Completion message with the Jenkins URL and how to follow its logs.
 */
export function renderCompletion(plan: SetupPlan): string[] {
  return [
    'Setup complete! Jenkins is initializing.',
    `You can access Jenkins at: http://localhost:${plan.ports.web}`,
    `To follow Jenkins startup logs: docker logs -f ${plan.jenkins.container}`,
  ];
}

/**
 * Summary of an aborted run: the failure, then any resources already changed,
 * since nothing is rolled back.
 */
export function renderAbort(report: SetupReport, plan: SetupPlan): string[] {
  const lines = formatFailure(report.error ?? 'Setup failed', report.guidance);

  const changed: string[] = [];
  if (report.network === 'created' || report.network === 'recreated') {
    changed.push(`network '${plan.network}' (${report.network})`);
  }
  for (const name of report.removedContainers) {
    changed.push(`container '${name}' (removed)`);
  }
  for (const name of Object.keys(report.containers)) {
    changed.push(`container '${name}' (started)`);
  }

  if (changed.length > 0) {
    lines.push(`  Already applied and left in place: ${changed.join(', ')}`);
  }
  return lines;
}
