/**
 * Probes of the machine the setup runs on.
 */

import type { Result } from '@/types';
import { findExecutable } from './executables';
import { isPortInUse } from './ports';

export { findExecutable } from './executables';
export { isPortInUse } from './ports';

/**
 * Host checks used by the precondition step
 */
export interface HostProbe {
  /** Absolute path of a command on PATH, or null */
  findExecutable: (name: string) => string | null;
  /** Whether a TCP listener already holds the port */
  isPortInUse: (port: number) => Promise<Result<boolean>>;
}

export function createHostProbe(): HostProbe {
  return {
    findExecutable: (name) => findExecutable(name),
    isPortInUse,
  };
}
