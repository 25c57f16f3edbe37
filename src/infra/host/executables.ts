/**
 * Executable lookup on the search path, the equivalent of `command -v`.
 */

import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';

/**
 * Candidate file names for a command. Windows resolves extensions from PATHEXT.
 */
function candidateNames(name: string, env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
  if (platform !== 'win32') {
    return [name];
  }
  const extensions = (env.PATHEXT || '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean);
  return [name, ...extensions.map((ext) => `${name}${ext.toLowerCase()}`)];
}

function isExecutableFile(path: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    if (platform !== 'win32') {
      accessSync(path, constants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the first executable named `name` on PATH.
 *
 * @returns absolute path of the executable, or null when it is not installed
 */
export function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string | null {
  const searchPath = env.PATH ?? env.Path ?? '';
  for (const directory of searchPath.split(delimiter)) {
    if (!directory) continue;
    for (const candidate of candidateNames(name, env, platform)) {
      const fullPath = join(directory, candidate);
      if (isExecutableFile(fullPath, platform)) {
        return fullPath;
      }
    }
  }
  return null;
}
