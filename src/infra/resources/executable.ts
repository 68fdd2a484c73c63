/**
 * Discovery of the running executable's own path.
 */

import { isAbsolute, resolve } from 'node:path';
import type { CurrentExecutablePath } from '../../core/locator/index.js';
import { StartupError } from '../../shared/utils/error.js';

/**
 * Entry script of the current Node process (process.argv[1]).
 * Node passes it as given on the command line, so a relative entry is
 * resolved against the working directory at call time.
 */
export function processExecutablePath(
  argv: readonly string[] = process.argv,
  cwd: () => string = () => process.cwd(),
): CurrentExecutablePath {
  return () => {
    const entry = argv[1];
    if (!entry) {
      throw new StartupError(
        'Cannot determine the path of the running executable: the process has no entry script',
      );
    }
    return isAbsolute(entry) ? entry : resolve(cwd(), entry);
  };
}

/** A path supplied explicitly, e.g. by --exe; must be absolute */
export function fixedExecutablePath(path: string): CurrentExecutablePath {
  return () => {
    if (!isAbsolute(path)) {
      throw new StartupError(`Executable path must be absolute: ${path}`);
    }
    return path;
  };
}
