/**
 * Resource root priority chain.
 *
 * Strategies are checked in a fixed order and the first one that applies
 * wins: libdir override > uninstalled mode > relocatable computation.
 */

import { dirname, isAbsolute, resolve } from 'node:path';
import type { RootResolution, RootSource, ToolIdentity } from '../models/index.js';
import { StartupError, getErrorMessage } from '../../shared/utils/error.js';
import { createLogger } from '../../shared/utils/debug.js';
import type { CurrentExecutablePath, EnvSource, FileSystemProbe } from './ports.js';
import { toolEnvNames } from './tool-env.js';

const log = createLogger('root-chain');

export interface RootChainContext {
  env: EnvSource;
  tool: ToolIdentity;
  resourceOffset: string;
  developmentDirs: readonly string[];
  currentExecutablePath: CurrentExecutablePath;
  fs: Pick<FileSystemProbe, 'realpath'>;
}

export interface RootStrategy {
  source: RootSource;
  /** Returns undefined when the strategy does not apply */
  resolve(context: RootChainContext): RootResolution | undefined;
}

/** Name of the bundled resource directory, e.g. aclocal-1.16 */
export function versionedResourceName(tool: ToolIdentity): string {
  return `${tool.packageName}-${tool.apiVersion}`;
}

/**
 * Compute the bundled resource root from the executable's location.
 *
 * The executable path is canonicalized first so that a symlinked entry
 * point (e.g. /usr/bin/tool -> /opt/pkg/bin/tool) lands in the real tree.
 */
export function computeRelocatableRoot(
  executablePath: string,
  tool: ToolIdentity,
  resourceOffset: string,
  fs: Pick<FileSystemProbe, 'realpath'>,
): string {
  if (!isAbsolute(executablePath)) {
    throw new StartupError(`Executable path is not absolute: ${executablePath}`);
  }

  let canonical: string;
  try {
    canonical = fs.realpath(executablePath);
  } catch (err) {
    throw new StartupError(`Cannot canonicalize executable path ${executablePath}: ${getErrorMessage(err)}`);
  }

  return resolve(dirname(canonical), resourceOffset, versionedResourceName(tool));
}

export const libdirStrategy: RootStrategy = {
  source: 'libdir',
  resolve({ env, tool }) {
    const value = env[toolEnvNames(tool).libdir];
    if (!value) return undefined;
    return { source: 'libdir', dirs: [value] };
  },
};

export const uninstalledStrategy: RootStrategy = {
  source: 'uninstalled',
  resolve({ env, tool, developmentDirs }) {
    if (!env[toolEnvNames(tool).uninstalled]) return undefined;
    return { source: 'uninstalled', dirs: [...developmentDirs] };
  },
};

export const relocatableStrategy: RootStrategy = {
  source: 'relocatable',
  resolve({ tool, resourceOffset, currentExecutablePath, fs }) {
    const executablePath = currentExecutablePath();
    return {
      source: 'relocatable',
      dirs: [computeRelocatableRoot(executablePath, tool, resourceOffset, fs)],
    };
  },
};

export const ROOT_STRATEGIES: readonly RootStrategy[] = [
  libdirStrategy,
  uninstalledStrategy,
  relocatableStrategy,
];

/**
 * Resolve the tool's resource directories.
 * Throws StartupError when no strategy applies or the executable cannot be located.
 */
export function resolveResourceRoot(
  context: RootChainContext,
  strategies: readonly RootStrategy[] = ROOT_STRATEGIES,
): RootResolution {
  for (const strategy of strategies) {
    const resolution = strategy.resolve(context);
    if (resolution) {
      log.debug('Resource root resolved', { source: resolution.source, dirs: resolution.dirs });
      return resolution;
    }
  }
  throw new StartupError('No resource root strategy applied');
}
