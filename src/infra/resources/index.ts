/**
 * Resource location for a relocatable tool.
 *
 * Builds the search path, highest priority first:
 * - user includes (command line, then config `includes`)
 * - bundled resource directories (libdir override, development dirs, or
 *   `<exe dir>/../res/<package>-<version>`)
 * - system directories, each followed by its dirlist entries
 * - extra includes from `<TOOL>_EXTRA_INCLUDES`, existing directories only
 */

import {
  composeSearchPath,
  parseExtraIncludes,
  resolveResourceRoot,
  toolEnvNames,
  type CurrentExecutablePath,
  type EnvSource,
  type FileSystemProbe,
} from '../../core/locator/index.js';
import type { RelocConfig, RootResolution, SearchPathLayers, SearchPathList } from '../../core/models/index.js';
import { createLogger } from '../../shared/utils/debug.js';
import { getErrorMessage } from '../../shared/utils/error.js';
import { expandSystemDirs } from './dirlist.js';
import { processExecutablePath } from './executable.js';
import { nodeFileSystem } from './fileSystem.js';

const log = createLogger('resources');

/**
 * Existence check for extra includes. Any probe failure (a symlink loop,
 * an overlong path, a parent without search permission) drops the entry.
 */
function isUsableExtraInclude(fs: Pick<FileSystemProbe, 'isDirectory'>, path: string): boolean {
  try {
    return fs.isDirectory(path);
  } catch (err) {
    log.debug('Dropping extra include', { path, reason: getErrorMessage(err) });
    return false;
  }
}

export interface LocateResourcesOptions {
  config: RelocConfig;
  env?: EnvSource;
  /** Includes given on the command line; they precede config includes */
  userIncludes?: readonly string[];
  currentExecutablePath?: CurrentExecutablePath;
  fs?: FileSystemProbe;
}

export interface LocatedResources {
  root: RootResolution;
  layers: SearchPathLayers;
  searchPath: SearchPathList;
}

export function locateResources(options: LocateResourcesOptions): LocatedResources {
  const {
    config,
    env = process.env,
    userIncludes = [],
    currentExecutablePath = processExecutablePath(),
    fs = nodeFileSystem,
  } = options;
  log.debug('Locating resources', { tool: config.tool, userIncludes });

  const root = resolveResourceRoot({
    env,
    tool: config.tool,
    resourceOffset: config.resourceOffset,
    developmentDirs: config.developmentDirs,
    currentExecutablePath,
    fs,
  });

  const extraVar = toolEnvNames(config.tool).extraIncludes;
  const layers: SearchPathLayers = {
    user: [...userIncludes, ...config.includes],
    bundled: root.dirs,
    system: expandSystemDirs(config.systemDirs, fs),
    extra: parseExtraIncludes(env[extraVar], (path) => isUsableExtraInclude(fs, path)),
  };

  const searchPath = composeSearchPath(layers);
  log.debug('Search path built', { source: root.source, searchPath });
  return { root, layers, searchPath };
}

export { processExecutablePath, fixedExecutablePath } from './executable.js';
export { nodeFileSystem } from './fileSystem.js';
export { parseDirlist, expandSystemDirs } from './dirlist.js';
export {
  type ResourceEntry,
  type ListResourcesOptions,
  findResource,
  listResources,
} from './scan.js';
