export type { CurrentExecutablePath, FileSystemProbe, EnvSource } from './ports.js';
export {
  type RootChainContext,
  type RootStrategy,
  versionedResourceName,
  computeRelocatableRoot,
  libdirStrategy,
  uninstalledStrategy,
  relocatableStrategy,
  ROOT_STRATEGIES,
  resolveResourceRoot,
} from './root-chain.js';
export { type ToolEnvNames, normalizeEnvSegment, defaultEnvPrefix, toolEnvNames } from './tool-env.js';
export { parseExtraIncludes } from './extra-includes.js';
export { SEARCH_PATH_LAYER_ORDER, composeSearchPath, describeSearchPath } from './search-path.js';
