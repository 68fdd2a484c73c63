export type {
  ExecutablePath,
  RootSource,
  RootResolution,
  ToolIdentity,
  TraceToolConfig,
  DebugConfig,
  RelocConfig,
  SearchPathList,
  SearchPathLayers,
  SearchPathLayer,
} from './types.js';

export {
  LogLevelSchema,
  DebugConfigSchema,
  TraceToolConfigSchema,
  ConfigFileSchema,
  type ConfigFile,
} from './schemas.js';
