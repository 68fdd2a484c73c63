/**
 * Resource commands
 */

export { type CommandContext, locate } from './context.js';
export { showResourceRoot } from './showRoot.js';
export { showSearchPath, type ShowSearchPathOptions } from './showSearchPath.js';
export { findResourceFile } from './findResourceFile.js';
export { listResourceFiles, type ListResourceFilesOptions } from './listResourceFiles.js';
export { showEnvironment } from './showEnvironment.js';
