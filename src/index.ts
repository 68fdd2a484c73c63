/**
 * reloc - locate the bundled resources of a relocatable tool
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Resolution logic
export * from './core/locator/index.js';

// Configuration
export * from './infra/config/index.js';

// Filesystem-backed location and scanning
export * from './infra/resources/index.js';

// Trace companion
export * from './infra/trace/index.js';

// Errors and exit codes
export { StartupError, ConfigError, getErrorMessage } from './shared/utils/index.js';
export * from './exitCodes.js';
