/**
 * Config module - exports all configuration utilities
 */

export * from './paths.js';
export * from './loadConfig.js';
export { envVarNameFromPath, applyConfigEnvOverrides } from './env/config-env-overrides.js';
