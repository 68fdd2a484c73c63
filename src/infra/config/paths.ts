/**
 * Path utilities for reloc configuration
 */

import { homedir } from 'node:os';
import { join, resolve, sep } from 'node:path';
import type { EnvSource } from '../../core/locator/index.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from '../../shared/constants.js';

/** Get reloc global config directory (~/.reloc or RELOC_CONFIG_DIR) */
export function getGlobalConfigDir(env: EnvSource = process.env): string {
  return env.RELOC_CONFIG_DIR || join(homedir(), CONFIG_DIR_NAME);
}

/** Get reloc global config file path */
export function getGlobalConfigPath(env: EnvSource = process.env): string {
  return join(getGlobalConfigDir(env), CONFIG_FILE_NAME);
}

/** Get project reloc config directory (.reloc in project) */
export function getProjectConfigDir(projectDir: string): string {
  return join(resolve(projectDir), CONFIG_DIR_NAME);
}

/** Get project config file path */
export function getProjectConfigPath(projectDir: string): string {
  return join(getProjectConfigDir(projectDir), CONFIG_FILE_NAME);
}

/** Validate path is safe (no directory traversal) */
export function isPathSafe(basePath: string, targetPath: string): boolean {
  const resolvedBase = resolve(basePath);
  const resolvedTarget = resolve(targetPath);
  if (resolvedTarget === resolvedBase) return true;
  const prefix = resolvedBase.endsWith(sep) ? resolvedBase : resolvedBase + sep;
  return resolvedTarget.startsWith(prefix);
}
