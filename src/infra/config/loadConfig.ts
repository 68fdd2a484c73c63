/**
 * Configuration loader
 *
 * Layers, later wins: ~/.reloc/config.yaml, <project>/.reloc/config.yaml,
 * RELOC_* environment variables.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { defaultEnvPrefix, type EnvSource } from '../../core/locator/index.js';
import { ConfigFileSchema } from '../../core/models/index.js';
import type { ConfigFile, RelocConfig } from '../../core/models/index.js';
import { DEFAULT_RESOURCE_OFFSET } from '../../shared/constants.js';
import { ConfigError, getErrorMessage } from '../../shared/utils/error.js';
import { createLogger } from '../../shared/utils/debug.js';
import { applyConfigEnvOverrides } from './env/config-env-overrides.js';
import { getGlobalConfigPath, getProjectConfigPath } from './paths.js';

const log = createLogger('config');

export interface LoadConfigOptions {
  projectDir: string;
  env?: EnvSource;
}

/** Read one YAML config file into a raw record; a missing file yields {} */
export function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse config: ${getErrorMessage(err)}`, path);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('Config must be a YAML mapping', path);
  }
  return { ...parsed };
}

function validate(raw: Record<string, unknown>, source: string): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue ? issue.path.map(String).join('.') : '';
    const message = issue ? issue.message : 'invalid configuration';
    throw new ConfigError(key ? `Invalid config key '${key}': ${message}` : message, source);
  }
  return result.data;
}

function resolveDirs(dirs: string[] | undefined, baseDir: string): string[] {
  return (dirs ?? []).map((dir) => resolve(baseDir, dir));
}

export function loadConfig(options: LoadConfigOptions): RelocConfig {
  const { projectDir, env = process.env } = options;
  const globalPath = getGlobalConfigPath(env);
  const projectPath = getProjectConfigPath(projectDir);

  const globalRaw = validate(readConfigFile(globalPath), globalPath);
  const projectRaw = validate(readConfigFile(projectPath), projectPath);

  const merged: Record<string, unknown> = { ...globalRaw, ...projectRaw };
  applyConfigEnvOverrides(merged, env);
  const file = validate(merged, 'environment');

  if (!file.package) {
    throw new ConfigError("Missing required config key 'package' (set it in a config file or RELOC_PACKAGE)");
  }
  if (!file.api_version) {
    throw new ConfigError("Missing required config key 'api_version' (set it in a config file or RELOC_API_VERSION)");
  }

  const config: RelocConfig = {
    tool: {
      packageName: file.package,
      apiVersion: file.api_version,
      envPrefix: file.env_prefix ?? defaultEnvPrefix(file.package),
    },
    resourceOffset: file.resource_offset ?? DEFAULT_RESOURCE_OFFSET,
    includes: resolveDirs(file.includes, projectDir),
    systemDirs: resolveDirs(file.system_dirs, projectDir),
    developmentDirs: resolveDirs(file.development_dirs, projectDir),
    traceTool: file.trace_tool
      ? { envVar: file.trace_tool.env_var, companion: file.trace_tool.companion }
      : undefined,
    logLevel: file.log_level ?? 'info',
    debug: file.debug
      ? { enabled: file.debug.enabled ?? false, logFile: file.debug.log_file }
      : undefined,
    verbose: file.verbose ?? false,
  };

  log.debug('Config loaded', { globalPath, projectPath, tool: config.tool });
  return config;
}
