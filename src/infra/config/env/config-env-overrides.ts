import type { EnvSource } from '../../../core/locator/index.js';
import { normalizeEnvSegment } from '../../../core/locator/index.js';
import { ConfigError } from '../../../shared/utils/error.js';

type EnvValueType = 'string' | 'boolean' | 'json';

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `RELOC_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): unknown {
  if (type === 'string') {
    return raw;
  }
  if (type === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw new ConfigError(`${envKey} must be one of: true, false`, 'environment');
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigError(`${envKey} must be valid JSON`, 'environment');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const leaf = parts.pop();
  if (!leaf) return;

  let current = target;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = value;
}

const CONFIG_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'package', type: 'string' },
  { path: 'api_version', type: 'string' },
  { path: 'env_prefix', type: 'string' },
  { path: 'resource_offset', type: 'string' },
  { path: 'includes', type: 'json' },
  { path: 'system_dirs', type: 'json' },
  { path: 'development_dirs', type: 'json' },
  { path: 'trace_tool', type: 'json' },
  { path: 'trace_tool.env_var', type: 'string' },
  { path: 'trace_tool.companion', type: 'string' },
  { path: 'log_level', type: 'string' },
  { path: 'debug', type: 'json' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
  { path: 'verbose', type: 'boolean' },
];

/** Apply RELOC_* overrides onto raw (snake_case) config, in place */
export function applyConfigEnvOverrides(target: Record<string, unknown>, env: EnvSource = process.env): void {
  for (const spec of CONFIG_ENV_SPECS) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = env[envKey];
    if (raw === undefined) continue;
    setNested(target, spec.path, parseEnvValue(envKey, raw, spec.type));
  }
}
