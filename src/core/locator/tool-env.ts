import type { ToolIdentity } from '../models/index.js';
import { TOOL_ENV_SUFFIXES } from '../../shared/constants.js';

/** Env var names recognized for one tool */
export interface ToolEnvNames {
  uninstalled: string;
  libdir: string;
  extraIncludes: string;
}

/** Convert a camelCase, dotted or dashed name to an UPPER_SNAKE env segment */
export function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

/** Default env prefix for a package name: aclocal -> ACLOCAL, my-tool -> MY_TOOL */
export function defaultEnvPrefix(packageName: string): string {
  return normalizeEnvSegment(packageName);
}

export function toolEnvNames(tool: ToolIdentity): ToolEnvNames {
  return {
    uninstalled: `${tool.envPrefix}_${TOOL_ENV_SUFFIXES.uninstalled}`,
    libdir: `${tool.envPrefix}_${TOOL_ENV_SUFFIXES.libdir}`,
    extraIncludes: `${tool.envPrefix}_${TOOL_ENV_SUFFIXES.extraIncludes}`,
  };
}
