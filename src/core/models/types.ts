/**
 * Core type definitions for reloc
 */

import type { LogLevel } from '../../shared/ui/index.js';

/** Absolute path of the running program's own file */
export type ExecutablePath = string;

/** Which branch of the root chain produced the resource directories */
export type RootSource = 'libdir' | 'uninstalled' | 'relocatable';

/** Result of resolving the tool's own resource directories */
export interface RootResolution {
  source: RootSource;
  /** Empty only for the uninstalled branch with no development directories */
  dirs: readonly string[];
}

/** Name, version and environment prefix of the packaged tool */
export interface ToolIdentity {
  packageName: string;
  apiVersion: string;
  /** Prefix of the tool env vars, e.g. ACLOCAL for ACLOCAL_LIBDIR */
  envPrefix: string;
}

/** External trace/introspection companion */
export interface TraceToolConfig {
  /** Env var whose value replaces the default command, e.g. AUTOM4TE */
  envVar: string;
  /** Program launched through /usr/bin/env when envVar is unset */
  companion: string;
}

/** Debug configuration */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

/** Fully merged configuration */
export interface RelocConfig {
  tool: ToolIdentity;
  /** Offset from the executable's directory to the resource tree */
  resourceOffset: string;
  includes: string[];
  systemDirs: string[];
  /** Absolute development directories used in uninstalled mode */
  developmentDirs: string[];
  traceTool?: TraceToolConfig;
  logLevel: LogLevel;
  debug?: DebugConfig;
  verbose: boolean;
}

/** Ordered, read-only list of directories; first match wins */
export type SearchPathList = readonly string[];

/** Search path split by priority layer */
export interface SearchPathLayers {
  user: readonly string[];
  bundled: readonly string[];
  system: readonly string[];
  extra: readonly string[];
}

export type SearchPathLayer = keyof SearchPathLayers;
