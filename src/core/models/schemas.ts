/**
 * Zod schemas for configuration validation
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';

const ENV_NAME_PATTERN = /^[A-Z_][A-Z0-9_]*$/;

const DirListSchema = z.array(z.string().min(1));

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const DebugConfigSchema = z.object({
  enabled: z.boolean().optional(),
  log_file: z.string().min(1).optional(),
}).strict();

export const TraceToolConfigSchema = z.object({
  env_var: z.string().regex(ENV_NAME_PATTERN, 'must be an UPPER_SNAKE environment variable name'),
  companion: z.string().min(1),
}).strict();

/**
 * Config file schema (~/.reloc/config.yaml, .reloc/config.yaml).
 * Every key is optional here; required keys are checked after merging layers.
 */
export const ConfigFileSchema = z.object({
  package: z.string().min(1).optional(),
  api_version: z.string().min(1).optional(),
  env_prefix: z.string().regex(ENV_NAME_PATTERN, 'must be an UPPER_SNAKE environment variable prefix').optional(),
  resource_offset: z.string().min(1).optional(),
  includes: DirListSchema.optional(),
  system_dirs: DirListSchema.optional(),
  development_dirs: DirListSchema.optional(),
  trace_tool: TraceToolConfigSchema.optional(),
  log_level: LogLevelSchema.optional(),
  debug: DebugConfigSchema.optional(),
  verbose: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
