/**
 * CLI helper functions
 */

import { resolve } from 'node:path';
import { CommanderError } from 'commander';
import {
  EXIT_CONFIG_INVALID,
  EXIT_GENERAL_ERROR,
  EXIT_STARTUP_FAILED,
} from '../../exitCodes.js';
import { ConfigError, StartupError } from '../../shared/utils/error.js';

/** Commander option reducer for repeatable -I */
export function collectInclude(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** Resolve -I directories against the working directory */
export function resolveIncludes(includes: readonly string[], cwd: string): string[] {
  return includes.map((dir) => resolve(cwd, dir));
}

/** Map an error escaping a command to a process exit code */
export function exitCodeForError(err: unknown): number {
  if (err instanceof CommanderError) return err.exitCode;
  if (err instanceof StartupError) return EXIT_STARTUP_FAILED;
  if (err instanceof ConfigError) return EXIT_CONFIG_INVALID;
  return EXIT_GENERAL_ERROR;
}
