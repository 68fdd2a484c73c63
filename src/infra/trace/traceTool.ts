/**
 * External trace/introspection companion.
 *
 * The command comes from the configured env var when it is set; otherwise
 * the companion is found through `/usr/bin/env` at run time instead of a
 * path fixed at install time.
 */

import { execFileSync } from 'node:child_process';
import type { EnvSource } from '../../core/locator/index.js';
import type { TraceToolConfig } from '../../core/models/index.js';
import { ENV_LAUNCHER } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/debug.js';
import { getErrorCode } from '../../shared/utils/error.js';
import { warn } from '../../shared/ui/index.js';

const log = createLogger('trace');

/** Exit status of `env` when the program cannot be found */
const ENV_NOT_FOUND_STATUS = 127;

export interface TraceCommand {
  command: string;
  args: string[];
  source: 'env' | 'default';
}

export interface TraceRunResult {
  /** False when the companion could not be found */
  ran: boolean;
  stdout: string;
}

export function resolveTraceCommand(traceTool: TraceToolConfig, env: EnvSource = process.env): TraceCommand {
  const override = env[traceTool.envVar]?.trim();
  if (override) {
    const [command = override, ...args] = override.split(/\s+/);
    return { command, args, source: 'env' };
  }
  return { command: ENV_LAUNCHER, args: [traceTool.companion], source: 'default' };
}

/** Render a trace command as a single shell-like line */
export function formatTraceCommand(trace: TraceCommand): string {
  return [trace.command, ...trace.args].join(' ');
}

function getExitStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const { status } = err;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Run the trace command synchronously.
 * A missing companion yields an empty result with a warning; any other
 * failure propagates.
 */
export function runTraceTool(trace: TraceCommand, extraArgs: readonly string[], cwd: string): TraceRunResult {
  const args = [...trace.args, ...extraArgs];
  log.debug('Running trace tool', { command: trace.command, args, cwd });

  try {
    const stdout = execFileSync(trace.command, args, {
      cwd,
      encoding: 'utf-8',
      stdio: 'pipe',
    });
    return { ran: true, stdout };
  } catch (err) {
    if (getErrorCode(err) === 'ENOENT' || getExitStatus(err) === ENV_NOT_FOUND_STATUS) {
      warn(`Trace tool not found: ${formatTraceCommand(trace)}`);
      log.error('Trace tool not found', { command: trace.command, args });
      return { ran: false, stdout: '' };
    }
    throw err;
  }
}
