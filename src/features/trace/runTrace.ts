import { EXIT_CONFIG_INVALID, EXIT_SUCCESS } from '../../exitCodes.js';
import { formatTraceCommand, resolveTraceCommand, runTraceTool } from '../../infra/trace/index.js';
import { debug, error } from '../../shared/ui/index.js';
import type { CommandContext } from '../resources/index.js';

/**
 * Run the trace companion with `args` and echo its stdout.
 * A missing companion is reported but still exits successfully.
 */
export function runTrace(context: CommandContext, args: readonly string[]): number {
  const { traceTool } = context.config;
  if (!traceTool) {
    error('No trace_tool configured');
    return EXIT_CONFIG_INVALID;
  }

  const trace = resolveTraceCommand(traceTool, context.env);
  debug(`Trace command (${trace.source}): ${formatTraceCommand(trace)}`);

  const result = runTraceTool(trace, args, context.cwd);
  if (result.stdout) {
    process.stdout.write(result.stdout);
  }
  return EXIT_SUCCESS;
}
