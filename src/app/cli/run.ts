import { error } from '../../shared/ui/index.js';
import { createLogger } from '../../shared/utils/debug.js';
import { getErrorMessage } from '../../shared/utils/error.js';
import { CommanderError } from 'commander';
import { registerCommands } from './commands.js';
import { createProgram, type CliRuntime } from './program.js';
import { exitCodeForError } from './helpers.js';

const log = createLogger('cli');

/** Parse argv, run the selected command and return the exit code */
export async function runCli(runtime: CliRuntime): Promise<number> {
  const cli = createProgram(runtime);
  registerCommands(cli);

  try {
    await cli.program.parseAsync([...runtime.argv]);
    return cli.exitCode;
  } catch (err) {
    // Commander has already printed its own usage, help and version output
    if (!(err instanceof CommanderError)) {
      error(getErrorMessage(err));
      log.error('Command failed', { error: getErrorMessage(err) });
    }
    return exitCodeForError(err);
  }
}
