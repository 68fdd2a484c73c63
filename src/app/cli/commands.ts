/**
 * CLI subcommand definitions
 *
 * Registers all named subcommands (root, path, find, list, env, trace).
 */

import {
  findResourceFile,
  listResourceFiles,
  showEnvironment,
  showResourceRoot,
  showSearchPath,
} from '../../features/resources/index.js';
import { runTrace } from '../../features/trace/index.js';
import type { CliProgram } from './program.js';

export function registerCommands(cli: CliProgram): void {
  const { program } = cli;

  program
    .command('root')
    .description('Print the bundled resource directories')
    .action(() => {
      cli.exitCode = showResourceRoot(cli.getContext());
    });

  program
    .command('path')
    .description('Print the resource search path, highest priority first')
    .option('--layers', 'Prefix each directory with its layer (user, bundled, system, extra)')
    .action((opts: { layers?: boolean }) => {
      cli.exitCode = showSearchPath(cli.getContext(), { layers: opts.layers === true });
    });

  program
    .command('find')
    .description('Print the first resource file with the given name')
    .argument('<name>', 'File name relative to a search path directory')
    .action((name: string) => {
      cli.exitCode = findResourceFile(cli.getContext(), name);
    });

  program
    .command('list')
    .description('List visible resource files (first match per file name)')
    .option('--ext <extension>', 'Only files with this extension (e.g. .m4)')
    .action((opts: { ext?: string }) => {
      cli.exitCode = listResourceFiles(cli.getContext(), { extension: opts.ext });
    });

  program
    .command('env')
    .description('Show the tool environment variables in effect')
    .action(() => {
      cli.exitCode = showEnvironment(cli.getContext());
    });

  program
    .command('trace')
    .description('Run the trace companion tool with the given arguments')
    .argument('[args...]', 'Arguments passed to the trace tool')
    .allowUnknownOption()
    .action((args: string[]) => {
      cli.exitCode = runTrace(cli.getContext(), args);
    });
}
