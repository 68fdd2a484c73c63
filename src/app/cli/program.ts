/**
 * Commander program setup
 *
 * Creates the Command instance, registers global options,
 * and sets up the preAction hook that loads config and logging.
 */

import { createRequire } from 'node:module';
import { resolve } from 'node:path';
import { Command } from 'commander';
import type { EnvSource, FileSystemProbe } from '../../core/locator/index.js';
import type { CommandContext } from '../../features/resources/index.js';
import { loadConfig } from '../../infra/config/index.js';
import {
  fixedExecutablePath,
  nodeFileSystem,
  processExecutablePath,
} from '../../infra/resources/index.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { createLogger, initDebugLogger, setVerboseConsole } from '../../shared/utils/debug.js';
import { collectInclude, resolveIncludes } from './helpers.js';

const require = createRequire(import.meta.url);
const { version: cliVersion } = require('../../../package.json') as { version: string };

const log = createLogger('cli');

export { cliVersion };

/** Host state the CLI reads; replaced in tests */
export interface CliRuntime {
  argv: readonly string[];
  env: EnvSource;
  cwd: string;
  fs?: FileSystemProbe;
}

type GlobalOptions = {
  verbose?: boolean;
  include: string[];
  exe?: string;
};

/** Program plus access to the context built by the preAction hook */
export interface CliProgram {
  program: Command;
  getContext(): CommandContext;
  /** Exit code set by the last command action */
  exitCode: number;
}

export function createProgram(runtime: CliRuntime): CliProgram {
  const program = new Command();
  let context: CommandContext | undefined;

  const cli: CliProgram = {
    program,
    getContext() {
      if (!context) {
        throw new Error('CLI context requested before initialization');
      }
      return context;
    },
    exitCode: 0,
  };

  program
    .name('reloc')
    .description('Locate the bundled resources of a relocatable tool')
    .version(cliVersion)
    .exitOverride();

  program
    .option('--verbose', 'Verbose output (debug log level, log lines on stderr)')
    .option('-I, --include <dir>', 'Add a user include directory (repeatable, highest priority)', collectInclude, [])
    .option('--exe <path>', 'Use this absolute path as the running executable');

  program.hook('preAction', () => {
    const opts = program.opts<GlobalOptions>();
    const cwd = resolve(runtime.cwd);
    const config = loadConfig({ projectDir: cwd, env: runtime.env });
    const verbose = opts.verbose === true || config.verbose;

    let debugConfig = config.debug;
    if (verbose && (!debugConfig || !debugConfig.enabled)) {
      debugConfig = { enabled: true };
    }
    initDebugLogger(debugConfig, cwd);

    if (verbose) {
      setVerboseConsole(true);
      setLogLevel('debug');
    } else {
      setLogLevel(config.logLevel);
    }

    context = {
      config,
      env: runtime.env,
      cwd,
      userIncludes: resolveIncludes(opts.include, cwd),
      currentExecutablePath: opts.exe ? fixedExecutablePath(opts.exe) : processExecutablePath(runtime.argv, () => cwd),
      fs: runtime.fs ?? nodeFileSystem,
    };

    log.info('reloc starting', { version: cliVersion, cwd, verbose, tool: config.tool });
  });

  return cli;
}
