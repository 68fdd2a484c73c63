#!/usr/bin/env node

/**
 * reloc CLI entry point
 *
 * Usage:
 *   reloc root              - Print the bundled resource directories
 *   reloc path [--layers]   - Print the resource search path
 *   reloc find <name>       - Print the first matching resource file
 *   reloc list [--ext .m4]  - List visible resource files
 *   reloc env               - Show the tool environment variables
 *   reloc trace [args...]   - Run the trace companion tool
 */

import { runCli } from './run.js';

runCli({ argv: process.argv, env: process.env, cwd: process.cwd() })
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
