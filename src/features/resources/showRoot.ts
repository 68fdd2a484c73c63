import { EXIT_SUCCESS } from '../../exitCodes.js';
import { debug, output, warn } from '../../shared/ui/index.js';
import { locate, type CommandContext } from './context.js';

/** Print the tool's own resource directories, one per line */
export function showResourceRoot(context: CommandContext): number {
  const { root } = locate(context);
  debug(`Resource root source: ${root.source}`);

  if (root.dirs.length === 0) {
    warn('Uninstalled mode is active but no development_dirs are configured');
  }
  for (const dir of root.dirs) {
    output(dir);
  }
  return EXIT_SUCCESS;
}
