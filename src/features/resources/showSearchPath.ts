import { describeSearchPath } from '../../core/locator/index.js';
import { EXIT_SUCCESS } from '../../exitCodes.js';
import { output } from '../../shared/ui/index.js';
import { locate, type CommandContext } from './context.js';

export interface ShowSearchPathOptions {
  /** Prefix each directory with the layer that contributed it */
  layers?: boolean;
}

export function showSearchPath(context: CommandContext, options: ShowSearchPathOptions = {}): number {
  const located = locate(context);

  if (options.layers) {
    for (const { layer, dir } of describeSearchPath(located.layers)) {
      output(`${layer}\t${dir}`);
    }
  } else {
    for (const dir of located.searchPath) {
      output(dir);
    }
  }
  return EXIT_SUCCESS;
}
