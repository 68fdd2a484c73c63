import { EXIT_SUCCESS } from '../../exitCodes.js';
import { listResources } from '../../infra/resources/index.js';
import { info, output } from '../../shared/ui/index.js';
import { locate, type CommandContext } from './context.js';

export interface ListResourceFilesOptions {
  extension?: string;
}

/** Print every visible resource file; shadowed duplicates are omitted */
export function listResourceFiles(context: CommandContext, options: ListResourceFilesOptions = {}): number {
  const { searchPath } = locate(context);
  const entries = listResources(searchPath, context.fs, { extension: options.extension });

  if (entries.length === 0) {
    info('No resources found');
  }
  for (const entry of entries) {
    output(entry.path);
  }
  return EXIT_SUCCESS;
}
