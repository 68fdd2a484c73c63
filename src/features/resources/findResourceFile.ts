import { EXIT_RESOURCE_NOT_FOUND, EXIT_SUCCESS } from '../../exitCodes.js';
import { findResource } from '../../infra/resources/index.js';
import { error, output } from '../../shared/ui/index.js';
import { locate, type CommandContext } from './context.js';

export function findResourceFile(context: CommandContext, name: string): number {
  const { searchPath } = locate(context);
  const found = findResource(searchPath, name, context.fs);

  if (!found) {
    error(`Resource not found: ${name} (searched ${searchPath.length} directories)`);
    return EXIT_RESOURCE_NOT_FOUND;
  }
  output(found.path);
  return EXIT_SUCCESS;
}
