import { toolEnvNames } from '../../core/locator/index.js';
import { EXIT_SUCCESS } from '../../exitCodes.js';
import { status } from '../../shared/ui/index.js';
import type { CommandContext } from './context.js';

const UNSET = '(unset)';

/** Show the tool environment variables and their current values */
export function showEnvironment(context: CommandContext): number {
  const { config, env } = context;
  const names = toolEnvNames(config.tool);

  const rows: Array<[string, string | undefined]> = [
    [names.libdir, env[names.libdir]],
    [names.uninstalled, env[names.uninstalled]],
    [names.extraIncludes, env[names.extraIncludes]],
  ];
  if (config.traceTool) {
    rows.push([config.traceTool.envVar, env[config.traceTool.envVar]]);
  }

  for (const [name, value] of rows) {
    if (value) {
      status(name, value, 'green');
    } else {
      status(name, UNSET);
    }
  }
  return EXIT_SUCCESS;
}
