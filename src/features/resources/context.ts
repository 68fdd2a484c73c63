import type { CurrentExecutablePath, EnvSource, FileSystemProbe } from '../../core/locator/index.js';
import type { RelocConfig } from '../../core/models/index.js';
import { locateResources, type LocatedResources } from '../../infra/resources/index.js';

/** Everything a command needs, resolved once by the CLI */
export interface CommandContext {
  config: RelocConfig;
  env: EnvSource;
  cwd: string;
  userIncludes: readonly string[];
  currentExecutablePath: CurrentExecutablePath;
  fs: FileSystemProbe;
}

export function locate(context: CommandContext): LocatedResources {
  return locateResources({
    config: context.config,
    env: context.env,
    userIncludes: context.userIncludes,
    currentExecutablePath: context.currentExecutablePath,
    fs: context.fs,
  });
}
