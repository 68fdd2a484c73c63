/** Name of the per-user and per-project config directory */
export const CONFIG_DIR_NAME = '.reloc';

/** Config file name inside the config directory */
export const CONFIG_FILE_NAME = 'config.yaml';

/** Default offset from the executable's directory to the resource tree */
export const DEFAULT_RESOURCE_OFFSET = '../res';

/** File inside a system resource directory that lists further directories */
export const DIRLIST_FILE_NAME = 'dirlist';

/** Launcher used when no trace tool override is set */
export const ENV_LAUNCHER = '/usr/bin/env';

/** Separators accepted in the extra includes variable */
export const EXTRA_INCLUDES_SEPARATOR = /[:;]/;

/** Suffixes appended to the tool env prefix */
export const TOOL_ENV_SUFFIXES = {
  uninstalled: 'UNINSTALLED',
  libdir: 'LIBDIR',
  extraIncludes: 'EXTRA_INCLUDES',
} as const;
