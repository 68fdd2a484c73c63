/**
 * Process exit codes for reloc CLI
 *
 * Callers such as build scripts can tell a broken install
 * apart from a missing resource.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_STARTUP_FAILED = 2;
export const EXIT_CONFIG_INVALID = 3;
export const EXIT_RESOURCE_NOT_FOUND = 4;
