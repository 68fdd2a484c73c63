/**
 * Error handling utilities
 */

/**
 * Raised when the running executable cannot locate itself.
 * Resource lookup cannot proceed without it, so this is always fatal.
 */
export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StartupError';
  }
}

/** Raised for an unreadable or invalid configuration file or override */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly source?: string,
  ) {
    super(source ? `${message} (${source})` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node.js system error code (ENOENT, ENOTDIR, ...) if present */
export function getErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
