/**
 * Capabilities the locator needs from its host.
 *
 * Both are injected so the resolution logic can be driven with synthetic
 * executable paths and directory layouts.
 */

import type { ExecutablePath } from '../models/index.js';

/**
 * Returns the absolute path of the running program's own file.
 * Throws StartupError when the host cannot supply it.
 */
export type CurrentExecutablePath = () => ExecutablePath;

/** Read-only filesystem queries used during resolution and scanning */
export interface FileSystemProbe {
  /** Canonical absolute path with every symlink resolved; throws if the path does not exist */
  realpath(path: string): string;
  isDirectory(path: string): boolean;
  isFile(path: string): boolean;
  /** File contents, or undefined when the file does not exist */
  readTextFile(path: string): string | undefined;
  /** Entry names of a directory, or [] when it does not exist */
  listEntries(dir: string): string[];
}

/** Environment variables as read by the locator */
export type EnvSource = Readonly<Record<string, string | undefined>>;
