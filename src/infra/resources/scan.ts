/**
 * Scanning the search path for resource files.
 *
 * Directories that do not exist contribute nothing.
 */

import { extname, isAbsolute, join } from 'node:path';
import type { FileSystemProbe } from '../../core/locator/index.js';
import type { SearchPathList } from '../../core/models/index.js';
import { isPathSafe } from '../config/paths.js';

export interface ResourceEntry {
  /** File name relative to its directory */
  name: string;
  /** Absolute path of the file */
  path: string;
  /** Search path directory that provided it */
  dir: string;
}

export interface ListResourcesOptions {
  /** Only files with this extension, with or without the leading dot */
  extension?: string;
}

/** Resource names are relative to a search path directory and must stay inside it */
function resolveInDir(dir: string, name: string): string {
  const path = join(dir, name);
  if (name.length === 0 || isAbsolute(name) || !isPathSafe(dir, path)) {
    throw new Error(`Invalid resource name: ${name}`);
  }
  return path;
}

/** First file named `name` in priority order, or undefined */
export function findResource(
  searchPath: SearchPathList,
  name: string,
  fs: Pick<FileSystemProbe, 'isFile'>,
): ResourceEntry | undefined {
  for (const dir of searchPath) {
    const path = resolveInDir(dir, name);
    if (fs.isFile(path)) {
      return { name, path, dir };
    }
  }
  return undefined;
}

function normalizeExtension(extension: string): string {
  return extension.startsWith('.') ? extension : `.${extension}`;
}

/**
 * Files directly inside each search path directory.
 * A file name seen in a higher-priority directory shadows later ones.
 */
export function listResources(
  searchPath: SearchPathList,
  fs: Pick<FileSystemProbe, 'listEntries' | 'isFile'>,
  options: ListResourcesOptions = {},
): ResourceEntry[] {
  const extension = options.extension ? normalizeExtension(options.extension) : undefined;
  const seen = new Set<string>();
  const entries: ResourceEntry[] = [];

  for (const dir of searchPath) {
    for (const name of fs.listEntries(dir)) {
      if (seen.has(name)) continue;
      if (extension && extname(name) !== extension) continue;
      const path = join(dir, name);
      if (!fs.isFile(path)) continue;
      seen.add(name);
      entries.push({ name, path, dir });
    }
  }

  return entries;
}
