import { readFileSync, readdirSync, realpathSync, statSync } from 'node:fs';
import type { FileSystemProbe } from '../../core/locator/index.js';
import { getErrorCode } from '../../shared/utils/error.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

function isMissing(err: unknown): boolean {
  const code = getErrorCode(err);
  return code !== undefined && MISSING_CODES.has(code);
}

function statOrUndefined(path: string) {
  try {
    return statSync(path);
  } catch (err) {
    if (isMissing(err)) return undefined;
    throw err;
  }
}

/** FileSystemProbe backed by node:fs; missing paths are answers, not errors */
export const nodeFileSystem: FileSystemProbe = {
  realpath(path) {
    return realpathSync(path);
  },

  isDirectory(path) {
    return statOrUndefined(path)?.isDirectory() ?? false;
  },

  isFile(path) {
    return statOrUndefined(path)?.isFile() ?? false;
  },

  readTextFile(path) {
    try {
      return readFileSync(path, 'utf-8');
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
  },

  listEntries(dir) {
    try {
      return readdirSync(dir).sort();
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  },
};
