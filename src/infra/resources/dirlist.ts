/**
 * System `dirlist` files.
 *
 * A system resource directory may hold a `dirlist` file naming further
 * directories, one per line. Blank lines and `#` comments are skipped and
 * relative entries resolve against the directory holding the file.
 */

import { join, resolve } from 'node:path';
import type { FileSystemProbe } from '../../core/locator/index.js';
import { DIRLIST_FILE_NAME } from '../../shared/constants.js';

export function parseDirlist(content: string, baseDir: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((line) => resolve(baseDir, line));
}

/** Each system directory followed by the entries of its dirlist file, if any */
export function expandSystemDirs(
  systemDirs: readonly string[],
  fs: Pick<FileSystemProbe, 'readTextFile'>,
): string[] {
  return systemDirs.flatMap((dir) => {
    const content = fs.readTextFile(join(dir, DIRLIST_FILE_NAME));
    return content === undefined ? [dir] : [dir, ...parseDirlist(content, dir)];
  });
}
