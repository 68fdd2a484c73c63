import { EXTRA_INCLUDES_SEPARATOR } from '../../shared/constants.js';

/**
 * Parse a `:`/`;`-delimited list of extra include directories.
 *
 * Keeps the first occurrence of each entry and drops empty entries and
 * entries that are not existing directories. Dropped entries are not errors.
 */
export function parseExtraIncludes(
  raw: string | undefined,
  isDirectory: (path: string) => boolean,
): string[] {
  if (!raw) return [];

  const unique = new Set<string>();
  for (const entry of raw.split(EXTRA_INCLUDES_SEPARATOR)) {
    if (entry.length > 0) {
      unique.add(entry);
    }
  }

  return [...unique].filter((entry) => isDirectory(entry));
}
