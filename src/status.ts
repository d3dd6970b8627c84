/**
 * Parsing for `git status --porcelain -z` output.
 *
 * Turns the porcelain v1 records into structured entries and splits them into
 * changes inside the fragment directory and changes elsewhere.
 */

import { StatusEntry } from './types';

/**
 * Parse NUL-terminated porcelain v1 status output (`git status --porcelain -z`).
 *
 * Handles:
 * - `XY path` for ordinary changes and untracked files (`??`)
 * - renames and copies, where the source path follows as its own NUL field
 *
 * With `-z` git prints paths verbatim, so names with spaces or non-ASCII
 * characters need no unquoting.
 *
 * @param output - Raw stdout of `git status --porcelain -z`
 * @returns One entry per record, in git's order
 */
export function parsePorcelain(output: string): StatusEntry[] {
  const entries: StatusEntry[] = [];
  const fields = output.split('\0');

  for (let i = 0; i < fields.length; i++) {
    const field = fields[i];
    if (field.length < 4) {
      continue;
    }

    const index = field[0];
    const workTree = field[1];
    const path = field.slice(3);

    if (index === 'R' || index === 'C') {
      i += 1;
      entries.push({ index, workTree, path, originalPath: fields[i] ?? null });
      continue;
    }

    entries.push({ index, workTree, path, originalPath: null });
  }

  return entries;
}

/**
 * Normalize a directory input to the form git prints: no `./` prefix, no trailing slash.
 */
export function normalizeDirectory(dir: string): string {
  return dir.replace(/^(\.\/)+/, '').replace(/\/+$/, '');
}

/**
 * Whether a repository-relative path lies inside `dir`.
 */
export function isUnderDirectory(path: string, dir: string): boolean {
  const normalized = normalizeDirectory(dir);
  if (normalized === '' || normalized === '.') {
    return true;
  }
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === normalized || trimmed.startsWith(`${normalized}/`);
}

/**
 * Split status entries into fragment changes and everything else.
 */
export function partitionByDirectory(
  entries: StatusEntry[],
  dir: string
): { inside: StatusEntry[]; outside: StatusEntry[] } {
  const inside: StatusEntry[] = [];
  const outside: StatusEntry[] = [];
  for (const entry of entries) {
    (isUnderDirectory(entry.path, dir) ? inside : outside).push(entry);
  }
  return { inside, outside };
}
