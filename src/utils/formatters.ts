import { relative, isAbsolute } from 'path';
import { DETAIL_LIST_LIMIT } from '../constants/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file path for display relative to `root`.
 *
 * Paths inside `root` are shown relative with forward slashes; anything
 * else (including relative input) is returned unchanged.
 *
 * @example
 * formatPathForDisplay('/games/x/data/a.txt', '/games/x') // => 'data/a.txt'
 */
export function formatPathForDisplay(path: string, root: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(root, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath.split('\\').join('/');
  }

  return path;
}

/**
 * Sorted display list capped at `limit` lines, with a trailing
 * "... and N more" line when entries were left out.
 */
export function formatFileList(paths: string[], root: string, limit: number = DETAIL_LIST_LIMIT): string {
  const displayFiles = paths
    .map(p => formatPathForDisplay(p, root))
    .sort((a, b) => a.localeCompare(b));
  const shown = displayFiles.slice(0, limit).join('\n');
  return displayFiles.length > limit
    ? `${shown}\n... and ${displayFiles.length - limit} more`
    : shown;
}

/**
 * `1 file` / `3 files`
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
