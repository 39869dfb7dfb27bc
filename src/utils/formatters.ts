import { relative, isAbsolute } from 'path';
import type { Snapshot } from '../core/snapshot/types.js';
import { normalizePathWithTilde } from './home-directory.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Relative paths are returned as-is
 * - Paths inside cwd are shown relative to it
 * - Paths under the home directory use tilde notation
 * - Anything else stays absolute
 *
 * @example
 * formatPathForDisplay('/work/study/inst/settings/snapshot.csv', '/work/study') // => 'inst/settings/snapshot.csv'
 * formatPathForDisplay('/home/me/.envsnap/cache', '/work') // => '~/.envsnap/cache'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return normalizePathWithTilde(path);
}

/**
 * Human-readable wall-clock duration.
 *
 * @example
 * formatDuration(850)     // => '850 ms'
 * formatDuration(3200)    // => '3.2 secs'
 * formatDuration(150000)  // => '2.5 mins'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)} ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)} secs`;
  }
  if (ms < 3_600_000) {
    return `${(ms / 60_000).toFixed(1)} mins`;
  }
  return `${(ms / 3_600_000).toFixed(1)} hours`;
}

/**
 * Render a snapshot as a two-column table (used by the snapshot command)
 */
export function formatSnapshotTable(snapshot: Snapshot): string {
  const width = Math.max(20, ...snapshot.map(entry => entry.package.length + 2));
  const lines = [
    'PACKAGE'.padEnd(width) + 'VERSION',
    '-------'.padEnd(width) + '-------',
    ...snapshot.map(entry => entry.package.padEnd(width) + entry.version)
  ];
  return lines.join('\n');
}
