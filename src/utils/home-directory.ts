/**
 * Home Directory Utilities
 *
 * Centralized module for home directory path handling:
 * display normalization and tilde expansion for configured paths.
 */

import { homedir } from 'os';
import { resolve, normalize } from 'path';

/**
 * Get the home directory path.
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Convert a path under the home directory to tilde notation for display.
 *
 * Other paths are returned normalized but otherwise unchanged.
 *
 * @example
 * normalizePathWithTilde('/home/me/.envsnap/cache') // => '~/.envsnap/cache'
 */
export function normalizePathWithTilde(path: string): string {
  const normalizedPath = normalize(resolve(path));
  const normalizedHome = normalize(getHomeDirectory());

  if (normalizedPath === normalizedHome) {
    return '~/';
  }

  if (normalizedPath.startsWith(normalizedHome + '/')) {
    return '~/' + normalizedPath.slice(normalizedHome.length + 1);
  }

  return normalizedPath;
}

/**
 * Expand tilde notation to a full home directory path.
 *
 * Used for library paths read from the config file.
 */
export function expandTilde(path: string): string {
  if (path === '~' || path === '~/') {
    return getHomeDirectory();
  }

  if (path.startsWith('~/')) {
    return resolve(getHomeDirectory(), path.slice(2));
  }

  return path;
}
