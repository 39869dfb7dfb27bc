import * as os from 'os';
import * as path from 'path';
import { EnvsnapDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENVSNAP_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Directory resolution
 *
 * Uses ~/.envsnap on all platforms (like AWS CLI with ~/.aws).
 */
export function getEnvsnapDirectories(homeDir: string = os.homedir()): EnvsnapDirectories {
  const envsnapDir = path.join(homeDir, DIR_PATTERNS.ENVSNAP);

  return {
    config: envsnapDir,
    data: envsnapDir,  // Same directory - follows dotfile convention
    cache: path.join(envsnapDir, ENVSNAP_DIRS.CACHE),
    runtime: path.join(os.tmpdir(), ENVSNAP_DIRS.RUNTIME)
  };
}

/**
 * Ensure all envsnap directories exist
 */
export async function ensureEnvsnapDirectories(): Promise<EnvsnapDirectories> {
  const envsnapDirs = getEnvsnapDirectories();

  try {
    await Promise.all([
      ensureDir(envsnapDirs.config),
      ensureDir(envsnapDirs.data),
      ensureDir(envsnapDirs.cache),
      ensureDir(envsnapDirs.runtime)
    ]);

    logger.debug('envsnap directories ensured', { directories: envsnapDirs });
    return envsnapDirs;
  } catch (error) {
    logger.error('Failed to create envsnap directories', { error, directories: envsnapDirs });
    throw error;
  }
}

/**
 * Directory downloaded source archives are cached in
 */
export function getTarballCacheDirectory(dirs: EnvsnapDirectories = getEnvsnapDirectories()): string {
  return path.join(dirs.cache, ENVSNAP_DIRS.TARBALLS);
}
