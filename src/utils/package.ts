import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const UNKNOWN_VERSION = '0.0.0';

let cachedVersion: string | undefined;

/**
 * Version of the CLI, read from the package.json above this module.
 * Works from the sources (src/utils) and from the build (dist/src/utils).
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const manifestPath = join(dir, 'package.json');
    if (existsSync(manifestPath)) {
      const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
      if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
        cachedVersion = manifest.version;
        return cachedVersion;
      }
    }
    dir = dirname(dir);
  }

  cachedVersion = UNKNOWN_VERSION;
  return cachedVersion;
}
