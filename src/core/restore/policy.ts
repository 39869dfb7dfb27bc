import type { EnvsnapConfig } from '../../types/index.js';
import type { RestorePolicy } from './types.js';

/**
 * Build the restore exception lists from configuration.
 */
export function createRestorePolicy(
  config: Pick<EnvsnapConfig, 'corePackages' | 'alternateRegistry'>
): RestorePolicy {
  return {
    corePackages: new Set(config.corePackages),
    alternateRegistry: {
      url: config.alternateRegistry.url,
      packages: new Set(config.alternateRegistry.packages)
    }
  };
}
