import type { EnvsnapConfig } from '../../types/index.js';
import type { PackageMetadataStore } from '../metadata/types.js';
import { LibraryMetadataStore } from '../metadata/library-store.js';
import { RscriptRuntime, type RuntimeProbe } from './r-runtime.js';
import { logger } from '../../utils/logger.js';

/**
 * The live R installation a command works against.
 */
export interface REnvironment {
  runtime: RuntimeProbe;
  store: PackageMetadataStore;
}

export interface OpenEnvironmentOptions {
  /** Library packages are installed into; searched before every other library */
  installLibrary?: string;
}

/**
 * Connect to the R installation described by `config`.
 *
 * Library paths come from the config when set, otherwise from R itself.
 * An install library always comes first, so packages a restore installs
 * there are seen by the next entry's lookup.
 */
export async function openREnvironment(
  config: Pick<EnvsnapConfig, 'rscript' | 'libraryPaths'>,
  options: OpenEnvironmentOptions = {}
): Promise<REnvironment> {
  const runtime = new RscriptRuntime(config.rscript);
  const configured = config.libraryPaths ?? await runtime.libraryPaths();
  const libraryPaths = options.installLibrary
    ? [options.installLibrary, ...configured.filter(path => path !== options.installLibrary)]
    : configured;

  logger.debug('Opened R environment', { rscript: config.rscript, libraryPaths });
  return {
    runtime,
    store: new LibraryMetadataStore(libraryPaths)
  };
}
