import type { PackageMetadataStore } from '../metadata/types.js';
import type { RuntimeProbe } from '../runtime/r-runtime.js';
import type { DependencyResolverOptions } from '../resolver/types.js';
import type { Snapshot, SnapshotEntry } from './types.js';
import { resolveDependencies, sortByInstallOrder } from '../resolver/dependency-resolver.js';
import { RUNTIME_PACKAGE } from '../../constants/index.js';
import { PackageNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface SnapshotBuilderDeps extends DependencyResolverOptions {
  store: PackageMetadataStore;
  runtime: RuntimeProbe;
}

/**
 * Record the versions of every package `rootPackage` needs, in install order.
 *
 * The runtime entry comes first and the root package last. Nothing is returned
 * unless every package in the closure has an installed version.
 *
 * @throws PackageNotFoundError when the root or any dependency is not installed
 */
export async function buildSnapshot(rootPackage: string, deps: SnapshotBuilderDeps): Promise<Snapshot> {
  const { store, runtime, onWarning } = deps;

  const dependencies = sortByInstallOrder(await resolveDependencies(rootPackage, store, { onWarning }));
  const packages = [...dependencies.map(entry => entry.name), rootPackage];

  const entries: SnapshotEntry[] = [{ package: RUNTIME_PACKAGE, version: await runtime.version() }];
  for (const name of packages) {
    const version = await store.installedVersion(name);
    if (version === undefined) {
      throw new PackageNotFoundError(name, { rootPackage });
    }
    entries.push({ package: name, version });
  }

  logger.debug(`Built snapshot of ${rootPackage}`, { entries: entries.length });
  return entries;
}
