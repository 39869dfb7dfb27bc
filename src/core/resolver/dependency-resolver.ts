/**
 * Dependency closure resolver
 *
 * Walks a root package's Depends and Imports depth first and records, for every
 * package reached, the deepest level it was reached at. Installing packages in
 * descending level order then always puts a package before its dependents.
 */

import type { PackageMetadataStore } from '../metadata/types.js';
import type { DependencyEntry, DependencyResolverOptions } from './types.js';
import { RUNTIME_PACKAGE } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';

/**
 * Direct requirements of a package: Depends then Imports, without the runtime.
 * Suggests is never consulted; suggested packages may depend back on the root.
 */
async function requiredDependencies(store: PackageMetadataStore, name: string): Promise<string[]> {
  const { mandatory, imported } = await store.declaredDependencies(name);
  return [...mandatory, ...imported].filter(dep => dep !== RUNTIME_PACKAGE);
}

/**
 * Resolve the dependency closure of `rootPackage`.
 *
 * Each package appears once, at the maximum level it was reached at. The root
 * itself is not part of the result. Entries come back in first-reached order.
 *
 * A dependency that leads back onto the current path is a cycle; it is
 * reported through the logger and `onWarning`, and that edge is skipped.
 *
 * @throws PackageNotFoundError when a package in the closure is not installed
 */
export async function resolveDependencies(
  rootPackage: string,
  store: PackageMetadataStore,
  options: DependencyResolverOptions = {}
): Promise<DependencyEntry[]> {
  const levels = new Map<string, number>();
  // Deepest level at which each package's own dependencies have been walked.
  // Walking again from a shallower level cannot raise any recorded level.
  const exploredAt = new Map<string, number>();

  const visit = async (name: string, level: number, path: string[]): Promise<void> => {
    const dependencies = await requiredDependencies(store, name);

    for (const dependency of dependencies) {
      if (path.includes(dependency)) {
        const cycle = [...path.slice(path.indexOf(dependency)), dependency];
        const warning =
          `Circular dependency detected: ${cycle.join(' → ')}\n` +
          `   The edge ${name} → ${dependency} is skipped; review these packages' Depends and Imports.`;
        logger.warn(warning);
        options.onWarning?.(warning);
        continue;
      }

      const known = levels.get(dependency);
      if (known === undefined || level > known) {
        levels.set(dependency, level);
      }

      const explored = exploredAt.get(dependency);
      if (explored !== undefined && explored >= level) {
        continue;
      }
      exploredAt.set(dependency, level);
      await visit(dependency, level + 1, [...path, dependency]);
    }
  };

  await visit(rootPackage, 0, [rootPackage]);

  logger.debug(`Resolved ${levels.size} dependencies of ${rootPackage}`);
  return Array.from(levels, ([name, level]) => ({ name, level }));
}

/**
 * Order entries deepest level first, so every package precedes its dependents.
 * Ties keep first-reached order.
 */
export function sortByInstallOrder(entries: DependencyEntry[]): DependencyEntry[] {
  return [...entries].sort((a, b) => b.level - a.level);
}
