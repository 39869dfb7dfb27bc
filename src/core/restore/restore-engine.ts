/**
 * Restore engine
 *
 * Walks a snapshot in order and brings each package to its pinned version:
 * skip what is part of the runtime or already satisfied, install the rest one
 * at a time. The snapshot's order already puts dependencies first, so no
 * install resolves dependencies of its own.
 */

import type { Snapshot, SnapshotEntry } from '../snapshot/types.js';
import type {
  RestoreAction,
  RestoreDecision,
  RestoreDeps,
  RestoreOptions,
  RestorePolicy,
  RestoreReport,
  SourceHint
} from './types.js';
import { alternateRegistryUrl } from './registry-urls.js';
import { resolveOutput } from '../ports/resolve.js';
import { RUNTIME_PACKAGE } from '../../constants/index.js';
import { isNewerCompatible } from '../../utils/version-compare.js';
import { MalformedVersionError, RuntimeVersionMismatchError, SnapshotFormatError } from '../../utils/errors.js';
import { formatDuration } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';

/**
 * isNewerCompatible, with unparseable versions counted as incompatible.
 */
function installedIsCompatible(installedVersion: string, requiredVersion: string): boolean {
  try {
    return isNewerCompatible(installedVersion, requiredVersion);
  } catch (error) {
    if (error instanceof MalformedVersionError) {
      logger.debug(`Treating ${installedVersion} as incompatible with ${requiredVersion}`, { reason: error.message });
      return false;
    }
    throw error;
  }
}

/**
 * Decide what to do with one package, given the version currently installed
 * (undefined when it is not installed). The first matching rule wins:
 *
 * 1. core package            → skip-core
 * 2. exact version installed → skip-up-to-date
 * 3. not strict, same major and newer installed → skip-compatible-newer
 * 4. alternate-registry package → install-alternate
 * 5. otherwise               → install-primary
 */
export function chooseRestoreAction(
  name: string,
  requiredVersion: string,
  installedVersion: string | undefined,
  policy: RestorePolicy,
  strict: boolean
): RestoreAction {
  if (policy.corePackages.has(name)) {
    return 'skip-core';
  }
  if (installedVersion !== undefined && installedVersion === requiredVersion) {
    return 'skip-up-to-date';
  }
  if (!strict && installedVersion !== undefined && installedIsCompatible(installedVersion, requiredVersion)) {
    return 'skip-compatible-newer';
  }
  if (policy.alternateRegistry.packages.has(name)) {
    return 'install-alternate';
  }
  return 'install-primary';
}

function sourceFor(action: RestoreAction, entry: SnapshotEntry, policy: RestorePolicy): SourceHint | undefined {
  switch (action) {
    case 'install-alternate':
      return { kind: 'alternate', url: alternateRegistryUrl(policy.alternateRegistry.url, entry.package, entry.version) };
    case 'install-primary':
      return { kind: 'primary' };
    default:
      return undefined;
  }
}

/**
 * One-line report of a decision, as shown to the user.
 */
export function describeDecision(decision: RestoreDecision, dryRun: boolean = false): string {
  const { package: name, requiredVersion, installedVersion } = decision;

  switch (decision.action) {
    case 'skip-core':
      return `Skipping ${name} (${requiredVersion}) because it is part of R core`;
    case 'skip-up-to-date':
      return `Skipping ${name} (${requiredVersion}) because the correct version is already installed`;
    case 'skip-compatible-newer':
      return `Skipping ${name} because installed version (${installedVersion}) is newer than required version (${requiredVersion}), and major version number is the same`;
    case 'install-alternate':
    case 'install-primary': {
      const verb = dryRun ? 'Would install' : 'Installing';
      return installedVersion !== undefined
        ? `${verb} ${name} because version ${requiredVersion} needed but version ${installedVersion} found`
        : `${verb} ${name} (${requiredVersion})`;
    }
  }
}

function findRuntimeEntry(snapshot: Snapshot): SnapshotEntry {
  const entry = snapshot.find(candidate => candidate.package === RUNTIME_PACKAGE);
  if (!entry) {
    throw new SnapshotFormatError(`no '${RUNTIME_PACKAGE}' runtime entry`);
  }
  return entry;
}

/**
 * The entries a restore processes: everything but the runtime, and without
 * the final entry when `skipLast` is set.
 */
export function selectRestoreEntries(snapshot: Snapshot, skipLast: boolean): SnapshotEntry[] {
  const packages = snapshot.filter(entry => entry.package !== RUNTIME_PACKAGE);
  return skipLast ? packages.slice(0, -1) : packages;
}

/**
 * Restore the environment to `snapshot`.
 *
 * Entries are handled strictly in order and one at a time; the live
 * environment is re-queried for every entry. The first failed install stops
 * the restore, and packages installed before it stay installed.
 *
 * @throws RuntimeVersionMismatchError when the R version differs and
 *   `stopOnWrongRuntimeVersion` is set
 * @throws InstallError when an install fails
 */
export async function restoreEnvironment(
  snapshot: Snapshot,
  options: RestoreOptions,
  deps: RestoreDeps
): Promise<RestoreReport> {
  const now = deps.now ?? Date.now;
  const start = now();
  const out = resolveOutput(deps);
  const { store, installer, policy } = deps;

  const required = findRuntimeEntry(snapshot).version;
  const found = await deps.runtime.version();
  if (required !== found) {
    const mismatch = new RuntimeVersionMismatchError(required, found);
    if (options.stopOnWrongRuntimeVersion) {
      throw mismatch;
    }
    logger.warn(mismatch.message);
    out.warn(mismatch.message);
  }

  const decisions: RestoreDecision[] = [];
  let installed = 0;

  for (const entry of selectRestoreEntries(snapshot, options.skipLast)) {
    let installedVersion: string | undefined;
    if (!policy.corePackages.has(entry.package) && await store.isInstalled(entry.package)) {
      installedVersion = await store.installedVersion(entry.package);
    }

    const action = chooseRestoreAction(entry.package, entry.version, installedVersion, policy, options.strict);
    const decision: RestoreDecision = {
      package: entry.package,
      requiredVersion: entry.version,
      installedVersion,
      action,
      source: sourceFor(action, entry, policy)
    };
    decisions.push(decision);
    out.info(describeDecision(decision, options.dryRun));

    if (decision.source && !options.dryRun) {
      await installer.installExact(entry.package, entry.version, decision.source);
      installed++;
    }
  }

  const elapsedMs = now() - start;
  out.success(`Restoring environment took ${formatDuration(elapsedMs)}`);

  return {
    decisions,
    installed,
    runtimeVersion: { required, found, matches: required === found },
    elapsedMs
  };
}
