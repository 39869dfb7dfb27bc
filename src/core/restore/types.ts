import type { OutputPort } from '../ports/output.js';
import type { PackageMetadataStore } from '../metadata/types.js';
import type { RuntimeProbe } from '../runtime/r-runtime.js';

/**
 * What a restore does with one snapshot entry.
 *
 * - skip-core: part of the runtime, cannot be installed on its own
 * - skip-up-to-date: the exact version is already installed
 * - skip-compatible-newer: a newer version with the same major is installed (non-strict only)
 * - install-alternate: install the exact version from the alternate registry
 * - install-primary: install the exact version from the primary registry, built from source
 */
export type RestoreAction =
  | 'skip-core'
  | 'skip-up-to-date'
  | 'skip-compatible-newer'
  | 'install-alternate'
  | 'install-primary';

/**
 * Where an exact-version install takes its source archive from.
 */
export type SourceHint =
  | { kind: 'primary' }
  | { kind: 'alternate'; url: string };

export interface RestoreDecision {
  package: string;
  requiredVersion: string;
  /** Version found before acting; undefined when not installed or not queried */
  installedVersion?: string;
  action: RestoreAction;
  /** Present for install actions */
  source?: SourceHint;
}

/**
 * Installs one exact package version without resolving its dependencies.
 */
export interface Installer {
  /**
   * @throws InstallError when the archive cannot be fetched or the build fails
   */
  installExact(name: string, version: string, source: SourceHint): Promise<void>;
}

/**
 * Fixed exception lists consulted for every entry.
 */
export interface RestorePolicy {
  corePackages: ReadonlySet<string>;
  alternateRegistry: {
    url: string;
    packages: ReadonlySet<string>;
  };
}

export interface RestoreOptions {
  /** Throw RuntimeVersionMismatchError instead of warning when the R version differs */
  stopOnWrongRuntimeVersion: boolean;
  /** Install the exact version even when a compatible newer one is present */
  strict: boolean;
  /** Leave out the last entry, usually the study package installed by hand */
  skipLast: boolean;
  /** Report decisions without installing anything */
  dryRun?: boolean;
}

export interface RestoreDeps {
  store: PackageMetadataStore;
  runtime: RuntimeProbe;
  installer: Installer;
  policy: RestorePolicy;
  output?: OutputPort;
  /** Milliseconds clock used for the elapsed-time report */
  now?: () => number;
}

export interface RestoreReport {
  decisions: RestoreDecision[];
  /** Install actions carried out (always 0 on a dry run) */
  installed: number;
  runtimeVersion: {
    required: string;
    found: string;
    matches: boolean;
  };
  elapsedMs: number;
}
