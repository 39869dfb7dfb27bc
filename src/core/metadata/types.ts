/**
 * Declared requirements of an installed package.
 */
export interface DeclaredDependencies {
  /** Packages listed under Depends */
  mandatory: string[];
  /** Packages listed under Imports */
  imported: string[];
}

/**
 * Read access to the live package environment.
 *
 * Every call reads current state; implementations must not cache across calls,
 * because a restore installs packages between queries.
 */
export interface PackageMetadataStore {
  /**
   * @throws PackageNotFoundError when the package is not installed
   */
  declaredDependencies(name: string): Promise<DeclaredDependencies>;

  /** Installed version, or undefined when the package is not installed */
  installedVersion(name: string): Promise<string | undefined>;

  isInstalled(name: string): Promise<boolean>;
}
