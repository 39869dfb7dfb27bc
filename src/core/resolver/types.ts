/**
 * A package in the dependency closure of a root package.
 */
export interface DependencyEntry {
  name: string;
  /**
   * Deepest distance from the root at which the package was reached.
   * The root's direct dependencies are level 0; theirs are level 1, and so on.
   */
  level: number;
}

export interface DependencyResolverOptions {
  /** Called with a human-readable message for each dependency cycle that was skipped */
  onWarning?: (message: string) => void;
}
