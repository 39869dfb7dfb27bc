/**
 * Shared constants for the envsnap CLI application
 * This file provides a single source of truth for directory names,
 * file patterns, registry locations and the default restore policy.
 */

export const DIR_PATTERNS = {
  ENVSNAP: '.envsnap'
} as const;

export const FILE_PATTERNS = {
  DESCRIPTION: 'DESCRIPTION',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  TARBALL_SUFFIX: '.tar.gz'
} as const;

export const ENVSNAP_DIRS = {
  CACHE: 'cache',
  TARBALLS: 'tarballs',
  RUNTIME: 'envsnap'
} as const;

/**
 * Name under which the runtime's own version is recorded in a snapshot.
 * It is also filtered out of every declared dependency list.
 */
export const RUNTIME_PACKAGE = 'R' as const;

/**
 * DESCRIPTION fields that make up a package's required dependencies.
 * `Suggests` is left out on purpose: suggested packages may depend back on the root.
 */
export const DEPENDENCY_FIELDS = {
  MANDATORY: 'Depends',
  IMPORTED: 'Imports'
} as const;

export const SNAPSHOT_COLUMNS = {
  PACKAGE: 'package',
  VERSION: 'version'
} as const;

export const DEFAULT_SNAPSHOT_PATH = 'inst/settings/rEnvironmentSnapshot.csv';

export const GITHUB = {
  RAW_BASE_URL: 'https://raw.githubusercontent.com',
  DEFAULT_BRANCH: 'master'
} as const;

export const REGISTRIES = {
  PRIMARY_URL: 'https://cloud.r-project.org',
  ALTERNATE_URL: 'https://github.com/OHDSI/drat/raw/gh-pages/src/contrib'
} as const;

/**
 * Packages that ship with the R installation and cannot be installed on their own.
 */
export const DEFAULT_CORE_PACKAGES: readonly string[] = [
  'grDevices',
  'graphics',
  'utils',
  'stats',
  'methods',
  'tools',
  'grid',
  'datasets',
  'rlang',
  'devtools'
];

/**
 * Packages published to the alternate (drat) registry rather than CRAN.
 */
export const DEFAULT_ALTERNATE_REGISTRY_PACKAGES: readonly string[] = [
  'Achilles',
  'BigKnn',
  'CaseControl',
  'CaseCrossover',
  'CohortMethod',
  'EvidenceSynthesis',
  'FeatureExtraction',
  'IcTemporalPatternDiscovery',
  'MethodEvaluation',
  'OhdsiRTools',
  'OhdsiSharing',
  'PatientLevelPrediction',
  'PheValuator',
  'SelfControlledCaseSeries',
  'SelfControlledCohort'
];

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000;
