/**
 * Shared constants for m2resolve.
 * Single source of truth for file names, packaging extensions and
 * environment variables used throughout the application.
 */

export const DIR_PATTERNS = {
  SETTINGS: '.m2resolve',
  DESTINATION: 'libs'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'm2resolve.jsonc',
  MAVEN_METADATA: 'maven-metadata.xml',
  POM: '.pom',
  /** Per-client dependency files are named deps.<client>.yml */
  CLIENT_FILE_PREFIX: 'deps.',
  CLIENT_FILE_SUFFIX: '.yml',
  /** Editor sidecar files that sit next to deployed artifacts */
  SIDECAR_META: '.meta'
} as const;

/**
 * Packaging extensions searched in a repository, in order of preference.
 * `.srcaar` is an AAR kept out of the host build; it is deployed as `.aar`.
 */
export const PACKAGING = {
  AAR: '.aar',
  JAR: '.jar',
  SRCAAR: '.srcaar'
} as const;

export const PACKAGING_EXTENSIONS: readonly Packaging[] = [PACKAGING.AAR, PACKAGING.JAR, PACKAGING.SRCAAR];

/** Token in a repository path that is replaced by the SDK root */
export const SDK_TOKEN = '$SDK' as const;

/** Maven repositories shipped inside the Android SDK */
export const SDK_REPOSITORIES: readonly string[] = [
  `${SDK_TOKEN}/extras/android/m2repository`,
  `${SDK_TOKEN}/extras/google/m2repository`
];

export const ENV_VARS = {
  SDK_ROOT: 'ANDROID_HOME',
  VERBOSE: 'M2RESOLVE_VERBOSE'
} as const;

export const VERSION_TOKENS = {
  LATEST: 'LATEST',
  OPEN_ENDED: '+',
  /** Constraint used when a POM dependency carries no version */
  ANY: '0+'
} as const;

export const DEFAULT_CLIENT = 'default' as const;

export const MANAGED_FILE_HEADER = '# This file is managed by m2resolve. Do not edit manually.';

export type Packaging = typeof PACKAGING[keyof typeof PACKAGING];
