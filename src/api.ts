/**
 * Programmatic API of m2resolve.
 */

import { DependencyClient, type DependencyClientOptions } from './core/dependency-client.js';

export { DependencyClient, type DependencyClientOptions } from './core/dependency-client.js';
export { Dependency, type DependencyOptions } from './core/dependency.js';
export {
  parseVersion,
  compareVersions,
  satisfiesVersion,
  maxVersion,
  sortVersions,
  type VersionSpec
} from './core/version/version-spec.js';
export { RepositoryScanner, type RepositoryScannerOptions } from './core/repository/repository-scanner.js';
export {
  ResolutionEngine,
  type CandidateSource,
  type ResolutionEngineOptions,
  type ResolvedDependencies
} from './core/resolution/resolution-engine.js';
export {
  ArtifactDeployer,
  type DeployReport,
  type OverwriteConfirmation
} from './core/deploy/artifact-deployer.js';
export { loadConfig, type ConfigOverrides } from './core/config.js';
export {
  ConfigurationError,
  ResolutionError,
  FileSystemError,
  ValidationError,
  UserCancellationError
} from './utils/errors.js';
export { ResolverError, ErrorCodes, type Logger, type ResolverConfig, type DependencyRecord } from './types/index.js';

/**
 * Register a client and load the dependencies it declared earlier.
 *
 * @param sdkPath - Android SDK root; when undefined, ANDROID_HOME is used
 */
export function register(
  clientName: string,
  sdkPath: string | undefined,
  extraRepositories: readonly string[] | undefined,
  settingsDir: string,
  options?: DependencyClientOptions
): Promise<DependencyClient> {
  return DependencyClient.register(clientName, sdkPath, extraRepositories, settingsDir, options);
}
