import { Dependency } from './dependency.js';
import { RepositoryScanner } from './repository/repository-scanner.js';
import { ResolutionEngine, type ResolvedDependencies } from './resolution/resolution-engine.js';
import { ArtifactDeployer, type DeployReport, type OverwriteConfirmation } from './deploy/artifact-deployer.js';
import { ClientStore, validateClientName } from './clients/client-store.js';
import { ResolutionError } from '../utils/errors.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { DependencyRecord, Logger } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

export interface DependencyClientOptions {
  logger?: Logger;
  /** Environment consulted for the SDK root (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

function toRecord(dep: Dependency): DependencyRecord {
  const record: DependencyRecord = {
    groupId: dep.group,
    artifactId: dep.artifact,
    version: dep.requestedVersion
  };
  if (dep.packageIds && dep.packageIds.length > 0) {
    record.packageIds = [...dep.packageIds];
  }
  if (dep.repositories && dep.repositories.length > 0) {
    record.repositories = [...dep.repositories];
  }
  return record;
}

/**
 * One client's view of the shared dependency settings.
 *
 * Each client declares its own dependencies, persisted to its own file in the
 * settings directory. Resolution always covers the declarations of every
 * client, so independent clients end up with one consistent version per
 * artifact.
 */
export class DependencyClient {
  readonly clientName: string;
  readonly sdkPath?: string;

  private readonly scanner: RepositoryScanner;
  private readonly store: ClientStore;
  private readonly logger: Logger;
  private clientDependencies = new Map<string, Dependency>();

  private constructor(
    clientName: string,
    sdkPath: string | undefined,
    extraRepositories: readonly string[],
    settingsDir: string,
    logger: Logger
  ) {
    validateClientName(clientName);
    this.clientName = clientName;
    this.sdkPath = sdkPath;
    this.logger = logger;
    this.scanner = new RepositoryScanner({ sdkPath, repositories: extraRepositories, logger });
    this.store = new ClientStore(settingsDir, logger);
  }

  /**
   * Create a client and load its previously declared dependencies.
   *
   * @param sdkPath - Android SDK root; falls back to ANDROID_HOME
   * @param extraRepositories - local Maven roots searched after the SDK ones
   * @param settingsDir - directory holding the per-client dependency files
   */
  static async register(
    clientName: string,
    sdkPath: string | undefined,
    extraRepositories: readonly string[] | undefined,
    settingsDir: string,
    options: DependencyClientOptions = {}
  ): Promise<DependencyClient> {
    const env = options.env ?? process.env;
    const sdk = sdkPath ?? env[ENV_VARS.SDK_ROOT];
    const client = new DependencyClient(
      clientName,
      sdk && sdk.length > 0 ? sdk : undefined,
      extraRepositories ?? [],
      settingsDir,
      options.logger ?? defaultLogger
    );
    client.clientDependencies = await client.loadDependencies(false, true);
    return client;
  }

  get settingsDir(): string {
    return this.store.settingsDir;
  }

  /** Repository roots currently searched, in order */
  get repositories(): readonly string[] {
    return this.scanner.repositories;
  }

  /** This client's declarations, keyed by dependency key */
  get declaredDependencies(): ReadonlyMap<string, Dependency> {
    return this.clientDependencies;
  }

  /**
   * Declare a dependency for this client and persist it.
   *
   * A declaration with no installed candidate is still recorded; it only
   * fails once resolution runs.
   */
  async dependOn(
    group: string,
    artifact: string,
    version: string,
    packageIds?: readonly string[],
    repositories?: readonly string[]
  ): Promise<Dependency> {
    this.logger.debug(
      `DependOn - group: ${group} artifact: ${artifact} version: ${version} ` +
      `packageIds: ${packageIds ? packageIds.join(', ') : 'none'} ` +
      `repositories: ${repositories ? repositories.join(', ') : 'none'}`
    );

    for (const root of repositories ?? []) {
      this.scanner.addRepository(root);
    }

    const unresolved = new Dependency(group, artifact, version, { packageIds, repositories });
    const dep = (await this.scanner.findCandidate(unresolved)) ?? unresolved;
    this.clientDependencies.set(dep.key, dep);

    await this.persistDependencies();
    return dep;
  }

  /** Forget every dependency this client declared */
  async clearDependencies(): Promise<void> {
    await this.store.delete(this.clientName);
    this.clientDependencies = await this.loadDependencies(false, true);
  }

  /**
   * Read declared dependencies from the settings directory and find a
   * candidate for each.
   *
   * @param allClients - read every client's file, not just this client's
   * @param keepMissing - keep declarations with no installed candidate
   *   instead of failing
   */
  async loadDependencies(allClients: boolean, keepMissing = false): Promise<Map<string, Dependency>> {
    const clients = allClients ? await this.store.listClients() : [this.clientName];
    const dependencies = new Map<string, Dependency>();

    for (const clientName of clients) {
      for (const record of await this.store.read(clientName)) {
        for (const root of record.repositories ?? []) {
          this.scanner.addRepository(root);
        }

        const unresolved = new Dependency(record.groupId, record.artifactId, record.version, {
          packageIds: record.packageIds,
          repositories: record.repositories
        });
        let dep = await this.scanner.findCandidate(unresolved);
        if (!dep) {
          if (!keepMissing) {
            throw new ResolutionError(
              `Cannot find candidate artifact for ${record.groupId}:${record.artifactId}:${record.version}`,
              { client: clientName }
            );
          }
          dep = unresolved;
        }
        if (!dependencies.has(dep.key)) {
          dependencies.set(dep.key, dep);
        }
      }
    }

    return dependencies;
  }

  /**
   * Resolve the declarations of every client to one version per artifact.
   *
   * @param useLatest - settle irreconcilable conflicts with the newest
   *   version instead of throwing
   * @returns the winning dependency for each versionless key
   */
  async resolveDependencies(useLatest: boolean): Promise<ResolvedDependencies> {
    const declared = await this.loadDependencies(true, true);
    const engine = new ResolutionEngine({ source: this.scanner, logger: this.logger });
    return engine.resolve(declared.values(), useLatest);
  }

  async copyDependencies(
    dependencies: ReadonlyMap<string, Dependency>,
    destDir: string,
    confirm?: OverwriteConfirmation
  ): Promise<DeployReport> {
    const deployer = new ArtifactDeployer({ logger: this.logger });
    return deployer.copyDependencies(dependencies.values(), destDir, confirm);
  }

  /** Erase the dependency files of every client */
  async resetDependencies(): Promise<void> {
    await this.store.deleteAll();
    await this.clearDependencies();
  }

  private async persistDependencies(): Promise<void> {
    await this.store.write(this.clientName, [...this.clientDependencies.values()].map(toRecord));
  }
}
