/**
 * Candidate search over local Maven repositories.
 *
 * Roots are searched in registration order: the SDK repositories first, then
 * caller-provided extras, then any roots carried by the dependency itself.
 * A root only yields a candidate when its metadata lists a version that also
 * has a packaging file on disk.
 */

import { join, resolve } from 'path';
import { Dependency } from '../dependency.js';
import { readMetadataVersions, readPomDependencies } from './maven-descriptors.js';
import { isDirectory, isFile } from '../../utils/fs.js';
import { ConfigurationError, ResolutionError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import type { Logger } from '../../types/index.js';
import {
  FILE_PATTERNS,
  PACKAGING_EXTENSIONS,
  type Packaging,
  SDK_REPOSITORIES,
  SDK_TOKEN,
  VERSION_TOKENS
} from '../../constants/index.js';

export interface RepositoryScannerOptions {
  /** SDK root substituted for $SDK; only required once such a root is searched */
  sdkPath?: string;
  /** Extra roots searched after the SDK repositories */
  repositories?: readonly string[];
  /** Leave out the SDK repositories entirely */
  skipSdkRepositories?: boolean;
  logger?: Logger;
}

export interface PackagingFile {
  path: string;
  extension: Packaging;
}

/**
 * Find the packaging file of a dependency's best version, trying each
 * supported extension in order.
 */
export async function locatePackagingFile(dep: Dependency): Promise<PackagingFile | null> {
  const best = dep.bestVersion;
  const dir = dep.bestVersionPath;
  if (best === undefined || dir === undefined) {
    return null;
  }

  for (const extension of PACKAGING_EXTENSIONS) {
    const path = join(dir, `${dep.artifact}-${best}${extension}`);
    if (await isFile(path)) {
      return { path, extension };
    }
  }
  return null;
}

export class RepositoryScanner {
  private readonly roots = new Set<string>();
  private readonly sdkPath?: string;
  private readonly logger: Logger;

  constructor(options: RepositoryScannerOptions = {}) {
    this.sdkPath = options.sdkPath;
    this.logger = options.logger ?? defaultLogger;

    if (!options.skipSdkRepositories) {
      for (const root of SDK_REPOSITORIES) {
        this.roots.add(root);
      }
    }
    for (const root of options.repositories ?? []) {
      this.roots.add(root);
    }
  }

  /** Registered roots, unresolved, in search order */
  get repositories(): readonly string[] {
    return [...this.roots];
  }

  addRepository(root: string): void {
    this.roots.add(root);
  }

  /**
   * Substitute the SDK root for a leading $SDK token.
   */
  resolveRoot(root: string): string {
    if (!root.startsWith(SDK_TOKEN)) {
      return root;
    }
    if (!this.sdkPath) {
      throw new ConfigurationError();
    }
    return this.sdkPath + root.slice(SDK_TOKEN.length);
  }

  /**
   * Find an installed version of `dep`, searching every root in order.
   * Returns a copy of `dep` bound to the root that holds the artifact, or
   * null when no root has a usable version.
   */
  async findCandidate(dep: Dependency): Promise<Dependency | null> {
    const searchRoots = new Set([...this.roots, ...(dep.repositories ?? [])]);

    for (const root of searchRoots) {
      const repoPath = this.resolveRoot(root);
      if (!(await isDirectory(repoPath))) {
        this.logger.info(`Repository not found: ${resolve(repoPath)}`);
        continue;
      }

      const candidate = await this.findCandidateInRepository(repoPath, dep);
      if (candidate) {
        return candidate;
      }
    }

    this.logger.error(
      `Unable to find dependency ${dep.group} ${dep.artifact} ${dep.version} in (${[...searchRoots].join(', ')})`
    );
    return null;
  }

  /**
   * Look for `dep` in a single repository root.
   */
  async findCandidateInRepository(repoPath: string, dep: Dependency): Promise<Dependency | null> {
    const metadataFile = join(repoPath, ...dep.group.split('.'), dep.artifact, FILE_PATTERNS.MAVEN_METADATA);
    if (!(await isFile(metadataFile))) {
      return null;
    }

    const candidate = dep.clone();
    for (const version of await readMetadataVersions(metadataFile)) {
      candidate.addVersion(version);
    }
    candidate.repoPath = repoPath;

    while (candidate.hasPossibleVersions) {
      if (await locatePackagingFile(candidate)) {
        return candidate;
      }
      const missing = candidate.bestVersion;
      if (missing === undefined) break;
      this.logger.debug(`${candidate.key} version ${missing} not available in ${repoPath}, ignoring.`);
      candidate.removePossibleVersion(missing);
    }

    return null;
  }

  /**
   * Transitive dependencies of `dep`, read from the POM of its best version.
   * Each one is resolved to an installed candidate; test-scoped and optional
   * entries are not followed.
   */
  async getDependencies(dep: Dependency): Promise<Dependency[]> {
    const best = dep.bestVersion;
    const dir = dep.bestVersionPath;
    if (best === undefined || dir === undefined) {
      this.logger.error(`No compatible versions of ${dep.key} given the set of dependencies`);
      return [];
    }

    const pomFile = join(dir, `${dep.artifact}-${best}${FILE_PATTERNS.POM}`);
    if (!(await isFile(pomFile))) {
      this.logger.debug(`No POM for ${dep.key} at ${pomFile}`);
      return [];
    }

    this.logger.debug(`Reading POM of ${dep.key}: ${pomFile}`, { versions: dep.possibleVersions });

    const dependencies: Dependency[] = [];
    for (const entry of await readPomDependencies(pomFile)) {
      if (entry.scope === 'test' || entry.optional) {
        this.logger.debug(`Skipping ${entry.groupId}:${entry.artifactId} (${entry.optional ? 'optional' : entry.scope})`);
        continue;
      }

      const version = entry.version ?? VERSION_TOKENS.ANY;
      const found = await this.findCandidate(new Dependency(entry.groupId, entry.artifactId, version));
      if (!found) {
        throw new ResolutionError(
          `Cannot find candidate artifact for ${entry.groupId}:${entry.artifactId}:${version}`,
          { requiredBy: dep.key }
        );
      }
      dependencies.push(found);
    }

    return dependencies;
  }
}
