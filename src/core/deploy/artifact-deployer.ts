/**
 * Deploys resolved artifacts into a destination directory, keeping at most
 * one version of each artifact there.
 *
 * Deployed entries are named <artifact>-<version><ext>, or <artifact>-<version>
 * for an unpacked archive. The version embedded in an existing name is the only
 * state consulted, so repeated runs against an unchanged repository do no work.
 */

import { extname, join } from 'path';
import { Dependency } from '../dependency.js';
import { locatePackagingFile } from '../repository/repository-scanner.js';
import {
  copyFile,
  ensureDir,
  getModifiedTime,
  isDirectory,
  isFile,
  listEntries,
  remove
} from '../../utils/fs.js';
import { ResolutionError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import type { Logger } from '../../types/index.js';
import { FILE_PATTERNS, PACKAGING } from '../../constants/index.js';

/**
 * Asked before an older or different copy of an artifact is replaced.
 * Returning false keeps the existing copy and skips the new one.
 */
export type OverwriteConfirmation = (oldDep: Dependency, newDep: Dependency) => boolean | Promise<boolean>;

export interface DeployReport {
  /** Destination paths written */
  copied: string[];
  /** Destination paths deleted (stale versions and outdated copies) */
  removed: string[];
  /** Keys of dependencies whose deployed copy was already current */
  upToDate: string[];
  /** Keys of dependencies whose replacement was declined */
  declined: string[];
}

const VERSION_PREFIX = /^([0-9.]+)/;

function stripExtension(name: string): string {
  const ext = extname(name);
  // "foo-1.0.0" has no extension even though extname() reports ".0"
  return ext && !/^\.\d+$/.test(ext) ? name.slice(0, -ext.length) : name;
}

/**
 * Version embedded in a deployed entry name, e.g. "1.2.3" for
 * "widget-1.2.3.aar" or "widget-1.2.3-beta". Returns undefined when the
 * entry does not belong to `artifact`.
 */
export function extractDeployedVersion(entryName: string, artifact: string, isDirectoryEntry: boolean): string | undefined {
  const prefix = `${artifact}-`;
  if (!entryName.startsWith(prefix)) {
    return undefined;
  }
  const stem = isDirectoryEntry ? entryName : stripExtension(entryName);
  const match = VERSION_PREFIX.exec(stem.slice(prefix.length));
  if (!match) {
    return undefined;
  }
  const version = match[1].replace(/\.+$/, '');
  return version.length > 0 ? version : undefined;
}

export interface ArtifactDeployerOptions {
  logger?: Logger;
}

export class ArtifactDeployer {
  private readonly logger: Logger;

  constructor(options: ArtifactDeployerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  async copyDependencies(
    dependencies: Iterable<Dependency>,
    destDir: string,
    confirm?: OverwriteConfirmation
  ): Promise<DeployReport> {
    const report: DeployReport = { copied: [], removed: [], upToDate: [], declined: [] };
    await ensureDir(destDir);

    for (const dep of dependencies) {
      if (await this.removeStaleCopies(dep, destDir, report, confirm)) {
        await this.deploy(dep, destDir, report);
      }
    }

    return report;
  }

  /**
   * Remove other versions of `dep` from `destDir`. The confirmation is asked
   * once per artifact, before the first removal. Returns whether `dep`
   * may be copied.
   */
  private async removeStaleCopies(
    dep: Dependency,
    destDir: string,
    report: DeployReport,
    confirm?: OverwriteConfirmation
  ): Promise<boolean> {
    let approved: boolean | undefined;
    const currentStem = `${dep.artifact}-${dep.bestVersion}`;

    for (const name of await listEntries(destDir)) {
      if (name.endsWith(FILE_PATTERNS.SIDECAR_META)) {
        continue;
      }

      const path = join(destDir, name);
      const isDirectoryEntry = await isDirectory(path);
      // Qualified versions ("1.0.0-rc01") only keep their numeric prefix below
      if ((isDirectoryEntry ? name : stripExtension(name)) === currentStem) {
        continue;
      }

      const version = extractDeployedVersion(name, dep.artifact, isDirectoryEntry);
      if (version === undefined) {
        continue;
      }

      const oldDep = new Dependency(dep.group, dep.artifact, version, {
        packageIds: dep.packageIds,
        repositories: dep.repositories
      });
      oldDep.addVersion(version);
      if (oldDep.key === dep.key) {
        continue;
      }

      if (approved === undefined) {
        approved = confirm ? await confirm(oldDep, dep) : true;
      }
      if (!approved) {
        continue;
      }

      this.logger.info(`Replacing ${name} with ${dep.key}`);
      await remove(path);
      report.removed.push(path);
    }

    if (approved === false) {
      this.logger.info(`Keeping existing copy of ${dep.versionlessKey}; ${dep.key} not deployed`);
      report.declined.push(dep.key);
      return false;
    }
    return true;
  }

  private async deploy(dep: Dependency, destDir: string, report: DeployReport): Promise<void> {
    const source = await locatePackagingFile(dep);
    if (!source) {
      throw new ResolutionError(`Cannot find artifact for ${dep}`, { dependency: dep.key });
    }

    const baseName = `${dep.artifact}-${dep.bestVersion}`;
    const extension = source.extension === PACKAGING.SRCAAR ? PACKAGING.AAR : source.extension;
    const destName = join(destDir, `${baseName}${extension}`);
    const destUnpacked = join(destDir, baseName);

    const existing = (await isFile(destName))
      ? destName
      : (await isDirectory(destUnpacked)) ? destUnpacked : null;

    if (existing) {
      if ((await getModifiedTime(existing)) >= (await getModifiedTime(source.path))) {
        this.logger.debug(`${existing} is up to date`);
        report.upToDate.push(dep.key);
        return;
      }
      await remove(existing);
      report.removed.push(existing);
    }

    await copyFile(source.path, destName);
    report.copied.push(destName);
  }
}
