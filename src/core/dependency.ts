import { join } from 'path';
import {
  compareVersions,
  parseVersion,
  satisfiesVersion,
  versionBase,
  type VersionSpec
} from './version/version-spec.js';
import { VERSION_TOKENS } from '../constants/index.js';

export interface DependencyOptions {
  /** Platform package identifiers that ship this artifact */
  packageIds?: readonly string[];
  /** Extra repository roots to search for this artifact */
  repositories?: readonly string[];
  /** The constraint as originally declared, when it differs from `version` */
  requestedVersion?: string;
}

/**
 * A Maven artifact requirement and the state used while resolving it.
 *
 * `possibleVersions` holds the versions found in repository metadata that
 * satisfy the constraint, ascending. A version that leaves the set, because
 * its packaging file is missing or a refinement excluded it, is never added
 * back to this instance.
 */
export class Dependency {
  readonly group: string;
  readonly artifact: string;
  readonly requestedVersion: string;
  readonly packageIds?: readonly string[];
  readonly repositories?: readonly string[];

  /** Repository root the possible versions were read from */
  repoPath = '';

  private constraint: VersionSpec;
  private possible: string[] = [];
  private readonly pruned = new Set<string>();
  private readonly unavailable = new Set<string>();

  constructor(group: string, artifact: string, version: string, options: DependencyOptions = {}) {
    this.group = group;
    this.artifact = artifact;
    this.constraint = parseVersion(version);
    this.requestedVersion = options.requestedVersion ?? version;
    this.packageIds = options.packageIds;
    this.repositories = options.repositories;
  }

  /** Current constraint; narrower than `requestedVersion` after refinement */
  get version(): string {
    return this.constraint.text;
  }

  get isOpenEnded(): boolean {
    return this.constraint.isOpenEnded;
  }

  get versionlessKey(): string {
    return `${this.group}:${this.artifact}`;
  }

  get key(): string {
    return `${this.versionlessKey}:${this.bestVersion ?? this.version}`;
  }

  get possibleVersions(): readonly string[] {
    return [...this.possible];
  }

  get hasPossibleVersions(): boolean {
    return this.possible.length > 0;
  }

  get bestVersion(): string | undefined {
    return this.possible[this.possible.length - 1];
  }

  /**
   * Directory holding the files of `bestVersion` in the Maven layout:
   * <repo>/<group as path>/<artifact>/<version>
   */
  get bestVersionPath(): string | undefined {
    const best = this.bestVersion;
    if (best === undefined) {
      return undefined;
    }
    return join(this.repoPath, ...this.group.split('.'), this.artifact, best);
  }

  addVersion(version: string): boolean {
    if (this.pruned.has(version) || this.unavailable.has(version)) {
      return false;
    }
    if (!this.constraint.isLatest && !satisfiesVersion(this.constraint, version)) {
      return false;
    }
    if (this.possible.includes(version)) {
      return true;
    }
    this.possible.push(version);
    this.possible.sort(compareVersions);
    return true;
  }

  removePossibleVersion(version: string): void {
    this.possible = this.possible.filter(v => v !== version);
    this.unavailable.add(version);
  }

  isAcceptableVersion(version: string | undefined): boolean {
    if (version === undefined || this.pruned.has(version)) {
      return false;
    }
    return satisfiesVersion(this.constraint, version, this.constraint.isLatest ? this.possible : undefined);
  }

  /**
   * Order by resolved version, falling back to the constraint's own version
   * while unresolved.
   */
  isNewer(other: Dependency): boolean {
    return compareVersions(this.comparableVersion(), other.comparableVersion()) > 0;
  }

  /**
   * Narrow an open-ended constraint so that it agrees with `other`.
   *
   * The lower bound rises to `other`'s concrete version when that is higher,
   * and possible versions `other` would not accept are dropped. Fails without
   * touching any state when the constraint is not open-ended, when `other`'s
   * version lies outside this range, when nothing would change, or when no
   * possible version would remain.
   */
  refineVersionRange(other: Dependency): boolean {
    if (!this.constraint.isOpenEnded) {
      return false;
    }

    const otherVersion = other.comparableVersion();
    if (!this.isAcceptableVersion(otherVersion)) {
      return false;
    }

    const currentBound = versionBase(this.constraint);
    const raisesBound = compareVersions(otherVersion, currentBound) > 0;
    const lowerBound = raisesBound ? otherVersion : currentBound;

    const retained = this.possible.filter(
      v => compareVersions(v, lowerBound) >= 0 && other.isAcceptableVersion(v)
    );
    const dropped = this.possible.filter(v => !retained.includes(v));

    if (this.possible.length > 0 && retained.length === 0) {
      return false;
    }
    if (!raisesBound && dropped.length === 0) {
      return false;
    }

    for (const version of dropped) {
      this.pruned.add(version);
    }
    this.possible = retained;
    this.constraint = parseVersion(`${lowerBound}${VERSION_TOKENS.OPEN_ENDED}`);
    return true;
  }

  /**
   * Fresh, unbound copy carrying the current constraint and refinement
   * exclusions, but none of the versions found missing on disk.
   */
  clone(): Dependency {
    const copy = new Dependency(this.group, this.artifact, this.version, {
      packageIds: this.packageIds,
      repositories: this.repositories,
      requestedVersion: this.requestedVersion
    });
    for (const version of this.pruned) {
      copy.pruned.add(version);
    }
    return copy;
  }

  toString(): string {
    const best = this.bestVersion;
    const base = `${this.versionlessKey}:${this.version}`;
    return best !== undefined && best !== this.version ? `${base} (${best})` : base;
  }

  private comparableVersion(): string {
    return this.bestVersion ?? versionBase(this.constraint);
  }
}
