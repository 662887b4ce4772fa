/**
 * Fixed-point resolution of every declared dependency and its transitive
 * closure down to a single version per artifact.
 *
 * The engine works in passes over a worklist. Each pass classifies every
 * entry against the current candidate for its artifact, collects the entries
 * that still need work plus newly discovered transitive dependencies, and
 * hands them to the next pass. Resolution ends when a pass leaves nothing
 * behind.
 */

import { Dependency } from '../dependency.js';
import { ResolutionError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import type { Logger } from '../../types/index.js';
import { formatWideningWarning, recordRequester, type RequesterMap } from './diagnostics.js';

const DEFAULT_MAX_PASSES = 1_000;

/**
 * Where candidates and their transitive dependencies come from.
 * RepositoryScanner is the production implementation.
 */
export interface CandidateSource {
  findCandidate(dep: Dependency): Promise<Dependency | null>;
  getDependencies(dep: Dependency): Promise<Dependency[]>;
}

export interface ResolutionEngineOptions {
  source: CandidateSource;
  logger?: Logger;
  /** Safety valve: maximum number of passes (default: 1_000) */
  maxPasses?: number;
}

/** Candidate map returned by a resolution: versionless key -> winner */
export type ResolvedDependencies = Map<string, Dependency>;

interface ResolutionState {
  declared: readonly Dependency[];
  useLatest: boolean;
  candidates: ResolvedDependencies;
  requesters: RequesterMap;
  /** Versionless keys already reported as widened */
  warned: Set<string>;
  /** Keys whose POM was already expanded */
  expanded: Set<string>;
}

type Classification =
  | { kind: 'resolved'; candidate: Dependency }
  | { kind: 'pending' };

export class ResolutionEngine {
  private readonly source: CandidateSource;
  private readonly logger: Logger;
  private readonly maxPasses: number;

  constructor(options: ResolutionEngineOptions) {
    this.source = options.source;
    this.logger = options.logger ?? defaultLogger;
    this.maxPasses = options.maxPasses ?? DEFAULT_MAX_PASSES;
  }

  /**
   * Resolve `declared` and everything it pulls in.
   *
   * Transitive dependencies stay in the result once queued, even when the
   * candidate that required them is later narrowed to another version.
   *
   * @param useLatest - settle irreconcilable conflicts with the newer version
   *   instead of failing
   */
  async resolve(declared: Iterable<Dependency>, useLatest: boolean): Promise<ResolvedDependencies> {
    const state: ResolutionState = {
      declared: [...declared],
      useLatest,
      candidates: new Map(),
      requesters: new Map(),
      warned: new Set(),
      expanded: new Set()
    };

    let worklist = [...uniqueByKey(state.declared).values()];
    let pass = 0;

    while (worklist.length > 0) {
      pass++;
      if (pass > this.maxPasses) {
        throw new ResolutionError(
          `Resolution did not converge after ${this.maxPasses} passes. ` +
          `This likely indicates a bug or a pathological dependency graph.`,
          { pending: worklist.map(dep => dep.key) }
        );
      }

      this.logger.debug(`Resolution pass ${pass}: ${worklist.length} unresolved`);
      const next = new Map<string, Dependency>();

      for (const entry of worklist) {
        const outcome = await this.classify(entry, state, next);
        if (outcome.kind === 'resolved') {
          await this.expand(outcome.candidate, state, next);
        } else if (!next.has(entry.key)) {
          next.set(entry.key, entry);
        }
      }

      worklist = [...next.values()];
    }

    return state.candidates;
  }

  private async classify(
    entry: Dependency,
    state: ResolutionState,
    next: Map<string, Dependency>
  ): Promise<Classification> {
    const versionlessKey = entry.versionlessKey;
    const candidate = state.candidates.get(versionlessKey);

    if (!candidate) {
      const found = await this.source.findCandidate(entry);
      if (!found) {
        throw new ResolutionError(`Cannot resolve ${entry}`, { dependency: entry.key });
      }
      state.candidates.set(versionlessKey, found);
      return { kind: 'resolved', candidate: found };
    }

    if (entry.isAcceptableVersion(candidate.bestVersion)) {
      // Keep the newest version both ranges accept
      if (entry.isNewer(candidate) && candidate.isAcceptableVersion(entry.bestVersion)) {
        state.candidates.set(versionlessKey, entry);
        return { kind: 'resolved', candidate: entry };
      }
      return { kind: 'resolved', candidate };
    }

    if (this.refine(entry, candidate, state)) {
      this.requeueDeclared(versionlessKey, state, next);
      return { kind: 'pending' };
    }

    if (!state.useLatest) {
      throw new ResolutionError(`Cannot resolve ${entry} and ${candidate}`, {
        dependency: entry.key,
        candidate: candidate.key
      });
    }

    return { kind: 'resolved', candidate: await this.takeNewest(entry, candidate, state) };
  }

  /**
   * Narrow an open-ended side of a conflict, older side first. A refined
   * entry replaces the candidate, since it now lies within both ranges.
   */
  private refine(entry: Dependency, candidate: Dependency, state: ResolutionState): boolean {
    const [older, newer] = entry.isNewer(candidate) ? [candidate, entry] : [entry, candidate];
    const attempts: Array<[Dependency, Dependency]> = [[older, newer], [newer, older]];

    for (const [side, other] of attempts) {
      if (!side.isOpenEnded || !side.hasPossibleVersions) {
        continue;
      }
      if (side.refineVersionRange(other)) {
        this.logger.debug(`Refined ${side.versionlessKey} to ${side.version} to agree with ${other}`);
        if (side === entry) {
          state.candidates.set(entry.versionlessKey, entry);
        }
        return true;
      }
    }
    return false;
  }

  /**
   * Re-validate every declaration of an artifact whose range just narrowed.
   */
  private requeueDeclared(versionlessKey: string, state: ResolutionState, next: Map<string, Dependency>): void {
    for (const dep of state.declared) {
      if (dep.versionlessKey === versionlessKey && !next.has(dep.key)) {
        next.set(dep.key, dep);
      }
    }
  }

  private async takeNewest(entry: Dependency, candidate: Dependency, state: ResolutionState): Promise<Dependency> {
    let winner = entry.isNewer(candidate) ? entry : candidate;

    if (!winner.hasPossibleVersions) {
      const redeclared = new Dependency(winner.group, winner.artifact, winner.requestedVersion, {
        packageIds: winner.packageIds,
        repositories: winner.repositories
      });
      const found = await this.source.findCandidate(redeclared);
      if (!found) {
        throw new ResolutionError(`Cannot resolve ${redeclared}`, { dependency: redeclared.key });
      }
      winner = found;
    }

    state.candidates.set(winner.versionlessKey, winner);

    if (!state.warned.has(winner.versionlessKey)) {
      state.warned.add(winner.versionlessKey);
      this.logger.warn(formatWideningWarning(winner, state.requesters));
    }

    return winner;
  }

  /**
   * Queue the transitive dependencies of a resolved candidate. Each concrete
   * key is expanded once, so POM cycles cannot keep the worklist alive.
   */
  private async expand(candidate: Dependency, state: ResolutionState, next: Map<string, Dependency>): Promise<void> {
    if (state.expanded.has(candidate.key)) {
      return;
    }
    state.expanded.add(candidate.key);

    for (const dep of await this.source.getDependencies(candidate)) {
      if (next.has(dep.key)) {
        continue;
      }
      this.logger.debug(`For ${candidate.key} adding dep ${dep.key}`);
      recordRequester(state.requesters, dep, candidate);
      next.set(dep.key, dep);
    }
  }
}

function uniqueByKey(dependencies: readonly Dependency[]): Map<string, Dependency> {
  const unique = new Map<string, Dependency>();
  for (const dep of dependencies) {
    if (!unique.has(dep.key)) {
      unique.set(dep.key, dep);
    }
  }
  return unique;
}
