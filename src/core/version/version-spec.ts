/**
 * Version constraint model for Maven-style dotted versions.
 *
 * A constraint is one of:
 *   - "1.2.3"  exact; trailing zeros are implied, so "1.2" matches "1.2.0"
 *   - "1.2.3+" open-ended; any version >= 1.2.3, including higher majors
 *   - "LATEST" only the greatest version currently known to be available
 *
 * Components compare numerically when both sides are integers, ordinally when
 * neither is, and a non-numeric component sorts below a numeric one. Nothing
 * here throws on malformed input.
 */

import { VERSION_TOKENS } from '../../constants/index.js';

export type Ordering = -1 | 0 | 1;

export interface VersionSpec {
  /** The constraint exactly as written */
  readonly text: string;
  /** Dot-separated components with any trailing "+" removed */
  readonly components: readonly string[];
  readonly isOpenEnded: boolean;
  readonly isLatest: boolean;
}

const NUMERIC_COMPONENT = /^\d+$/;

export function parseVersion(text: string): VersionSpec {
  const trimmed = text.trim();

  if (trimmed === VERSION_TOKENS.LATEST) {
    return { text, components: [], isOpenEnded: false, isLatest: true };
  }

  const isOpenEnded = trimmed.endsWith(VERSION_TOKENS.OPEN_ENDED);
  const base = isOpenEnded ? trimmed.slice(0, -VERSION_TOKENS.OPEN_ENDED.length) : trimmed;
  const components = base.length > 0 ? base.split('.') : [];

  return { text, components, isOpenEnded, isLatest: false };
}

/**
 * The version a constraint starts from, e.g. "1.2" for "1.2+".
 */
export function versionBase(spec: VersionSpec): string {
  return spec.components.join('.');
}

function compareNumeric(a: string, b: string): Ordering {
  // Compare as digit strings so arbitrarily long components stay exact
  const left = a.replace(/^0+(?=\d)/, '');
  const right = b.replace(/^0+(?=\d)/, '');
  if (left.length !== right.length) {
    return left.length < right.length ? -1 : 1;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareComponents(a: string, b: string): Ordering {
  const aNumeric = NUMERIC_COMPONENT.test(a);
  const bNumeric = NUMERIC_COMPONENT.test(b);

  if (aNumeric && bNumeric) {
    return compareNumeric(a, b);
  }
  if (aNumeric !== bNumeric) {
    return aNumeric ? 1 : -1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareComponentLists(a: readonly string[], b: readonly string[]): Ordering {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const result = compareComponents(a[i] ?? '0', b[i] ?? '0');
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

/**
 * Compare two version strings component-wise. A trailing "+" is ignored.
 */
export function compareVersions(a: string, b: string): Ordering {
  return compareComponentLists(parseVersion(a).components, parseVersion(b).components);
}

/**
 * Greatest version in a list, or undefined when the list is empty.
 */
export function maxVersion(versions: Iterable<string>): string | undefined {
  let best: string | undefined;
  for (const version of versions) {
    if (best === undefined || compareVersions(version, best) > 0) {
      best = version;
    }
  }
  return best;
}

/**
 * Sort versions ascending without mutating the input.
 */
export function sortVersions(versions: Iterable<string>): string[] {
  return [...versions].sort(compareVersions);
}

/**
 * Whether `candidate` satisfies `constraint`.
 *
 * @param available - versions currently known to exist; only consulted for
 *   LATEST, which without a known set accepts any candidate
 */
export function satisfiesVersion(
  constraint: string | VersionSpec,
  candidate: string,
  available?: readonly string[]
): boolean {
  const spec = typeof constraint === 'string' ? parseVersion(constraint) : constraint;
  const candidateComponents = parseVersion(candidate).components;

  if (spec.isLatest) {
    const latest = available ? maxVersion(available) : undefined;
    return latest === undefined || compareVersions(candidate, latest) === 0;
  }

  const ordering = compareComponentLists(candidateComponents, spec.components);
  return spec.isOpenEnded ? ordering >= 0 : ordering === 0;
}
