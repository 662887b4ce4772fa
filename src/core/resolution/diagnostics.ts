import type { Dependency } from '../dependency.js';

/** versionless key -> keys of the artifacts whose POM asked for it */
export type RequesterMap = Map<string, Set<string>>;

export function recordRequester(requesters: RequesterMap, dependency: Dependency, requester: Dependency): void {
  const parents = requesters.get(dependency.versionlessKey) ?? new Set<string>();
  parents.add(requester.key);
  requesters.set(dependency.versionlessKey, parents);
}

function describeRequesters(versionlessKey: string, requesters: RequesterMap): string {
  const parents = requesters.get(versionlessKey);
  const names = parents && parents.size > 0 ? [...parents].join(', ') : 'declared';
  return `${versionlessKey} required by (${names})`;
}

/**
 * Warning emitted when a conflict is settled by taking the newest version.
 * Lists every known requester so the widening can be traced.
 */
export function formatWideningWarning(chosen: Dependency, requesters: RequesterMap): string {
  const lines = [
    `No compatible versions of ${describeRequesters(chosen.versionlessKey, requesters)}, ` +
      `will try using the latest version ${chosen.bestVersion ?? chosen.version}`,
    'Found dependencies:'
  ];
  for (const versionlessKey of requesters.keys()) {
    lines.push(`  ${describeRequesters(versionlessKey, requesters)}`);
  }
  return lines.join('\n');
}
