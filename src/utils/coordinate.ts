import { ValidationError } from './errors.js';

export interface Coordinate {
  group: string;
  artifact: string;
  version: string;
}

/**
 * Parse a `group:artifact:version` coordinate as typed on the command line.
 * The version part is a constraint (`1.2.3`, `1.2+`, `LATEST`).
 */
export function parseCoordinate(input: string): Coordinate {
  const parts = input.trim().split(':');
  if (parts.length !== 3 || parts.some(part => part.trim().length === 0)) {
    throw new ValidationError(
      `Invalid coordinate "${input}". Expected group:artifact:version, e.g. com.example:widget:1.0+`,
      { input }
    );
  }
  const [group, artifact, version] = parts.map(part => part.trim());
  return { group, artifact, version };
}
