import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

let cachedVersion: string | undefined;

function readVersion(path: string): string | undefined {
  if (!existsSync(path)) return undefined;
  const data: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (typeof data === 'object' && data !== null && 'version' in data && typeof data.version === 'string') {
    return data.version;
  }
  return undefined;
}

/**
 * Version of this package, read from the nearest package.json above this
 * module (src/ when run from sources, dist/src/ once built).
 */
export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const version = readVersion(join(dir, 'package.json'));
    if (version) {
      cachedVersion = version;
      return version;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  cachedVersion = '0.0.0';
  return cachedVersion;
}
