import { isAbsolute, join, resolve } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import type { ResolverConfig } from '../types/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';

/**
 * Project configuration for m2resolve.
 * Read from an optional m2resolve.jsonc in the working directory; command-line
 * values override the file, and the environment supplies the SDK root last.
 */

export type ConfigOverrides = Partial<ResolverConfig>;

const DEFAULT_CONFIG: ResolverConfig = {
  settingsDir: DIR_PATTERNS.SETTINGS,
  repositories: [],
  destination: DIR_PATTERNS.DESTINATION,
  useLatest: false
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(data: Record<string, unknown>, field: string, path: string): string | undefined {
  const value = data[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigurationError(`Invalid "${field}" in ${path}: expected a non-empty string`, { path, field });
  }
  return value;
}

/**
 * Validate the parsed contents of a config file.
 */
export function parseConfigData(data: unknown, path: string): ConfigOverrides {
  if (!isRecord(data)) {
    throw new ConfigurationError(`Invalid configuration in ${path}: expected an object`, { path });
  }

  const config: ConfigOverrides = {};

  const sdkPath = optionalString(data, 'sdkPath', path);
  if (sdkPath) config.sdkPath = sdkPath;
  const settingsDir = optionalString(data, 'settingsDir', path);
  if (settingsDir) config.settingsDir = settingsDir;
  const destination = optionalString(data, 'destination', path);
  if (destination) config.destination = destination;

  if (data.repositories !== undefined) {
    const repositories = data.repositories;
    if (!Array.isArray(repositories) || !repositories.every((r): r is string => typeof r === 'string')) {
      throw new ConfigurationError(`Invalid "repositories" in ${path}: expected an array of paths`, { path });
    }
    config.repositories = repositories;
  }

  if (data.useLatest !== undefined) {
    if (typeof data.useLatest !== 'boolean') {
      throw new ConfigurationError(`Invalid "useLatest" in ${path}: expected true or false`, { path });
    }
    config.useLatest = data.useLatest;
  }

  return config;
}

export async function readConfigFile(path: string): Promise<ConfigOverrides> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const data: unknown = parseJsonc(content, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigurationError(
      `Failed to parse ${path}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      { path }
    );
  }
  return parseConfigData(data, path);
}

function absolute(cwd: string, path: string): string {
  return isAbsolute(path) ? path : resolve(cwd, path);
}

// $SDK-relative roots are resolved later, against the SDK path
function absoluteRepository(cwd: string, path: string): string {
  return path.startsWith('$') ? path : absolute(cwd, path);
}

/**
 * Effective configuration for `cwd`.
 *
 * Relative paths are resolved against `cwd`. The SDK path falls back to the
 * ANDROID_HOME environment variable; repositories from the file and from
 * `overrides` are both kept, file entries first.
 */
export async function loadConfig(
  cwd: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<ResolverConfig> {
  const configPath = join(cwd, FILE_PATTERNS.CONFIG_JSONC);
  let fileConfig: ConfigOverrides = {};

  if (await exists(configPath)) {
    logger.debug(`Loading config from: ${configPath}`);
    fileConfig = await readConfigFile(configPath);
  } else {
    logger.debug('Config file not found, using defaults');
  }

  const sdkPath = overrides.sdkPath ?? fileConfig.sdkPath ?? env[ENV_VARS.SDK_ROOT];
  const repositories = [...(fileConfig.repositories ?? []), ...(overrides.repositories ?? [])];

  return {
    sdkPath: sdkPath ? absolute(cwd, sdkPath) : undefined,
    settingsDir: absolute(cwd, overrides.settingsDir ?? fileConfig.settingsDir ?? DEFAULT_CONFIG.settingsDir),
    repositories: [...new Set(repositories.map(r => absoluteRepository(cwd, r)))],
    destination: absolute(cwd, overrides.destination ?? fileConfig.destination ?? DEFAULT_CONFIG.destination),
    useLatest: overrides.useLatest ?? fileConfig.useLatest ?? DEFAULT_CONFIG.useLatest
  };
}
