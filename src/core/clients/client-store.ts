import { join } from 'path';
import * as yaml from 'js-yaml';
import { exists, listFiles, readTextFile, remove, writeTextFile } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import type { DependencyRecord, Logger } from '../../types/index.js';
import { FILE_PATTERNS, MANAGED_FILE_HEADER } from '../../constants/index.js';

// Characters no supported platform accepts in a file name
const INVALID_FILE_NAME = /[<>:"/\\|?*\u0000-\u001f]/;

export function isValidClientName(clientName: string): boolean {
  return clientName.trim().length > 0 &&
    !INVALID_FILE_NAME.test(clientName) &&
    clientName !== '.' &&
    clientName !== '..';
}

export function validateClientName(clientName: string): void {
  if (!isValidClientName(clientName)) {
    throw new ValidationError(`Invalid client name "${clientName}"`, { clientName });
  }
}

export function clientFilePath(settingsDir: string, clientName: string): string {
  validateClientName(clientName);
  return join(settingsDir, `${FILE_PATTERNS.CLIENT_FILE_PREFIX}${clientName}${FILE_PATTERNS.CLIENT_FILE_SUFFIX}`);
}

/**
 * Client name encoded in a per-client file name, or null for other files.
 */
export function clientNameFromFile(fileName: string): string | null {
  const { CLIENT_FILE_PREFIX: prefix, CLIENT_FILE_SUFFIX: suffix } = FILE_PATTERNS;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(suffix)) {
    return null;
  }
  const name = fileName.slice(prefix.length, fileName.length - suffix.length);
  return isValidClientName(name) ? name : null;
}

export function splitList(value: string | undefined): string[] {
  return (value ?? '').split(/\s+/).filter(item => item.length > 0);
}

export function joinList(values: readonly string[] | undefined): string | undefined {
  const items = (values ?? []).filter(item => item.length > 0);
  return items.length > 0 ? items.join(' ') : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

// Lists are written space-delimited; a hand-edited YAML sequence is accepted too
function readList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((item: unknown) => splitList(nonEmptyString(item)));
  }
  return splitList(nonEmptyString(value));
}

function sanitizeRecord(entry: unknown): DependencyRecord | null {
  if (!isRecord(entry)) return null;

  const groupId = nonEmptyString(entry.groupId);
  const artifactId = nonEmptyString(entry.artifactId);
  const version = nonEmptyString(entry.version);
  if (!groupId || !artifactId || !version) {
    return null;
  }

  const record: DependencyRecord = { groupId, artifactId, version };
  const packageIds = readList(entry.packageIds);
  if (packageIds.length > 0) {
    record.packageIds = packageIds;
  }
  const repositories = readList(entry.repositories);
  if (repositories.length > 0) {
    record.repositories = repositories;
  }
  return record;
}

function serializeRecord(record: DependencyRecord): Record<string, string> {
  const entry: Record<string, string> = {
    groupId: record.groupId,
    artifactId: record.artifactId,
    version: record.version
  };
  const packageIds = joinList(record.packageIds);
  if (packageIds) {
    entry.packageIds = packageIds;
  }
  const repositories = joinList(record.repositories);
  if (repositories) {
    entry.repositories = repositories;
  }
  return entry;
}

/**
 * Reads and writes the per-client dependency files kept in a settings
 * directory.
 */
export class ClientStore {
  readonly settingsDir: string;
  private readonly logger: Logger;

  constructor(settingsDir: string, logger: Logger = defaultLogger) {
    this.settingsDir = settingsDir;
    this.logger = logger;
  }

  pathFor(clientName: string): string {
    return clientFilePath(this.settingsDir, clientName);
  }

  async read(clientName: string): Promise<DependencyRecord[]> {
    const path = this.pathFor(clientName);
    if (!(await exists(path))) {
      return [];
    }

    const content = await readTextFile(path);
    let parsed: unknown;
    try {
      // Every scalar stays a string, so "1.0" is not read back as 1
      parsed = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA });
    } catch (error) {
      this.logger.warn(`Failed to parse dependency file at ${path}: ${error}`);
      return [];
    }

    if (parsed === undefined || parsed === null) {
      return [];
    }
    const section = isRecord(parsed) ? parsed.dependencies : undefined;
    if (section === undefined || section === null) {
      return [];
    }
    if (!Array.isArray(section)) {
      this.logger.warn(`Invalid dependency file detected at ${path}, ignoring its contents.`);
      return [];
    }

    const records: DependencyRecord[] = [];
    section.forEach((entry: unknown, index: number) => {
      const record = sanitizeRecord(entry);
      if (record) {
        records.push(record);
      } else {
        this.logger.warn(`Skipping malformed dependency #${index + 1} in ${path}`);
      }
    });
    return records;
  }

  async write(clientName: string, records: readonly DependencyRecord[]): Promise<void> {
    const body = yaml.dump({ dependencies: records.map(serializeRecord) }, { lineWidth: 120 });
    await writeTextFile(this.pathFor(clientName), `${MANAGED_FILE_HEADER}\n\n${body}`);
  }

  async delete(clientName: string): Promise<void> {
    await remove(this.pathFor(clientName));
  }

  /** Names of every client with a dependency file, sorted */
  async listClients(): Promise<string[]> {
    if (!(await exists(this.settingsDir))) {
      return [];
    }
    return (await listFiles(this.settingsDir))
      .map(clientNameFromFile)
      .filter((name): name is string => name !== null)
      .sort();
  }

  /** Erase every client's dependency file */
  async deleteAll(): Promise<string[]> {
    const clients = await this.listClients();
    for (const clientName of clients) {
      await this.delete(clientName);
    }
    return clients;
  }
}
