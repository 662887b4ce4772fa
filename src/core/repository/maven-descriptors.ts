/**
 * Readers for the two Maven descriptors a local repository provides:
 * maven-metadata.xml (available versions) and <artifact>-<version>.pom
 * (declared dependencies).
 */

import { XMLParser } from 'fast-xml-parser';
import { readTextFile } from '../../utils/fs.js';
import { ResolutionError } from '../../utils/errors.js';

export interface PomDependency {
  groupId: string;
  artifactId: string;
  version?: string;
  scope?: string;
  optional: boolean;
}

const ARRAY_PATHS = new Set([
  'metadata.versioning.versions.version',
  'project.dependencies.dependency'
]);

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (_name: string, jpath: string) => ARRAY_PATHS.has(jpath)
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(value: unknown, name: string): unknown {
  return isRecord(value) ? value[name] : undefined;
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function asList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined ? [] : [value];
}

function parseXml(content: string, path: string): unknown {
  try {
    return parser.parse(content, true);
  } catch (error) {
    throw new ResolutionError(`Unreadable descriptor: ${path}`, { path, error });
  }
}

/**
 * Versions listed in a maven-metadata.xml document, in document order.
 */
export function parseMetadataVersions(content: string, path = 'maven-metadata.xml'): string[] {
  const document = parseXml(content, path);
  const versions = child(child(child(document, 'metadata'), 'versioning'), 'versions');
  return asList(child(versions, 'version'))
    .map(text)
    .filter((v): v is string => v !== undefined);
}

/**
 * Dependencies declared in a POM document, in document order. Entries
 * without a groupId or artifactId are skipped.
 */
export function parsePomDependencies(content: string, path = 'pom.xml'): PomDependency[] {
  const document = parseXml(content, path);
  const dependencies = child(child(document, 'project'), 'dependencies');
  const result: PomDependency[] = [];

  for (const entry of asList(child(dependencies, 'dependency'))) {
    const groupId = text(child(entry, 'groupId'));
    const artifactId = text(child(entry, 'artifactId'));
    if (!groupId || !artifactId) {
      continue;
    }
    result.push({
      groupId,
      artifactId,
      version: text(child(entry, 'version')),
      scope: text(child(entry, 'scope')),
      optional: text(child(entry, 'optional')) === 'true'
    });
  }

  return result;
}

export async function readMetadataVersions(path: string): Promise<string[]> {
  return parseMetadataVersions(await readTextFile(path), path);
}

export async function readPomDependencies(path: string): Promise<PomDependency[]> {
  return parsePomDependencies(await readTextFile(path), path);
}
