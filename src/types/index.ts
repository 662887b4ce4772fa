/**
 * Common types and interfaces for m2resolve
 */

export interface CommandResult {
  success: boolean;
  error?: string;
}

// Persisted client dependency types

/**
 * One declared dependency as stored in a client's dependency file.
 * `version` is the constraint as declared, never the resolved version.
 */
export interface DependencyRecord {
  groupId: string;
  artifactId: string;
  version: string;
  packageIds?: string[];
  repositories?: string[];
}

// Configuration types

export interface ResolverConfig {
  /** Root of the Android SDK; substituted for the $SDK token in repository paths */
  sdkPath?: string;
  /** Directory holding the per-client dependency files */
  settingsDir: string;
  /** Additional local Maven repositories, searched after the SDK defaults */
  repositories: string[];
  /** Directory resolved artifacts are deployed into */
  destination: string;
  /** Fall back to the newest version on irreconcilable conflicts */
  useLatest: boolean;
}

// Error types
export class ResolverError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ResolverError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  RESOLUTION_ERROR = 'RESOLUTION_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
