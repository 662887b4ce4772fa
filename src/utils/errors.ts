import { ResolverError, ErrorCodes, CommandResult } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the different failure kinds of m2resolve
 */

export const SDK_CONFIGURATION_MESSAGE =
  'Android SDK path not set. ' +
  'Pass --sdk <path>, set "sdkPath" in m2resolve.jsonc, ' +
  `or set the ${ENV_VARS.SDK_ROOT} environment variable.`;

export class ConfigurationError extends ResolverError {
  constructor(message: string = SDK_CONFIGURATION_MESSAGE, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, details);
    this.name = 'ConfigurationError';
  }
}

export class ResolutionError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.RESOLUTION_ERROR, details);
    this.name = 'ResolutionError';
  }
}

export class FileSystemError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends ResolverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Read the errno-style code off an unknown thrown value.
 */
export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof ResolverError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
        return;
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
