import { EnvsnapError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the envsnap CLI
 */

export class PackageNotFoundError extends EnvsnapError {
  constructor(packageName: string, details?: Record<string, unknown>) {
    super(`Package '${packageName}' not found`, ErrorCodes.PACKAGE_NOT_FOUND, { packageName, ...details });
    this.name = 'PackageNotFoundError';
  }
}

export class RuntimeVersionMismatchError extends EnvsnapError {
  constructor(public readonly required: string, public readonly found: string) {
    super(
      `Wrong R version: need version ${required}, found version ${found}`,
      ErrorCodes.RUNTIME_VERSION_MISMATCH,
      { required, found }
    );
    this.name = 'RuntimeVersionMismatchError';
  }
}

export class InstallError extends EnvsnapError {
  constructor(packageName: string, version: string, reason: string, details?: Record<string, unknown>) {
    super(
      `Failed to install ${packageName} (${version}): ${reason}`,
      ErrorCodes.INSTALL_FAILED,
      { packageName, version, ...details }
    );
    this.name = 'InstallError';
  }
}

export class MalformedVersionError extends EnvsnapError {
  constructor(version: string) {
    super(`Malformed version '${version}': no numeric components`, ErrorCodes.MALFORMED_VERSION, { version });
    this.name = 'MalformedVersionError';
  }
}

export class SnapshotFormatError extends EnvsnapError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid snapshot: ${reason}`, ErrorCodes.INVALID_SNAPSHOT, details);
    this.name = 'SnapshotFormatError';
  }
}

export class FileSystemError extends EnvsnapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class NetworkError extends EnvsnapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Network error: ${message}`, ErrorCodes.NETWORK_ERROR, details);
    this.name = 'NetworkError';
  }
}

export class ValidationError extends EnvsnapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends EnvsnapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof EnvsnapError) {
    // Keep CLI output quiet by default; details only surface in verbose mode
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
