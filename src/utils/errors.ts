import { ModKeeperError, ErrorCodes, CommandResult, type ErrorDetails } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure kinds of the bundle workflows.
 * Each one aborts the current command only.
 */

function quoteList(ids: string[]): string {
  return ids.map(id => `'${id}'`).join(', ');
}

export class DuplicateBundleError extends ModKeeperError {
  constructor(bundleId: string) {
    super(`Bundle '${bundleId}' is already installed`, ErrorCodes.DUPLICATE_BUNDLE, { bundleId });
    this.name = 'DuplicateBundleError';
  }
}

export class UnknownBundleError extends ModKeeperError {
  constructor(bundleId: string) {
    super(`Bundle '${bundleId}' is not tracked`, ErrorCodes.UNKNOWN_BUNDLE, { bundleId });
    this.name = 'UnknownBundleError';
  }
}

export class SelfDependencyError extends ModKeeperError {
  constructor(bundleId: string) {
    super(`Bundle '${bundleId}' cannot depend on itself`, ErrorCodes.SELF_DEPENDENCY, { bundleId });
    this.name = 'SelfDependencyError';
  }
}

export class CyclicDependencyError extends ModKeeperError {
  /**
   * @param path - existing path of edges leading from `dependency` back to `dependant`
   */
  constructor(dependant: string, dependency: string, path: string[]) {
    const cycle = [dependant, ...path].join(' → ');
    super(
      `Adding '${dependency}' as a dependency of '${dependant}' would create a cycle: ${cycle}`,
      ErrorCodes.CYCLIC_DEPENDENCY,
      { dependant, dependency, path }
    );
    this.name = 'CyclicDependencyError';
  }
}

export class HasDependantsError extends ModKeeperError {
  public readonly dependants: string[];

  constructor(bundleId: string, dependants: string[]) {
    super(
      `Cannot remove '${bundleId}': still required by ${quoteList(dependants)}`,
      ErrorCodes.HAS_DEPENDANTS,
      { bundleId, dependants }
    );
    this.name = 'HasDependantsError';
    this.dependants = dependants;
  }
}

export class NoCandidateError extends ModKeeperError {
  constructor(location: string, action: 'install' | 'remove' = 'install') {
    super(`No bundles available to ${action} in '${location}'`, ErrorCodes.NO_CANDIDATE, { location, action });
    this.name = 'NoCandidateError';
  }
}

export class PlacementError extends ModKeeperError {
  constructor(bundleId: string, reason: string, details?: ErrorDetails) {
    super(`Failed to install files of '${bundleId}': ${reason}`, ErrorCodes.PLACEMENT_FAILED, { bundleId, ...details });
    this.name = 'PlacementError';
  }
}

export class RemovalError extends ModKeeperError {
  constructor(bundleId: string, reason: string, details?: ErrorDetails) {
    super(`Failed to remove files of '${bundleId}': ${reason}`, ErrorCodes.REMOVAL_FAILED, { bundleId, ...details });
    this.name = 'RemovalError';
  }
}

export class StateFileError extends ModKeeperError {
  constructor(message: string, details?: ErrorDetails) {
    super(`State file error: ${message}`, ErrorCodes.STATE_IO_ERROR, details);
    this.name = 'StateFileError';
  }
}

export class FileSystemError extends ModKeeperError {
  constructor(message: string, details?: ErrorDetails) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends ModKeeperError {
  constructor(message: string, details?: ErrorDetails) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class NotInstalledError extends ValidationError {
  constructor(bundleId: string) {
    super(`Bundle '${bundleId}' is not installed`, { bundleId });
    this.name = 'NotInstalledError';
  }
}

export class ConfigError extends ModKeeperError {
  constructor(message: string, details?: ErrorDetails) {
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
 * Extract a readable reason from an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof ModKeeperError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
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
      // Handle user cancellation gracefully - just exit without error message
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
