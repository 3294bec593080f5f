import { RecipeKitError, ErrorCodes, CommandResult } from '../types/index.js';
import { EXIT_CODES, type ExitCode } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Error taxonomy of the recipe evaluator and build orchestrator
 */

export class InvalidValueError extends RecipeKitError {
  constructor(axis: string, value: unknown, domain?: readonly unknown[]) {
    const allowed = domain ? `. Allowed: ${domain.map(v => String(v)).join(', ')}` : '';
    super(`Invalid value '${String(value)}' for '${axis}'${allowed}`, ErrorCodes.INVALID_VALUE, { axis, value, domain });
    this.name = 'InvalidValueError';
  }
}

export class InvalidRecipeError extends RecipeKitError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid recipe: ${reason}`, ErrorCodes.INVALID_RECIPE, details);
    this.name = 'InvalidRecipeError';
  }
}

export class VersionConflictError extends RecipeKitError {
  constructor(
    packageName: string,
    details: {
      ranges: string[];
      requestedBy: string[];
      availableVersions?: string[];
    }
  ) {
    const requests = details.ranges.map((range, i) => `${range} (from ${details.requestedBy[i]})`);
    const msg = `No version of '${packageName}' satisfies ranges: ${requests.join(', ')}${details.availableVersions?.length ? `. Available: ${details.availableVersions.join(', ')}` : ''}`;
    super(msg, ErrorCodes.VERSION_CONFLICT, { packageName, ...details });
    this.name = 'VersionConflictError';
  }
}

export class OptionConflictError extends RecipeKitError {
  constructor(packageName: string, option: string, values: Array<{ value: unknown; requestedBy: string }>) {
    const detail = values.map(v => `${String(v.value)} (from ${v.requestedBy})`).join(', ');
    super(`Conflicting values for option '${packageName}:${option}': ${detail}`, ErrorCodes.OPTION_CONFLICT, {
      packageName,
      option,
      values
    });
    this.name = 'OptionConflictError';
  }
}

export class CycleDetectedError extends RecipeKitError {
  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`, ErrorCodes.CYCLE_DETECTED, { cycle });
    this.name = 'CycleDetectedError';
  }
}

export class DependencyUnavailableError extends RecipeKitError {
  constructor(packageName: string, reason: string) {
    super(`Dependency '${packageName}' is unavailable: ${reason}`, ErrorCodes.DEPENDENCY_UNAVAILABLE, { packageName, reason });
    this.name = 'DependencyUnavailableError';
  }
}

export class UnsupportedSettingError extends RecipeKitError {
  constructor(axis: string, value: string, tool: string) {
    super(`Setting '${axis}=${value}' has no ${tool} mapping`, ErrorCodes.UNSUPPORTED_SETTING, { axis, value, tool });
    this.name = 'UnsupportedSettingError';
  }
}

export class ConfigureError extends RecipeKitError {
  constructor(exitCode: number | null, details?: Record<string, unknown>) {
    super(`Configure step failed${exitCode === null ? ' (terminated)' : ` with exit code ${exitCode}`}`, ErrorCodes.CONFIGURE_ERROR, {
      exitCode,
      ...details
    });
    this.name = 'ConfigureError';
  }
}

export class BuildError extends RecipeKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.BUILD_ERROR, details);
    this.name = 'BuildError';
  }
}

export class PackageError extends RecipeKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.PACKAGE_ERROR, details);
    this.name = 'PackageError';
  }
}

export class FileSystemError extends RecipeKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ConfigError extends RecipeKitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Map an error code to the process exit code of the command that raised it
 */
export function exitCodeFor(code: ErrorCodes): ExitCode {
  switch (code) {
    case ErrorCodes.UNSUPPORTED_SETTING:
    case ErrorCodes.CONFIGURE_ERROR:
      return EXIT_CODES.CONFIGURE_FAILED;
    case ErrorCodes.BUILD_ERROR:
      return EXIT_CODES.BUILD_FAILED;
    case ErrorCodes.PACKAGE_ERROR:
      return EXIT_CODES.PACKAGE_FAILED;
    default:
      return EXIT_CODES.RESOLUTION_FAILED;
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof RecipeKitError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message,
      exitCode: exitCodeFor(error.code)
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message,
      exitCode: EXIT_CODES.RESOLUTION_FAILED
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred',
      exitCode: EXIT_CODES.RESOLUTION_FAILED
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
        process.exit(130);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(result.exitCode ?? EXIT_CODES.RESOLUTION_FAILED);
    }
  };
}
