/**
 * Common types and interfaces for the recipekit CLI application
 */

export * from './recipe.js';
export * from './execution-context.js';

// Core application types
export interface RecipeKitDirectories {
  config: string;
  data: string;
}

export interface ProfileConfig {
  description?: string;
  settings?: Record<string, string>;
  options?: Record<string, string | number | boolean>;
}

export interface RecipeKitConfig {
  /** Root of the local package registry; defaults to ~/.recipekit/registry */
  registry?: string;
  /** Default parallel job count handed to the build tool */
  jobs?: number;
  profiles?: Record<string, ProfileConfig>;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  exitCode?: number;
  warnings?: string[];
}

// Error types
export class RecipeKitError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RecipeKitError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_VALUE = 'INVALID_VALUE',
  INVALID_RECIPE = 'INVALID_RECIPE',
  VERSION_CONFLICT = 'VERSION_CONFLICT',
  OPTION_CONFLICT = 'OPTION_CONFLICT',
  CYCLE_DETECTED = 'CYCLE_DETECTED',
  DEPENDENCY_UNAVAILABLE = 'DEPENDENCY_UNAVAILABLE',
  UNSUPPORTED_SETTING = 'UNSUPPORTED_SETTING',
  CONFIGURE_ERROR = 'CONFIGURE_ERROR',
  BUILD_ERROR = 'BUILD_ERROR',
  PACKAGE_ERROR = 'PACKAGE_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
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
