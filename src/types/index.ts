/**
 * Common types and interfaces for the envsnap CLI application
 */

export * from './execution-context.js';

// Core application types
export interface EnvsnapDirectories {
  config: string;
  data: string;
  cache: string;
  runtime: string;
}

export interface RegistryConfig {
  url: string;
}

export interface AlternateRegistryConfig {
  url: string;
  /** Packages that are only published to the alternate registry */
  packages: string[];
}

export interface GithubConfig {
  /** Branch that snapshot files are read from */
  branch: string;
}

export interface EnvsnapConfig {
  rscript: string;
  rCommand: string;
  libraryPaths?: string[];
  installLibrary?: string;
  primaryRegistry: RegistryConfig;
  alternateRegistry: AlternateRegistryConfig;
  /** Packages shipped with the runtime itself; these are never installed */
  corePackages: string[];
  github: GithubConfig;
  snapshotPath: string;
  downloadTimeoutMs: number;
}

// Command option types

export interface SnapshotOptions {
  output?: string;
  force?: boolean;
}

export interface InsertOptions {
  path?: string;
  force?: boolean;
}

export interface RestoreCommandOptions {
  github?: string;
  pathInRepo?: string;
  strict?: boolean;
  stopOnWrongRuntime?: boolean;
  skipLast?: boolean;
  dryRun?: boolean;
  library?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class EnvsnapError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EnvsnapError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  RUNTIME_VERSION_MISMATCH = 'RUNTIME_VERSION_MISMATCH',
  INSTALL_FAILED = 'INSTALL_FAILED',
  MALFORMED_VERSION = 'MALFORMED_VERSION',
  INVALID_SNAPSHOT = 'INVALID_SNAPSHOT',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
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
