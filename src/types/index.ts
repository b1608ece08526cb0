/**
 * Common types and interfaces for the modkeeper CLI application
 */

export * from './execution-context.js';

// Bundle types

export type BundleStatus = 'installed' | 'uninstalled';

export interface Bundle {
  /** Archive file name, e.g. `hd-textures.zip` */
  id: string;
  status: BundleStatus;
}

/**
 * Serialized shape of one bundle inside the state file.
 */
export interface BundleRecord {
  status: BundleStatus;
  dependencies?: string[];
}

export interface StateFileData {
  bundles: Record<string, BundleRecord>;
}

// Configuration

export interface ModKeeperConfig {
  installedDirName: string;
  uninstalledDirName: string;
  stateFileName: string;
  archiveExtension: string;
  /** Remove dependencies that no installed bundle needs anymore */
  cascade: boolean;
}

// Command options

export interface InstallOptions {
  bundle?: string;
  dependsOn?: string[];
  all?: boolean;
  /** Skip the confirmation of `--all`; bundles are then installed without dependencies */
  yes?: boolean;
  details?: boolean;
}

export interface RemoveOptions {
  bundle?: string;
  /** `false` only when `--no-cascade` is given; the config decides otherwise */
  cascade?: boolean;
  all?: boolean;
  yes?: boolean;
  details?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export enum ErrorCodes {
  DUPLICATE_BUNDLE = 'DUPLICATE_BUNDLE',
  UNKNOWN_BUNDLE = 'UNKNOWN_BUNDLE',
  SELF_DEPENDENCY = 'SELF_DEPENDENCY',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  HAS_DEPENDANTS = 'HAS_DEPENDANTS',
  NO_CANDIDATE = 'NO_CANDIDATE',
  PLACEMENT_FAILED = 'PLACEMENT_FAILED',
  REMOVAL_FAILED = 'REMOVAL_FAILED',
  STATE_IO_ERROR = 'STATE_IO_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

export type ErrorDetails = Record<string, unknown>;

export class ModKeeperError extends Error {
  public code: ErrorCodes;
  public details?: ErrorDetails;

  constructor(message: string, code: ErrorCodes, details?: ErrorDetails) {
    super(message);
    this.name = 'ModKeeperError';
    this.code = code;
    this.details = details;
  }
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
