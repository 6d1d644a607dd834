/**
 * Error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-4)
 * - message: user-facing message
 * - details: optional verbose details
 *
 * Only fatal conditions are thrown. Per-item misses are collected in result
 * objects and never reach this module.
 */

import { getLogger } from './logger.js';

export abstract class BackupToolError extends Error {
  abstract readonly code: number;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }

  getExitCode(): number {
    return this.code;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input error (exit code 1)
 * Triggered by: malformed arguments, missing required options
 */
export class InvalidInputError extends BackupToolError {
  readonly code = 1;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  static fromInvalidNumber(flag: string, value: string): InvalidInputError {
    return new InvalidInputError(
      `${flag} must be a non-negative number, got: ${value}`,
      `Example: ${flag} 60`
    );
  }
}

/**
 * Data access error (exit code 2)
 * Triggered by: database missing, unreadable, locked or with an unexpected schema
 */
export class DataAccessError extends BackupToolError {
  readonly code = 2;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, DataAccessError.prototype);
  }

  static fromMissingDatabase(dbPath: string, hint?: string): DataAccessError {
    return new DataAccessError(
      `Database not found at ${dbPath}.${hint ? ` ${hint}` : ''}`,
      'Check the path, or pass the database location explicitly'
    );
  }

  static fromLocked(dbPath: string): DataAccessError {
    return new DataAccessError(
      `Database is locked: ${dbPath}`,
      'The owning application holds a write lock; quit it or try again in a moment'
    );
  }

  static fromSchema(dbPath: string, reason: string): DataAccessError {
    return new DataAccessError(
      `Unsupported database schema in ${dbPath}: ${reason}`,
      'The database was probably written by a macOS release this tool does not know yet'
    );
  }

  static fromUnreadable(dbPath: string, reason: string): DataAccessError {
    return new DataAccessError(`Cannot read database ${dbPath}: ${reason}`);
  }
}

/**
 * Source directory error (exit code 3)
 * Triggered by: the downloaded-photos directory is missing or not a directory
 */
export class SourceDirectoryError extends BackupToolError {
  readonly code = 3;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, SourceDirectoryError.prototype);
  }

  static fromMissing(path: string): SourceDirectoryError {
    return new SourceDirectoryError(
      `Source directory not found: ${path}`,
      'Point --source-dir at the directory icloudpd downloads into'
    );
  }

  static fromNotDirectory(path: string): SourceDirectoryError {
    return new SourceDirectoryError(`Source path is not a directory: ${path}`);
  }
}

/**
 * Export error (exit code 4)
 * Triggered by: an album mapping or report that cannot be written or parsed
 */
export class ExportError extends BackupToolError {
  readonly code = 4;

  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, ExportError.prototype);
  }

  static fromWriteFailure(path: string, reason: string): ExportError {
    return new ExportError(`Failed to write ${path}: ${reason}`);
  }

  static fromInvalidMapping(path: string, reason: string): ExportError {
    return new ExportError(`Invalid album mapping in ${path}: ${reason}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof BackupToolError) {
    return error.getExitCode();
  }
  return 1;
}

/**
 * Handle and log error, then exit
 */
export function handleError(error: unknown): never {
  if (error instanceof BackupToolError) {
    error.log();
    process.exit(error.getExitCode());
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}
