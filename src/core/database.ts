/**
 * Read-only access to application-owned SQLite databases
 * The owning app (Photos, Voice Memos) may write concurrently, so databases
 * are never opened for writing and never assumed to be exclusively ours.
 */

import { stat } from 'fs/promises';
import Database from 'better-sqlite3';
import { DataAccessError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export type SqliteDatabase = Database.Database;

export interface OpenDatabaseOptions {
  /** Appended to the "not found" message */
  missingHint?: string;
  /** Milliseconds to wait on a write lock held by the owning app */
  busyTimeoutMs?: number;
}

/**
 * Translate a driver error into a DataAccessError
 */
export function toDataAccessError(dbPath: string, error: unknown): DataAccessError {
  if (error instanceof DataAccessError) {
    return error;
  }

  const message = errorMessage(error);
  const code = typeof error === 'object' && error !== null ? (error as NodeJS.ErrnoException).code : undefined;

  if (code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED') {
    return DataAccessError.fromLocked(dbPath);
  }
  if (/no such (table|column)/i.test(message)) {
    return DataAccessError.fromSchema(dbPath, message);
  }
  return DataAccessError.fromUnreadable(dbPath, message);
}

export async function openReadOnlyDatabase(
  dbPath: string,
  options: OpenDatabaseOptions = {}
): Promise<SqliteDatabase> {
  try {
    const stats = await stat(dbPath);
    if (!stats.isFile()) {
      throw DataAccessError.fromUnreadable(dbPath, 'not a regular file');
    }
  } catch (error) {
    if (error instanceof DataAccessError) {
      throw error;
    }
    throw DataAccessError.fromMissingDatabase(dbPath, options.missingHint);
  }

  try {
    const db = new Database(dbPath, {
      readonly: true,
      fileMustExist: true,
      timeout: options.busyTimeoutMs ?? 5000,
    });
    getLogger().debug(`Opened ${dbPath} read-only`);
    return db;
  } catch (error) {
    throw toDataAccessError(dbPath, error);
  }
}

/**
 * Open a database, run `fn`, and always close it afterwards
 * Driver errors thrown by `fn` surface as DataAccessError
 */
export async function withReadOnlyDatabase<T>(
  dbPath: string,
  fn: (db: SqliteDatabase) => T | Promise<T>,
  options: OpenDatabaseOptions = {}
): Promise<T> {
  const db = await openReadOnlyDatabase(dbPath, options);
  try {
    return await fn(db);
  } catch (error) {
    throw toDataAccessError(dbPath, error);
  } finally {
    db.close();
  }
}

/**
 * Column names of a table, empty when the table does not exist
 */
export function getTableColumns(db: SqliteDatabase, table: string): string[] {
  return db
    .prepare<[string], { name: string }>(`SELECT name FROM pragma_table_info(?)`)
    .all(table)
    .map((row) => row.name);
}

/**
 * Fail with a schema error unless every table has the listed columns
 */
export function assertSchema(
  db: SqliteDatabase,
  dbPath: string,
  required: Record<string, readonly string[]>
): void {
  for (const [table, columns] of Object.entries(required)) {
    const present = new Set(getTableColumns(db, table));
    if (present.size === 0) {
      throw DataAccessError.fromSchema(dbPath, `missing table ${table}`);
    }
    const absent = columns.filter((column) => !present.has(column));
    if (absent.length > 0) {
      throw DataAccessError.fromSchema(dbPath, `table ${table} lacks ${absent.join(', ')}`);
    }
  }
}
