import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';
import { DatabaseError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('db-factory');

export type AppDb = BetterSQLite3Database<typeof schema>;

/**
 * SQLite database connection
 */
export interface SQLiteConnection {
  db: AppDb;
  sqlite: Database.Database;
}

export interface OpenDatabaseOptions {
  path: string;
  busyTimeoutMs: number;
  /** Fail instead of creating a missing file */
  fileMustExist?: boolean;
}

function openFailed(options: OpenDatabaseOptions, error: unknown): DatabaseError {
  const errorMessage = error instanceof Error ? error.message : String(error);
  return new DatabaseError(`Failed to open database: ${errorMessage}`, ErrorCodes.CONNECTION_ERROR, {
    path: options.path,
  });
}

/**
 * Open the SQLite file (creating its directory) with WAL, foreign keys
 * and a busy timeout, and wrap it in drizzle.
 *
 * @throws DatabaseError (E4002) when the file cannot be opened or is not
 *   a SQLite database; the handle is closed before throwing
 */
export function openDatabase(options: OpenDatabaseOptions): SQLiteConnection {
  let sqlite: Database.Database;

  try {
    const dir = dirname(options.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    sqlite = new Database(options.path, {
      timeout: options.busyTimeoutMs,
      fileMustExist: options.fileMustExist ?? false,
    });
  } catch (error) {
    throw openFailed(options, error);
  }

  // A file that is not a SQLite database fails on the first pragma
  try {
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    // Wait for locks instead of failing fast (init child and server may overlap)
    sqlite.pragma(`busy_timeout = ${options.busyTimeoutMs}`);
  } catch (error) {
    sqlite.close();
    throw openFailed(options, error);
  }

  logger.debug({ path: options.path }, 'Database opened');
  return { db: drizzle(sqlite, { schema }), sqlite };
}
