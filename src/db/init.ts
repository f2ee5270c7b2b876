/**
 * Database migration module
 *
 * Applies the SQL files in src/db/migrations/ in file-name order and
 * records each one in the _migrations ledger.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type Database from 'better-sqlite3';
import { createComponentLogger } from '../utils/logger.js';
import { createMigrationError, DatabaseError, ErrorCodes } from '../core/errors.js';

const logger = createComponentLogger('migrations');

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface MigrationFile {
  name: string;
  path: string;
}

export interface MigrationOptions {
  /** Directory holding the *.sql files; located automatically when omitted */
  migrationsDir?: string;
}

export interface MigrationStatus {
  initialized: boolean;
  appliedMigrations: string[];
  pendingMigrations: string[];
  totalMigrations: number;
}

/**
 * Locate the migrations directory.
 * From dist/db/ the SQL files still live in src/db/migrations/.
 */
export function findMigrationsDir(): string | undefined {
  const possiblePaths = [
    resolve(__dirname, 'migrations'), // src/db/migrations when running from sources
    resolve(__dirname, '../../src/db/migrations'), // from dist/db/
  ];
  return possiblePaths.find((path) => existsSync(path));
}

/**
 * Create the migrations tracking table if it doesn't exist
 */
function ensureMigrationTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP NOT NULL
    )
  `);
}

function hasTable(sqlite: Database.Database, name: string): boolean {
  const row = sqlite
    .prepare<[string], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`
    )
    .get(name);
  return row !== undefined;
}

/**
 * Names recorded in the ledger; read-only, empty before the first migration
 */
function getAppliedMigrations(sqlite: Database.Database): string[] {
  if (!hasTable(sqlite, '_migrations')) {
    return [];
  }
  return sqlite
    .prepare<[], { name: string }>('SELECT name FROM _migrations ORDER BY id')
    .all()
    .map((row) => row.name);
}

/**
 * List migration files sorted by name (0000_, 0001_, ...)
 */
export function getMigrationFiles(migrationsDir?: string): MigrationFile[] {
  const dir = migrationsDir ?? findMigrationsDir();
  if (!dir || !existsSync(dir)) {
    return [];
  }

  return readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((file) => ({ name: file, path: resolve(dir, file) }));
}

/**
 * Split a migration file into statements on drizzle-kit's
 * `--> statement-breakpoint` markers, dropping leading comment lines.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];

  for (const rawStmt of sql.split(/-->\s*statement-breakpoint/i)) {
    const lines = rawStmt.trim().split('\n');
    const firstSql = lines.findIndex((line) => !line.trim().startsWith('--'));
    if (firstSql === -1) continue;

    const statement = lines.slice(firstSql).join('\n').trim();
    if (statement) {
      statements.push(statement);
    }
  }

  return statements;
}

/**
 * True once the accounts table exists
 */
export function isDatabaseInitialized(sqlite: Database.Database): boolean {
  return hasTable(sqlite, 'users');
}

/**
 * Apply every pending migration in one transaction.
 *
 * @returns names of the migrations applied, empty when nothing was pending
 * @throws DatabaseError when no migration files exist or a statement fails;
 *   the transaction is rolled back and the ledger is unchanged
 */
export function applyMigrations(sqlite: Database.Database, options: MigrationOptions = {}): string[] {
  const migrationFiles = getMigrationFiles(options.migrationsDir);
  if (migrationFiles.length === 0) {
    throw new DatabaseError('No migration files found in src/db/migrations/', ErrorCodes.MIGRATION_ERROR, {
      migrationsDir: options.migrationsDir ?? findMigrationsDir(),
    });
  }

  ensureMigrationTable(sqlite);
  const applied = new Set(getAppliedMigrations(sqlite));
  const pending = migrationFiles.filter((m) => !applied.has(m.name));
  if (pending.length === 0) {
    logger.debug('No pending migrations');
    return [];
  }

  const record = sqlite.prepare<[string]>('INSERT INTO _migrations (name) VALUES (?)');

  sqlite.transaction(() => {
    for (const migration of pending) {
      logger.info({ migration: migration.name }, 'Applying migration');
      try {
        for (const statement of splitStatements(readFileSync(migration.path, 'utf-8'))) {
          sqlite.exec(statement);
        }
      } catch (error) {
        throw createMigrationError(migration.name, error);
      }
      record.run(migration.name);
    }
  })();

  return pending.map((m) => m.name);
}

/**
 * Get current migration status
 */
export function getMigrationStatus(
  sqlite: Database.Database,
  options: MigrationOptions = {}
): MigrationStatus {
  const appliedMigrations = getAppliedMigrations(sqlite);
  const allMigrations = getMigrationFiles(options.migrationsDir).map((m) => m.name);
  const pendingMigrations = allMigrations.filter((m) => !appliedMigrations.includes(m));

  return {
    initialized: isDatabaseInitialized(sqlite),
    appliedMigrations,
    pendingMigrations,
    totalMigrations: allMigrations.length,
  };
}

/**
 * Drop every table, the ledger included.
 * USE WITH CAUTION - This will delete all data!
 *
 * @returns names of the dropped tables
 */
export function dropAllTables(sqlite: Database.Database): string[] {
  const tables = sqlite
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'`
    )
    .all()
    .map((row) => row.name);

  // Allow dropping tables in any order
  sqlite.pragma('foreign_keys = OFF');
  try {
    for (const table of tables) {
      sqlite.exec(`DROP TABLE IF EXISTS "${table.replace(/"/g, '""')}"`);
    }
  } finally {
    sqlite.pragma('foreign_keys = ON');
  }

  logger.warn({ tables }, 'Dropped all tables');
  return tables;
}
