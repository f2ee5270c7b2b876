import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { openDatabase } from '../../src/db/factory.js';
import {
  applyMigrations,
  dropAllTables,
  getMigrationFiles,
  getMigrationStatus,
  isDatabaseInitialized,
  splitStatements,
} from '../../src/db/init.js';
import { DatabaseError, ErrorCodes } from '../../src/core/errors.js';
import { createMigrationsDir, createTestDb, type TestDb } from '../fixtures/test-helpers.js';
import {
  canCountDescriptors,
  cleanupDbFiles,
  countOpenDescriptors,
  ensureDataDirectory,
  writeCorruptDbFile,
} from '../fixtures/db-utils.js';

describe('splitStatements', () => {
  it('should split on statement breakpoints and drop comment-only chunks', () => {
    const sql = [
      '-- leading comment',
      'CREATE TABLE a (id integer);',
      '--> statement-breakpoint',
      '-- only a comment',
      '--> statement-breakpoint',
      'CREATE INDEX i ON a (id);',
    ].join('\n');

    expect(splitStatements(sql)).toEqual(['CREATE TABLE a (id integer);', 'CREATE INDEX i ON a (id);']);
  });
});

describe('migrations', () => {
  let testDb: TestDb;

  beforeEach(() => {
    testDb = createTestDb('migrations');
  });

  afterEach(() => {
    testDb.cleanup();
  });

  it('should find the bundled migrations in name order', () => {
    expect(getMigrationFiles().map((m) => m.name)).toEqual(['0000_create_users.sql']);
  });

  it('should apply pending migrations once', () => {
    const { sqlite } = testDb.connection;

    expect(isDatabaseInitialized(sqlite)).toBe(false);
    expect(applyMigrations(sqlite)).toEqual(['0000_create_users.sql']);
    expect(isDatabaseInitialized(sqlite)).toBe(true);
    expect(applyMigrations(sqlite)).toEqual([]);

    expect(getMigrationStatus(sqlite)).toEqual({
      initialized: true,
      appliedMigrations: ['0000_create_users.sql'],
      pendingMigrations: [],
      totalMigrations: 1,
    });
  });

  it('should report pending migrations on a fresh database', () => {
    expect(getMigrationStatus(testDb.connection.sqlite)).toEqual({
      initialized: false,
      appliedMigrations: [],
      pendingMigrations: ['0000_create_users.sql'],
      totalMigrations: 1,
    });
  });

  it('should not create the ledger when reading the status', () => {
    const { sqlite } = testDb.connection;
    getMigrationStatus(sqlite);

    const ledger = sqlite
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE name = '_migrations'`)
      .all();
    expect(ledger).toEqual([]);
  });

  it('should roll back every migration when one fails', () => {
    const { dir, cleanup } = createMigrationsDir('bad-migrations', {
      '0000_ok.sql': 'CREATE TABLE a (id integer);',
      '0001_bad.sql': 'CREATE TABLE b (id integer);\n--> statement-breakpoint\nTHIS IS NOT SQL;',
    });
    const { sqlite } = testDb.connection;

    try {
      expect(() => applyMigrations(sqlite, { migrationsDir: dir })).toThrow(DatabaseError);
      try {
        applyMigrations(sqlite, { migrationsDir: dir });
      } catch (error) {
        expect(error).toBeInstanceOf(DatabaseError);
        if (error instanceof DatabaseError) {
          expect(error.code).toBe(ErrorCodes.MIGRATION_ERROR);
          expect(error.message).toMatch(/^Migration 0001_bad\.sql failed: /);
        }
      }

      const status = getMigrationStatus(sqlite, { migrationsDir: dir });
      expect(status.appliedMigrations).toEqual([]);
      expect(status.pendingMigrations).toEqual(['0000_ok.sql', '0001_bad.sql']);
      const tables = sqlite
        .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE name IN ('a', 'b')`)
        .all();
      expect(tables).toEqual([]);
    } finally {
      cleanup();
    }
  });

  it('should fail when there are no migration files', () => {
    const { dir, cleanup } = createMigrationsDir('empty-migrations', {});
    try {
      expect(() => applyMigrations(testDb.connection.sqlite, { migrationsDir: dir })).toThrow(
        'No migration files found'
      );
    } finally {
      cleanup();
    }
  });

  it('should drop every table, the ledger included', () => {
    const { sqlite } = testDb.connection;
    applyMigrations(sqlite);

    expect(dropAllTables(sqlite).sort()).toEqual(['_migrations', 'users']);
    expect(isDatabaseInitialized(sqlite)).toBe(false);
  });
});

describe('openDatabase', () => {
  const corruptPath = resolve(ensureDataDirectory(), 'factory-corrupt.db');

  beforeEach(() => {
    writeCorruptDbFile(corruptPath);
  });

  afterEach(() => {
    cleanupDbFiles(corruptPath);
  });

  it('should reject a file that is not a SQLite database', () => {
    try {
      openDatabase({ path: corruptPath, busyTimeoutMs: 100 });
      expect.unreachable('openDatabase should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(DatabaseError);
      if (error instanceof DatabaseError) {
        expect(error.code).toBe(ErrorCodes.CONNECTION_ERROR);
        expect(error.message).toMatch(/^Failed to open database: /);
        expect(error.context).toEqual({ path: corruptPath });
      }
    }
  });

  it.skipIf(!canCountDescriptors)('should close the file after a failed open', () => {
    for (let i = 0; i < 10; i++) {
      expect(() => openDatabase({ path: corruptPath, busyTimeoutMs: 100 })).toThrow(DatabaseError);
    }
    expect(countOpenDescriptors(corruptPath)).toBe(0);
  });

  it('should not create a missing file when it must exist', () => {
    const missing = resolve(ensureDataDirectory(), 'factory-missing.db');
    cleanupDbFiles(missing);

    expect(() => openDatabase({ path: missing, busyTimeoutMs: 100, fileMustExist: true })).toThrow(
      DatabaseError
    );
    expect(existsSync(missing)).toBe(false);
  });
});
