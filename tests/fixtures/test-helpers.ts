/**
 * Test helpers: configuration, databases and in-process stand-ins for
 * child processes and signals.
 */

import { EventEmitter } from 'node:events';
import { resolve } from 'node:path';
import { writeFileSync } from 'node:fs';
import { buildConfig, type Config } from '../../src/config/index.js';
import { openDatabase, type SQLiteConnection } from '../../src/db/factory.js';
import type { SupervisedChild } from '../../src/bootstrap/child-process.js';
import type { SignalSource } from '../../src/core/signals.js';
import {
  TEST_DATA_DIR,
  cleanupDbFiles,
  ensureDataDirectory,
  removeDataDirectory,
} from './db-utils.js';

/**
 * Configuration from the test environment plus overrides
 */
export function createTestConfig(overrides: NodeJS.ProcessEnv = {}): Config {
  return buildConfig({ ...process.env, ...overrides });
}

export interface TestDb {
  connection: SQLiteConnection;
  dbPath: string;
  cleanup: () => void;
}

/**
 * Fresh SQLite file under the test data directory
 */
export function createTestDb(name: string): TestDb {
  ensureDataDirectory();
  const dbPath = resolve(TEST_DATA_DIR, `${name}.db`);
  cleanupDbFiles(dbPath);

  const connection = openDatabase({ path: dbPath, busyTimeoutMs: 5000 });
  return {
    connection,
    dbPath,
    cleanup: () => {
      if (connection.sqlite.open) {
        connection.sqlite.close();
      }
      cleanupDbFiles(dbPath);
    },
  };
}

/**
 * Directory of migration files written by the test
 *
 * @returns the directory and a cleanup function
 */
export function createMigrationsDir(
  name: string,
  files: Record<string, string>
): { dir: string; cleanup: () => void } {
  removeDataDirectory(name);
  const dir = ensureDataDirectory(name);
  for (const [file, sql] of Object.entries(files)) {
    writeFileSync(resolve(dir, file), sql);
  }
  return { dir, cleanup: () => removeDataDirectory(name) };
}

/**
 * Child process stand-in: records signals, exits when told to
 */
export class FakeChild extends EventEmitter implements SupervisedChild {
  readonly pid = 4242;
  readonly signalsReceived: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signalsReceived.push(signal);
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('exit', code, signal);
  }

  fail(error: Error): void {
    this.emit('error', error);
  }
}

/**
 * Signal source stand-in; `send('SIGTERM')` plays the role of `kill -TERM`
 */
export class FakeSignals extends EventEmitter implements SignalSource {
  send(signal: NodeJS.Signals): void {
    this.emit(signal, signal);
  }
}
