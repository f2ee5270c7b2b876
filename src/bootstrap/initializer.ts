/**
 * The initialization step: migrations, then demo accounts.
 */

import type { SQLiteConnection } from '../db/factory.js';
import { applyMigrations, type MigrationOptions } from '../db/init.js';
import { seedDemoAccounts, type SeedOptions } from '../db/seed.js';
import { InitExitCode, type InitOutcome } from '../core/exit-codes.js';
import { mapError } from '../utils/error-mapper.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('init');

export interface InitializeOptions extends MigrationOptions {
  /** Seed demo accounts into an empty users table */
  seedDemoAccounts: boolean;
  seed: SeedOptions;
}

export interface InitializeResult {
  outcome: InitOutcome;
  exitCode: number;
  migrationsApplied: string[];
  accountsSeeded: number;
  errors: string[];
}

/**
 * Bring the store up to date.
 *
 * Never throws: any failure is reported as the Fatal outcome.
 * AlreadyInitialized means nothing was pending and no account was seeded.
 */
export function initializeStore(
  connection: SQLiteConnection,
  options: InitializeOptions
): InitializeResult {
  const result: InitializeResult = {
    outcome: 'Fatal',
    exitCode: InitExitCode.Fatal,
    migrationsApplied: [],
    accountsSeeded: 0,
    errors: [],
  };

  try {
    result.migrationsApplied = applyMigrations(connection.sqlite, options);
    if (options.seedDemoAccounts) {
      result.accountsSeeded = seedDemoAccounts(connection.db, options.seed);
    }
  } catch (error) {
    const mapped = mapError(error);
    result.errors.push(mapped.message);
    logger.error({ code: mapped.code, error: mapped.message }, 'Initialization failed');
    return result;
  }

  result.outcome =
    result.migrationsApplied.length > 0 || result.accountsSeeded > 0
      ? 'Initialized'
      : 'AlreadyInitialized';
  result.exitCode = InitExitCode[result.outcome];

  logger.info(
    {
      outcome: result.outcome,
      migrations: result.migrationsApplied.length,
      accounts: result.accountsSeeded,
    },
    result.outcome === 'Initialized' ? 'Database initialized' : 'Database already initialized, skipping'
  );
  return result;
}
