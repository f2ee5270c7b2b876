/**
 * init-db: the initialization step.
 *
 * Exit status follows the init taxonomy: 0 Initialized,
 * 1 AlreadyInitialized, 2 Fatal.
 */

import type { Command } from 'commander';
import { config, type Config } from '../../config/index.js';
import { openDatabase, type SQLiteConnection } from '../../db/factory.js';
import { initializeStore, type InitializeResult } from '../../bootstrap/initializer.js';
import { InitExitCode } from '../../core/exit-codes.js';
import { mapError } from '../../utils/error-mapper.js';
import { formatOutput } from '../utils/output.js';
import { getOutputFormat } from '../utils/context.js';

export interface InitDbOptions {
  migrationsDir?: string;
}

/**
 * Open the configured database, initialize it and close it again
 */
export function runInitDb(configuration: Config, options: InitDbOptions = {}): InitializeResult {
  let connection: SQLiteConnection;
  try {
    connection = openDatabase({
      path: configuration.database.path,
      busyTimeoutMs: configuration.database.busyTimeoutMs,
    });
  } catch (error) {
    return {
      outcome: 'Fatal',
      exitCode: InitExitCode.Fatal,
      migrationsApplied: [],
      accountsSeeded: 0,
      errors: [mapError(error).message],
    };
  }

  try {
    return initializeStore(connection, {
      migrationsDir: options.migrationsDir,
      seedDemoAccounts: configuration.seed.demoAccounts,
      seed: {
        emailDomain: configuration.seed.emailDomain,
        bcryptRounds: configuration.seed.bcryptRounds,
      },
    });
  } finally {
    connection.sqlite.close();
  }
}

export function addInitDbCommand(program: Command): void {
  program
    .command('init-db')
    .description('Apply pending migrations and seed the demo accounts (exit 0 initialized, 1 already initialized, 2 fatal)')
    .action((_options: unknown, cmd: Command) => {
      const result = runInitDb(config);
      console.log(formatOutput(result, getOutputFormat(cmd)));
      process.exitCode = result.exitCode;
    });
}
