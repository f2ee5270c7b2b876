import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { config, type Config } from '../../config/index.js';
import { openDatabase } from '../../db/factory.js';
import { getMigrationFiles, getMigrationStatus, type MigrationStatus } from '../../db/init.js';
import { countUsersByRole } from '../../db/seed.js';
import type { UserRole } from '../../db/schema.js';
import { formatOutput } from '../utils/output.js';
import { getOutputFormat } from '../utils/context.js';
import { handleCliError } from '../utils/errors.js';

export interface StatusReport extends MigrationStatus {
  databasePath: string;
  accounts: Record<UserRole, number>;
}

const NO_ACCOUNTS: Record<UserRole, number> = { user: 0, seller: 0, support: 0, admin: 0 };

/**
 * Read-only report; a missing database file is reported as
 * uninitialized and is not created
 */
export function getStatusReport(
  configuration: Config,
  options: { migrationsDir?: string } = {}
): StatusReport {
  if (!existsSync(configuration.database.path)) {
    const pendingMigrations = getMigrationFiles(options.migrationsDir).map((m) => m.name);
    return {
      databasePath: configuration.database.path,
      initialized: false,
      appliedMigrations: [],
      pendingMigrations,
      totalMigrations: pendingMigrations.length,
      accounts: { ...NO_ACCOUNTS },
    };
  }

  const { sqlite, db } = openDatabase({
    path: configuration.database.path,
    busyTimeoutMs: configuration.database.busyTimeoutMs,
    fileMustExist: true,
  });
  try {
    const status = getMigrationStatus(sqlite, options);
    return {
      databasePath: configuration.database.path,
      ...status,
      accounts: status.initialized ? countUsersByRole(db) : { ...NO_ACCOUNTS },
    };
  } finally {
    sqlite.close();
  }
}

export function addStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show migration status and account counts')
    .action((_options: unknown, cmd: Command) => {
      try {
        console.log(formatOutput(getStatusReport(config), getOutputFormat(cmd)));
      } catch (error) {
        handleCliError(error);
      }
    });
}
