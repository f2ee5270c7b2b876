import type { Command } from 'commander';
import { config, type Config } from '../../config/index.js';
import { openDatabase } from '../../db/factory.js';
import { dropAllTables } from '../../db/init.js';
import { initializeStore, type InitializeResult } from '../../bootstrap/initializer.js';
import { ErrorCodes, ParfumeError } from '../../core/errors.js';
import { InitExitCode } from '../../core/exit-codes.js';
import { formatOutput } from '../utils/output.js';
import { getOutputFormat } from '../utils/context.js';
import { handleCliError } from '../utils/errors.js';

export interface ResetResult extends InitializeResult {
  droppedTables: string[];
}

/**
 * Drop every table, then initialize from scratch.
 * USE WITH CAUTION - This will delete all data!
 */
export function resetStore(
  configuration: Config,
  options: { migrationsDir?: string } = {}
): ResetResult {
  const connection = openDatabase({
    path: configuration.database.path,
    busyTimeoutMs: configuration.database.busyTimeoutMs,
  });
  try {
    const droppedTables = dropAllTables(connection.sqlite);
    const result = initializeStore(connection, {
      migrationsDir: options.migrationsDir,
      seedDemoAccounts: configuration.seed.demoAccounts,
      seed: {
        emailDomain: configuration.seed.emailDomain,
        bcryptRounds: configuration.seed.bcryptRounds,
      },
    });
    return { ...result, droppedTables };
  } finally {
    connection.sqlite.close();
  }
}

export function addResetCommand(program: Command): void {
  program
    .command('reset')
    .description('Drop all tables and re-initialize (WARNING: deletes all data)')
    .option('--confirm', 'Confirm database reset')
    .action((options: { confirm?: boolean }, cmd: Command) => {
      try {
        if (!options.confirm) {
          throw new ParfumeError(
            'Refusing to reset without --confirm',
            ErrorCodes.CONFIRMATION_REQUIRED
          );
        }
        const result = resetStore(config);
        console.log(formatOutput(result, getOutputFormat(cmd)));
        process.exitCode = result.outcome === 'Fatal' ? InitExitCode.Fatal : 0;
      } catch (error) {
        handleCliError(error);
      }
    });
}
