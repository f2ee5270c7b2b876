/**
 * Lazily opened database handle.
 *
 * The server opens the store on the first request that needs it, so a
 * broken database surfaces as 503 on that request instead of at startup.
 */

import { openDatabase, type OpenDatabaseOptions, type SQLiteConnection } from './factory.js';
import { createServiceUnavailableError } from '../core/errors.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('connection');

export type DatabaseOpener = (options: OpenDatabaseOptions) => SQLiteConnection;

export class DatabaseHandle {
  private connection: SQLiteConnection | undefined;

  constructor(
    private readonly options: OpenDatabaseOptions,
    private readonly open: DatabaseOpener = openDatabase
  ) {}

  /**
   * Get the connection, opening it on first use.
   *
   * @throws ParfumeError (E5002) when the database cannot be opened;
   *   the next call retries
   */
  get(): SQLiteConnection {
    if (!this.connection) {
      try {
        this.connection = this.open(this.options);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error({ path: this.options.path, error: reason }, 'Database unavailable');
        throw createServiceUnavailableError('Database', reason);
      }
    }
    return this.connection;
  }

  get isOpen(): boolean {
    return this.connection !== undefined;
  }

  close(): void {
    if (this.connection) {
      this.connection.sqlite.close();
      this.connection = undefined;
    }
  }
}
