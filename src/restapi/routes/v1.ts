import type { FastifyInstance } from 'fastify';
import type { ServerContext } from '../server.js';
import { getMigrationStatus } from '../../db/init.js';
import { countUsersByRole } from '../../db/seed.js';
import type { UserRole } from '../../db/schema.js';

export interface StatusResponse {
  initialized: boolean;
  migrations: { applied: string[]; pending: string[] };
  accounts: Record<UserRole, number>;
}

export function registerV1Routes(app: FastifyInstance, context: ServerContext): void {
  // Opening the database may throw; the error handler answers 503
  app.get('/api/v1/status', async (): Promise<StatusResponse> => {
    const { sqlite, db } = context.database.get();
    const status = getMigrationStatus(sqlite, { migrationsDir: context.migrationsDir });
    const accounts = status.initialized
      ? countUsersByRole(db)
      : { user: 0, seller: 0, support: 0, admin: 0 };

    return {
      initialized: status.initialized && status.pendingMigrations.length === 0,
      migrations: {
        applied: status.appliedMigrations,
        pending: status.pendingMigrations,
      },
      accounts,
    };
  });
}
