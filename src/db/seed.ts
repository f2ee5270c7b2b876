/**
 * Demo account seeding
 */

import bcrypt from 'bcryptjs';
import { sql } from 'drizzle-orm';
import { users, type NewUser, type UserRole } from './schema.js';
import type { AppDb } from './factory.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('seed');

export interface DemoAccount {
  username: string;
  password: string;
  firstName: string;
  role: UserRole;
}

/**
 * Accounts listed in the README; email is `<username>@<domain>`.
 */
export const DEMO_ACCOUNTS: readonly DemoAccount[] = [
  { username: 'admin', password: 'Admin123', firstName: 'Админ', role: 'admin' },
  { username: 'seller', password: 'Seller123', firstName: 'Продавец', role: 'seller' },
  { username: 'support', password: 'Support123', firstName: 'Поддержка', role: 'support' },
];

export interface SeedOptions {
  emailDomain: string;
  bcryptRounds: number;
}

export function countUsers(db: AppDb): number {
  const row = db
    .select({ count: sql<number>`count(*)` })
    .from(users)
    .get();
  return row?.count ?? 0;
}

/**
 * Account count per role, every role present
 */
export function countUsersByRole(db: AppDb): Record<UserRole, number> {
  const counts: Record<UserRole, number> = { user: 0, seller: 0, support: 0, admin: 0 };
  const rows = db
    .select({ role: users.role, count: sql<number>`count(*)` })
    .from(users)
    .groupBy(users.role)
    .all();
  for (const row of rows) {
    counts[row.role] = row.count;
  }
  return counts;
}

/**
 * Insert the demo accounts when the users table is empty.
 *
 * @returns number of accounts inserted (0 when users already exist)
 */
export function seedDemoAccounts(db: AppDb, options: SeedOptions): number {
  if (countUsers(db) > 0) {
    logger.debug('Users present, skipping demo accounts');
    return 0;
  }

  const rows: NewUser[] = DEMO_ACCOUNTS.map((account) => ({
    email: `${account.username}@${options.emailDomain}`,
    username: account.username,
    passwordHash: bcrypt.hashSync(account.password, options.bcryptRounds),
    firstName: account.firstName,
    role: account.role,
  }));

  db.insert(users).values(rows).run();
  logger.info({ accounts: rows.map((r) => r.email) }, 'Seeded demo accounts');
  return rows.length;
}
