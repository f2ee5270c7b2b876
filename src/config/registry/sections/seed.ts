/**
 * Seed Configuration Section
 *
 * Demo accounts created by the initialization step.
 */

import { z } from 'zod';
import { defineSection } from '../schema-builder.js';

export const seedSection = defineSection({
  name: 'seed',
  description: 'Demo account seeding configuration.',
  schema: z.object({
    demoAccounts: z.boolean(),
    emailDomain: z.string().min(1),
    bcryptRounds: z.number().int().min(4).max(15),
  }),
  options: {
    demoAccounts: {
      envKey: 'PARFUME_SEED_DEMO_ACCOUNTS',
      defaultValue: true,
      description: 'Seed the admin, seller and support demo accounts into an empty users table.',
    },
    emailDomain: {
      envKey: 'PARFUME_DEMO_EMAIL_DOMAIN',
      defaultValue: 'bvparfume.uz',
      description: 'Mail domain of the demo accounts (admin@<domain>, seller@<domain>, ...).',
    },
    bcryptRounds: {
      envKey: 'PARFUME_BCRYPT_ROUNDS',
      defaultValue: 10,
      description: 'bcrypt cost factor for demo account password hashes.',
      parse: 'int',
    },
  },
});
