/**
 * Database Configuration Section
 *
 * SQLite database settings.
 */

import { z } from 'zod';
import { defineSection } from '../schema-builder.js';

export const databaseSection = defineSection({
  name: 'database',
  description: 'SQLite database configuration.',
  schema: z.object({
    path: z.string().min(1),
    busyTimeoutMs: z.number().int().positive(),
  }),
  options: {
    path: {
      envKey: 'PARFUME_DB_PATH',
      defaultValue: 'bv_parfume.db',
      description:
        'Path to SQLite database file. Supports ~ expansion. Relative paths resolved from PARFUME_DATA_DIR.',
      parse: 'path',
    },
    busyTimeoutMs: {
      envKey: 'PARFUME_DB_BUSY_TIMEOUT_MS',
      defaultValue: 5000,
      description: 'SQLite busy timeout in milliseconds. How long to wait for locks.',
      parse: 'int',
    },
  },
});
