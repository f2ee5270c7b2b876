/**
 * Paths Configuration Section
 *
 * Directory path settings.
 */

import { z } from 'zod';
import { defineSection } from '../schema-builder.js';
import { getDataDir } from '../parsers.js';

export const pathsSection = defineSection({
  name: 'paths',
  description: 'Directory path configuration.',
  schema: z.object({
    dataDir: z.string().min(1),
  }),
  options: {
    dataDir: {
      envKey: 'PARFUME_DATA_DIR',
      defaultValue: 'data',
      description:
        'Writable data directory holding the SQLite file. Supports ~ expansion. Defaults to <project>/data (/app/data in the image).',
      fromEnv: (_envValue, _defaultValue, env) => getDataDir(env),
    },
  },
});
