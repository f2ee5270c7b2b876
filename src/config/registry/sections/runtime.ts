/**
 * Runtime Configuration Section
 *
 * Runtime environment settings.
 */

import { z } from 'zod';
import { defineSection } from '../schema-builder.js';
import { projectRoot } from '../parsers.js';

export const runtimeSection = defineSection({
  name: 'runtime',
  description: 'Runtime environment configuration.',
  schema: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']),
    projectRoot: z.string(),
  }),
  options: {
    nodeEnv: {
      envKey: 'NODE_ENV',
      defaultValue: 'development',
      description: 'Node.js environment: development, production, or test.',
      allowedValues: ['development', 'production', 'test'],
    },
    projectRoot: {
      envKey: '',
      defaultValue: projectRoot,
      description: 'Project root directory (computed, not from env var).',
      fromEnv: () => projectRoot,
    },
  },
});
