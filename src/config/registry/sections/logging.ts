/**
 * Logging Configuration Section
 */

import { z } from 'zod';
import { defineSection } from '../schema-builder.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const loggingSection = defineSection({
  name: 'logging',
  description: 'Logging configuration.',
  schema: z.object({
    level: z.enum(LOG_LEVELS),
  }),
  options: {
    level: {
      envKey: 'LOG_LEVEL',
      defaultValue: 'info',
      description: 'Log level: fatal, error, warn, info, debug, trace, or silent.',
      allowedValues: LOG_LEVELS,
    },
  },
});
