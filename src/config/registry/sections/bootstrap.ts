/**
 * Bootstrap Configuration Section
 *
 * Controls the `start` sequence: initialization step, policy, server hand-off.
 */

import { z } from 'zod';
import { defineSection } from '../schema-builder.js';

export const INIT_POLICIES = ['strict', 'lenient'] as const;

export const bootstrapSection = defineSection({
  name: 'bootstrap',
  description: 'Startup orchestration configuration.',
  schema: z.object({
    initPolicy: z.enum(INIT_POLICIES),
    skipInit: z.boolean(),
    initCommand: z.string().optional(),
    serverCommand: z.string().optional(),
  }),
  options: {
    initPolicy: {
      envKey: 'PARFUME_INIT_POLICY',
      defaultValue: 'strict',
      description:
        'strict: only Initialized (0) and AlreadyInitialized (1) let the server start; lenient: the server always starts.',
      allowedValues: INIT_POLICIES,
    },
    skipInit: {
      envKey: 'PARFUME_SKIP_INIT',
      defaultValue: false,
      description: 'Skip the initialization step in `start`. Useful for read-only deployments.',
    },
    initCommand: {
      envKey: 'PARFUME_INIT_COMMAND',
      defaultValue: undefined,
      description: 'Command line of an external initialization step. Defaults to this CLI\'s `init-db`.',
      fromEnv: (envValue) => (envValue && envValue.trim() ? envValue.trim() : undefined),
    },
    serverCommand: {
      envKey: 'PARFUME_SERVER_COMMAND',
      defaultValue: undefined,
      description:
        'Command line of an external server to supervise. Defaults to serving in-process.',
      fromEnv: (envValue) => (envValue && envValue.trim() ? envValue.trim() : undefined),
    },
  },
});
