/**
 * HTTP Server Configuration Section
 */

import { z } from 'zod';
import { defineSection } from '../schema-builder.js';

export const serverSection = defineSection({
  name: 'server',
  description: 'HTTP server configuration.',
  schema: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    bodyLimit: z.number().int().min(1024).max(104857600),
    corsOrigins: z.array(z.string()),
    trustProxy: z.boolean(),
    frontendUrl: z.string().url(),
  }),
  options: {
    host: {
      envKey: 'PARFUME_HOST',
      defaultValue: '0.0.0.0',
      description: 'Interface the HTTP server binds to. All interfaces by default.',
    },
    port: {
      envKey: 'PARFUME_PORT',
      defaultValue: 8000,
      description: 'HTTP server port. The container image exposes this port.',
      parse: 'port',
    },
    bodyLimit: {
      envKey: 'PARFUME_BODY_LIMIT',
      defaultValue: 1048576,
      description: 'Maximum request body size in bytes (default: 1 MiB).',
      parse: 'int',
    },
    corsOrigins: {
      envKey: 'PARFUME_CORS_ORIGINS',
      defaultValue: [],
      description:
        'Comma-separated list of allowed CORS origins. Empty disables CORS (same-origin only).',
      parse: 'stringArray',
    },
    trustProxy: {
      envKey: 'PARFUME_TRUST_PROXY',
      defaultValue: false,
      description: 'Trust X-Forwarded-* headers from a reverse proxy.',
    },
    frontendUrl: {
      envKey: 'PARFUME_FRONTEND_URL',
      defaultValue: 'http://localhost:8000',
      description: 'Public URL of the storefront, reported by the service descriptor.',
    },
  },
});
