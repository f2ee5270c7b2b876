/**
 * OpenAPI Specification Generator
 *
 * Describes the routes served by the HTTP server.
 */

import { VERSION } from '../../version.js';
import { USER_ROLES } from '../../db/schema.js';

// =============================================================================
// OpenAPI SPEC TYPES
// =============================================================================

export interface OpenAPISchema {
  type: 'object' | 'string' | 'integer' | 'boolean' | 'array';
  properties?: Record<string, OpenAPISchema>;
  items?: OpenAPISchema;
  enum?: string[];
  required?: string[];
}

export interface OpenAPIOperation {
  summary: string;
  operationId: string;
  tags: string[];
  responses: Record<
    string,
    { description: string; content?: { 'application/json': { schema: OpenAPISchema } } }
  >;
}

export interface OpenAPISpec {
  openapi: string;
  info: {
    title: string;
    version: string;
    description: string;
  };
  servers: Array<{
    url: string;
    description: string;
  }>;
  paths: Record<string, { get: OpenAPIOperation }>;
  tags: Array<{
    name: string;
    description: string;
  }>;
}

// =============================================================================
// SPEC GENERATION
// =============================================================================

const errorSchema: OpenAPISchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    code: { type: 'string' },
    details: { type: 'object' },
  },
  required: ['error', 'code'],
};

type OpenAPIResponse = OpenAPIOperation['responses'][string];

function json(description: string, schema: OpenAPISchema): OpenAPIResponse {
  return { description, content: { 'application/json': { schema } } };
}

/**
 * Generate the OpenAPI 3.0 specification
 *
 * @param serverUrl - Base URL advertised under `servers`
 */
export function generateOpenAPISpec(serverUrl: string): OpenAPISpec {
  const accountCounts: Record<string, OpenAPISchema> = {};
  for (const role of USER_ROLES) {
    accountCounts[role] = { type: 'integer' };
  }

  return {
    openapi: '3.0.3',
    info: {
      title: 'BV Parfume API',
      version: VERSION,
      description: 'Operational endpoints of the BV Parfume backend.',
    },
    servers: [{ url: serverUrl, description: 'BV Parfume backend' }],
    tags: [
      { name: 'system', description: 'Liveness and service metadata' },
      { name: 'status', description: 'Database initialization status' },
    ],
    paths: {
      '/health': {
        get: {
          summary: 'Liveness probe',
          operationId: 'getHealth',
          tags: ['system'],
          responses: {
            '200': json('Service is up', {
              type: 'object',
              properties: { status: { type: 'string', enum: ['healthy'] } },
              required: ['status'],
            }),
          },
        },
      },
      '/': {
        get: {
          summary: 'Service descriptor',
          operationId: 'getServiceInfo',
          tags: ['system'],
          responses: {
            '200': json('Service name, version and links', {
              type: 'object',
              properties: {
                name: { type: 'string' },
                version: { type: 'string' },
                docs: { type: 'string' },
                health: { type: 'string' },
                api: { type: 'string' },
                frontend: { type: 'string' },
              },
            }),
          },
        },
      },
      '/docs': {
        get: {
          summary: 'This OpenAPI document',
          operationId: 'getOpenAPISpec',
          tags: ['system'],
          responses: { '200': json('OpenAPI 3 document', { type: 'object' }) },
        },
      },
      '/api/v1/status': {
        get: {
          summary: 'Database initialization status',
          operationId: 'getStatus',
          tags: ['status'],
          responses: {
            '200': json('Migrations and seeded accounts', {
              type: 'object',
              properties: {
                initialized: { type: 'boolean' },
                migrations: {
                  type: 'object',
                  properties: {
                    applied: { type: 'array', items: { type: 'string' } },
                    pending: { type: 'array', items: { type: 'string' } },
                  },
                },
                accounts: { type: 'object', properties: accountCounts },
              },
              required: ['initialized', 'migrations', 'accounts'],
            }),
            '503': json('Database unavailable', errorSchema),
          },
        },
      },
    },
  };
}
