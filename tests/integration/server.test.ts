/**
 * HTTP routes exercised in process with app.inject.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createServer, resolveCorsOrigins } from '../../src/restapi/server.js';
import { DatabaseHandle } from '../../src/db/connection.js';
import { openDatabase } from '../../src/db/factory.js';
import { initializeStore } from '../../src/bootstrap/initializer.js';
import { ErrorCodes } from '../../src/core/errors.js';
import { VERSION } from '../../src/version.js';
import {
  canCountDescriptors,
  cleanupDbFiles,
  countOpenDescriptors,
  ensureDataDirectory,
  writeCorruptDbFile,
} from '../fixtures/db-utils.js';
import { createTestConfig } from '../fixtures/test-helpers.js';
import { resolve } from 'node:path';

const dbPath = resolve(ensureDataDirectory(), 'server.db');

function unavailable(): never {
  throw new Error('unable to open database file');
}

describe('HTTP server', () => {
  let app: FastifyInstance;
  let database: DatabaseHandle;

  beforeEach(async () => {
    cleanupDbFiles(dbPath);
    database = new DatabaseHandle({ path: dbPath, busyTimeoutMs: 5000 });
    app = await createServer({ config: createTestConfig(), database });
  });

  afterEach(async () => {
    await app.close();
    database.close();
    cleanupDbFiles(dbPath);
  });

  it('GET /health answers without opening the database', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'healthy' });
    expect(database.isOpen).toBe(false);
  });

  it('GET / describes the service', async () => {
    const response = await app.inject({ method: 'GET', url: '/' });

    expect(response.json()).toEqual({
      name: 'BV Parfume API',
      version: VERSION,
      docs: '/docs',
      health: '/health',
      api: '/api/v1',
      frontend: 'http://localhost:8000',
    });
  });

  it('GET /docs serves the OpenAPI document', async () => {
    const response = await app.inject({ method: 'GET', url: '/docs' });
    const body: unknown = response.json();

    expect(response.statusCode).toBe(200);
    expect(body).toMatchObject({ openapi: '3.0.3', info: { title: 'BV Parfume API' } });
  });

  it('sets security headers', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.headers['x-frame-options']).toBe('DENY');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  describe('GET /api/v1/status', () => {
    it('reports pending migrations on a fresh database', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/status' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        initialized: false,
        migrations: { applied: [], pending: ['0000_create_users.sql'] },
        accounts: { user: 0, seller: 0, support: 0, admin: 0 },
      });
    });

    it('reports the seeded accounts after initialization', async () => {
      const connection = openDatabase({ path: dbPath, busyTimeoutMs: 5000 });
      initializeStore(connection, {
        seedDemoAccounts: true,
        seed: { emailDomain: 'bvparfume.uz', bcryptRounds: 4 },
      });
      connection.sqlite.close();

      const response = await app.inject({ method: 'GET', url: '/api/v1/status' });

      expect(response.json()).toEqual({
        initialized: true,
        migrations: { applied: ['0000_create_users.sql'], pending: [] },
        accounts: { user: 0, seller: 1, support: 1, admin: 1 },
      });
    });
  });
});

describe('HTTP server over a broken database', () => {
  it('answers 503 on the status route and keeps /health up', async () => {
    const app = await createServer({
      config: createTestConfig(),
      database: new DatabaseHandle({ path: dbPath, busyTimeoutMs: 5000 }, unavailable),
    });

    try {
      const status = await app.inject({ method: 'GET', url: '/api/v1/status' });
      expect(status.statusCode).toBe(503);
      expect(status.json()).toMatchObject({
        error: 'Database is unavailable: unable to open database file',
        code: ErrorCodes.SERVICE_UNAVAILABLE,
        details: { service: 'Database' },
      });

      const health = await app.inject({ method: 'GET', url: '/health' });
      expect(health.statusCode).toBe(200);
    } finally {
      await app.close();
    }
  });

  it('hides error details in production', async () => {
    const app = await createServer({
      config: createTestConfig({ NODE_ENV: 'production' }),
      database: new DatabaseHandle({ path: dbPath, busyTimeoutMs: 5000 }, unavailable),
    });

    try {
      const status = await app.inject({ method: 'GET', url: '/api/v1/status' });
      expect(status.statusCode).toBe(503);
      expect(status.json()).toEqual({
        error: 'Internal Server Error',
        code: ErrorCodes.SERVICE_UNAVAILABLE,
      });
    } finally {
      await app.close();
    }
  });
});

describe('HTTP server over a corrupt database file', () => {
  const corruptPath = resolve(ensureDataDirectory(), 'server-corrupt.db');
  let app: FastifyInstance;
  let database: DatabaseHandle;

  beforeEach(async () => {
    writeCorruptDbFile(corruptPath);
    database = new DatabaseHandle({ path: corruptPath, busyTimeoutMs: 100 });
    app = await createServer({ config: createTestConfig(), database });
  });

  afterEach(async () => {
    await app.close();
    database.close();
    cleanupDbFiles(corruptPath);
  });

  it('answers 503 on the status route', async () => {
    const status = await app.inject({ method: 'GET', url: '/api/v1/status' });

    expect(status.statusCode).toBe(503);
    const body: unknown = status.json();
    expect(body).toMatchObject({
      code: ErrorCodes.SERVICE_UNAVAILABLE,
      details: { service: 'Database' },
    });
    expect(body).toHaveProperty(
      'error',
      expect.stringMatching(/^Database is unavailable: Failed to open database: /)
    );
    expect(database.isOpen).toBe(false);
  });

  it.skipIf(!canCountDescriptors)('leaves no descriptor open across retries', async () => {
    for (let i = 0; i < 20; i++) {
      const status = await app.inject({ method: 'GET', url: '/api/v1/status' });
      expect(status.statusCode).toBe(503);
    }

    expect(countOpenDescriptors(corruptPath)).toBe(0);
    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
  });
});

describe('resolveCorsOrigins', () => {
  it('should keep http(s) origins only', () => {
    expect(resolveCorsOrigins(['https://shop.example', 'ftp://files.example', 'nope'])).toEqual([
      'https://shop.example',
    ]);
  });

  it('should disable CORS without origins', () => {
    expect(resolveCorsOrigins([])).toBe(false);
  });
});
