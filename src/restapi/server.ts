import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import compress from '@fastify/compress';
import helmet from '@fastify/helmet';

import { createComponentLogger } from '../utils/logger.js';
import { config as defaultConfig, type Config } from '../config/index.js';
import { mapError } from '../utils/error-mapper.js';
import { DatabaseHandle } from '../db/connection.js';
import type { SignalSource } from '../core/signals.js';
import { SHUTDOWN_SIGNALS } from '../core/signals.js';
import { VERSION } from '../version.js';
import { registerV1Routes } from './routes/v1.js';
import { generateOpenAPISpec } from './openapi/generator.js';

const restLogger = createComponentLogger('http');

export interface ServerContext {
  config: Config;
  database: DatabaseHandle;
  /** Overrides the migrations directory (tests) */
  migrationsDir?: string | undefined;
}

/**
 * Validate a CORS origin URL.
 * Only http:// and https:// origins are accepted.
 */
function isValidCorsOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validated CORS origins, or false to disable CORS (same-origin only)
 */
export function resolveCorsOrigins(origins: readonly string[]): string[] | false {
  const validOrigins = origins.filter(isValidCorsOrigin);
  const invalidOrigins = origins.filter((origin) => !isValidCorsOrigin(origin));

  if (invalidOrigins.length > 0) {
    restLogger.warn(
      { invalidOrigins },
      'Invalid CORS origins ignored. Origins must be valid http:// or https:// URLs.'
    );
  }

  return validOrigins.length > 0 ? validOrigins : false;
}

/**
 * Create the HTTP server. Nothing here opens the database; routes that
 * need it go through the lazy handle.
 */
export async function createServer(context: ServerContext): Promise<FastifyInstance> {
  const { server } = context.config;

  const app = Fastify({
    // Fastify logging off; we rely on our own logger
    logger: false,
    disableRequestLogging: true,
    bodyLimit: server.bodyLimit,
    connectionTimeout: 30000,
    requestTimeout: 60000,
    trustProxy: server.trustProxy,
  });

  await app.register(cors, {
    origin: resolveCorsOrigins(server.corsOrigins),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
    maxAge: 86400,
  });

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:'],
      },
    },
    frameguard: {
      action: 'deny',
    },
    noSniff: true,
  });

  await app.register(compress, {
    global: true,
    threshold: 1024, // Only compress responses > 1KB
    encodings: ['gzip', 'deflate'],
  });

  // Liveness only; never touches the database
  app.get('/health', async () => ({ status: 'healthy' }));

  app.get('/', async () => ({
    name: 'BV Parfume API',
    version: VERSION,
    docs: '/docs',
    health: '/health',
    api: '/api/v1',
    frontend: server.frontendUrl,
  }));

  app.get('/docs', async () => generateOpenAPISpec(server.frontendUrl));

  registerV1Routes(app, context);

  app.setErrorHandler(async (error, request, reply) => {
    const mapped = mapError(error);
    restLogger.error(
      { code: mapped.code, statusCode: mapped.statusCode, url: request.url, error: mapped.message },
      'Request failed'
    );

    // Hide 5xx details in production
    const isProduction = context.config.runtime.nodeEnv === 'production';
    const safeMessage =
      mapped.statusCode >= 500 && isProduction ? 'Internal Server Error' : mapped.message;

    await reply.status(mapped.statusCode).send({
      error: safeMessage,
      code: mapped.code,
      ...(mapped.statusCode < 500 || !isProduction ? { details: mapped.details } : {}),
    });
  });

  return app;
}

export interface RunServerOptions {
  signals?: SignalSource;
  database?: DatabaseHandle;
}

/**
 * Listen on the configured host and port until SIGTERM or SIGINT, then
 * close the server and the database.
 */
export async function runServer(
  configuration: Config = defaultConfig,
  options: RunServerOptions = {}
): Promise<FastifyInstance> {
  const { host, port } = configuration.server;
  const signals = options.signals ?? process;
  const database =
    options.database ??
    new DatabaseHandle({
      path: configuration.database.path,
      busyTimeoutMs: configuration.database.busyTimeoutMs,
    });

  const app = await createServer({ config: configuration, database });

  const onSignal = (signal: NodeJS.Signals): void => {
    restLogger.info({ signal }, 'Shutting down HTTP server...');
    app.close().then(
      () => restLogger.info('HTTP server shutdown complete'),
      (error: unknown) => restLogger.error({ error: mapError(error).message }, 'Shutdown failed')
    );
  };

  app.addHook('onClose', async () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.off(signal, onSignal);
    }
    database.close();
  });

  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, onSignal);
  }

  try {
    await app.listen({ host, port });
  } catch (error) {
    await app.close();
    throw error;
  }
  restLogger.info({ host, port }, 'HTTP server listening');
  return app;
}
