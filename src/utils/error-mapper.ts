import { ParfumeError, ErrorCodes, sanitizeErrorMessage } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  statusCode: number; // HTTP Status hint
  details?: Record<string, unknown>;
}

function hasStatusCode(error: object): error is { statusCode: unknown } {
  return 'statusCode' in error;
}

/**
 * better-sqlite3's SqliteError carries SQLITE_* in `code`, not the message
 */
function hasSqliteCode(error: Error): error is Error & { code: string } {
  return 'code' in error && typeof error.code === 'string' && error.code.startsWith('SQLITE_');
}

/**
 * Map any error to a standardized internal format.
 * Messages of 5xx errors are sanitized in production.
 */
export function mapError(error: unknown): MappedError {
  const mapped = mapErrorRaw(error);
  if (mapped.statusCode >= 500) {
    return { ...mapped, message: sanitizeErrorMessage(mapped.message) };
  }
  return mapped;
}

function mapErrorRaw(error: unknown): MappedError {
  // 1. Known ParfumeError
  if (error instanceof ParfumeError) {
    return {
      message: error.message,
      code: error.code,
      statusCode: getStatusCodeForErrorCode(error.code),
      details: error.context,
    };
  }

  // 2. Fastify/HTTP style errors with status codes
  if (typeof error === 'object' && error !== null && hasStatusCode(error)) {
    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    const message = error instanceof Error ? error.message : 'Request failed';
    return {
      message,
      code: 'HTTP_ERROR',
      statusCode,
    };
  }

  // 3. Standard errors
  if (error instanceof Error) {
    const message = error.message;

    // SQLite driver errors
    if (hasSqliteCode(error)) {
      return {
        message,
        code: ErrorCodes.DATABASE_ERROR,
        statusCode: 503,
        details: { sqliteCode: error.code },
      };
    }
    if (message.includes('unable to open database')) {
      return { message, code: ErrorCodes.DATABASE_ERROR, statusCode: 503 };
    }

    logger.warn({ error: message }, 'Unmapped internal error');
    return {
      message,
      code: ErrorCodes.INTERNAL_ERROR,
      statusCode: 500,
    };
  }

  // 4. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
    statusCode: 500,
  };
}

export function getStatusCodeForErrorCode(code: string): number {
  switch (code) {
    case ErrorCodes.INVALID_CONFIG:
    case ErrorCodes.INVALID_PARAMETER:
    case ErrorCodes.CONFIRMATION_REQUIRED:
      return 400;

    case ErrorCodes.NOT_FOUND:
      return 404;

    case ErrorCodes.SERVICE_UNAVAILABLE:
    case ErrorCodes.CONNECTION_ERROR:
      return 503;

    default:
      return 500;
  }
}
