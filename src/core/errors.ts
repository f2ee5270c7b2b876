/**
 * Core error definitions - transport-agnostic
 *
 * Error class, codes and factory functions shared by the CLI, the
 * bootstrap sequence, the database layer and the HTTP server.
 */

/**
 * Sanitize error messages to remove sensitive information in production.
 * Redacts file system paths and stack frames.
 */
export function sanitizeErrorMessage(message: string): string {
  // Check production mode dynamically for testability
  if (process.env.NODE_ENV !== 'production') {
    return message;
  }

  return (
    message
      // Unix paths: /app/..., /home/..., /var/..., etc.
      .replace(
        /\/(?:app|Users|home|var|tmp|etc|opt|usr|private|root|srv|mnt)\/[^\s:,)'"]+/gi,
        '[REDACTED_PATH]'
      )
      // Windows paths
      .replace(/[A-Z]:\\[^\s:,)'"]+/gi, '[REDACTED_PATH]')
      // Stack trace lines
      .replace(/at\s+[\w.<>]+\s+\([^)]+\)/g, '[REDACTED_STACK]')
      .replace(/at\s+[^\s]+:[0-9]+:[0-9]+/g, '[REDACTED_STACK]')
  );
}

export class ParfumeError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ParfumeError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  INVALID_CONFIG: 'E1000',
  INVALID_PARAMETER: 'E1001',
  CONFIRMATION_REQUIRED: 'E1002',

  // Resource errors (2000-2999)
  NOT_FOUND: 'E2000',

  // Database errors (4000-4999)
  DATABASE_ERROR: 'E4000',
  MIGRATION_ERROR: 'E4001',
  CONNECTION_ERROR: 'E4002',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
  SERVICE_UNAVAILABLE: 'E5002',
  SPAWN_ERROR: 'E5003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Database-specific errors
 */
export class DatabaseError extends ParfumeError {
  constructor(
    message: string,
    code: string = ErrorCodes.DATABASE_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'DatabaseError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a validation error for a field or configuration key
 */
export function createValidationError(
  field: string,
  message: string,
  details?: Record<string, unknown>
): ParfumeError {
  const code = field === 'config' ? ErrorCodes.INVALID_CONFIG : ErrorCodes.INVALID_PARAMETER;
  return new ParfumeError(`Validation error: ${field} - ${message}`, code, { field, ...details });
}

/**
 * Create a not found error for a resource
 */
export function createNotFoundError(resource: string, identifier?: string): ParfumeError {
  const message = identifier ? `${resource} not found: ${identifier}` : `${resource} not found`;
  return new ParfumeError(message, ErrorCodes.NOT_FOUND, { resource, identifier });
}

/**
 * Create an error for a dependency that cannot serve requests right now
 */
export function createServiceUnavailableError(service: string, reason?: string): ParfumeError {
  const message = reason ? `${service} is unavailable: ${reason}` : `${service} is unavailable`;
  return new ParfumeError(message, ErrorCodes.SERVICE_UNAVAILABLE, {
    service,
    suggestion: `Check ${service} configuration and run \`bv-parfume init-db\``,
  });
}

/**
 * Create an error for a migration file that failed to apply
 */
export function createMigrationError(migration: string, cause: unknown): DatabaseError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new DatabaseError(`Migration ${migration} failed: ${reason}`, ErrorCodes.MIGRATION_ERROR, {
    migration,
  });
}

/**
 * Create an error for a child process that could not be started
 */
export function createSpawnError(command: string, cause: unknown): ParfumeError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new ParfumeError(`Could not start \`${command}\`: ${reason}`, ErrorCodes.SPAWN_ERROR, {
    command,
  });
}
