/**
 * CLI Error Handling
 *
 * Provides consistent error handling for CLI commands.
 */

import { mapError } from '../../utils/error-mapper.js';
import { InitExitCode } from '../../core/exit-codes.js';

/**
 * Print the error to stderr as JSON and mark the process Fatal (2).
 * Exit code 1 is reserved for AlreadyInitialized.
 */
export function handleCliError(error: unknown): void {
  const mapped = mapError(error);

  const output = {
    error: mapped.message,
    code: mapped.code,
    ...(mapped.details ? { details: mapped.details } : {}),
  };

  console.error(JSON.stringify(output, null, 2));
  process.exitCode = InitExitCode.Fatal;
}

