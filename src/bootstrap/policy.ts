/**
 * Startup policy: decides from the init step's result whether the server
 * is launched, and otherwise with which code the process exits.
 */

import type { InitPolicy } from '../config/index.js';
import { InitExitCode, outcomeForExitCode, signalExitCode } from '../core/exit-codes.js';
import type { ChildResult } from './child-process.js';

export type StartupDecision =
  | { launch: true; reason: string }
  | { launch: false; exitCode: number; reason: string };

/**
 * Human-readable description of an init result, for logs
 */
export function describeInitResult(result: ChildResult): string {
  switch (result.kind) {
    case 'exited': {
      const outcome = outcomeForExitCode(result.code);
      return outcome ? `${outcome} (exit ${result.code})` : `unexpected exit ${result.code}`;
    }
    case 'signaled':
      return `killed by ${result.signal}`;
    case 'spawn-error':
      return `could not start: ${result.error.message}`;
  }
}

/**
 * strict: launch only after Initialized (0) or AlreadyInitialized (1);
 *   any other exit status is propagated unchanged, a signal becomes
 *   128 + signum and a spawn failure becomes Fatal (2).
 * lenient: always launch.
 */
export function decideStartup(policy: InitPolicy, result: ChildResult): StartupDecision {
  const reason = describeInitResult(result);

  if (policy === 'lenient') {
    return { launch: true, reason };
  }

  switch (result.kind) {
    case 'exited':
      if (
        result.code === InitExitCode.Initialized ||
        result.code === InitExitCode.AlreadyInitialized
      ) {
        return { launch: true, reason };
      }
      return { launch: false, exitCode: result.code, reason };
    case 'signaled':
      return { launch: false, exitCode: signalExitCode(result.signal), reason };
    case 'spawn-error':
      return { launch: false, exitCode: InitExitCode.Fatal, reason };
  }
}
