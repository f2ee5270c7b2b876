/**
 * Exit-code contract of the initialization step.
 *
 * | Outcome            | Code |
 * |--------------------|------|
 * | Initialized        | 0    |
 * | AlreadyInitialized | 1    |
 * | Fatal              | 2    |
 *
 * Code 1 is the skip condition only; every error maps to Fatal.
 */

import { constants } from 'node:os';

export const InitExitCode = {
  Initialized: 0,
  AlreadyInitialized: 1,
  Fatal: 2,
} as const;

export type InitOutcome = keyof typeof InitExitCode;

/**
 * Outcome named by an exit code, undefined outside the taxonomy
 */
export function outcomeForExitCode(code: number): InitOutcome | undefined {
  switch (code) {
    case InitExitCode.Initialized:
      return 'Initialized';
    case InitExitCode.AlreadyInitialized:
      return 'AlreadyInitialized';
    case InitExitCode.Fatal:
      return 'Fatal';
    default:
      return undefined;
  }
}

/**
 * Shell convention for a process killed by a signal: 128 + signal number.
 * Signals without a number on this platform map to Fatal.
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  const signum: unknown = Reflect.get(constants.signals, signal);
  return typeof signum === 'number' ? 128 + signum : InitExitCode.Fatal;
}
