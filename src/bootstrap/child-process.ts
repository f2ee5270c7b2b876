/**
 * Child process plumbing shared by the init step and the supervised server.
 */

import { spawn } from 'node:child_process';
import { createSpawnError, type ParfumeError } from '../core/errors.js';

/**
 * The part of ChildProcess the bootstrap sequence relies on
 */
export interface SupervisedChild {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

export interface SpawnOptions {
  env: NodeJS.ProcessEnv;
}

export type SpawnChild = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => SupervisedChild;

/**
 * Spawn without a shell, sharing stdio with this process
 */
export const spawnChild: SpawnChild = (command, args, options) =>
  spawn(command, args, { env: options.env, stdio: 'inherit' });

/**
 * How a child process ended
 */
export type ChildResult =
  | { kind: 'exited'; code: number }
  | { kind: 'signaled'; signal: NodeJS.Signals }
  | { kind: 'spawn-error'; error: ParfumeError };

/**
 * Split a command line on whitespace. Quoting is not interpreted.
 */
export function parseCommandLine(commandLine: string): [string, ...string[]] | undefined {
  const [command, ...args] = commandLine.trim().split(/\s+/).filter(Boolean);
  return command === undefined ? undefined : [command, ...args];
}

/**
 * Resolve once the child exits, is killed, or fails to start
 */
export function waitForChild(child: SupervisedChild, commandLine: string): Promise<ChildResult> {
  return new Promise((resolve) => {
    let settled = false;
    const settle = (result: ChildResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    child.once('error', (error) => {
      settle({ kind: 'spawn-error', error: createSpawnError(commandLine, error) });
    });
    child.once('exit', (code, signal) => {
      if (signal) {
        settle({ kind: 'signaled', signal });
      } else {
        settle({ kind: 'exited', code: code ?? 0 });
      }
    });
  });
}

/**
 * Spawn a command line and wait for it. A synchronous spawn failure
 * resolves as a spawn error rather than rejecting.
 */
export function runChild(
  commandLine: readonly string[],
  options: SpawnOptions & { spawnChild?: SpawnChild }
): Promise<ChildResult> {
  const display = commandLine.join(' ');
  const [command, ...args] = commandLine;
  if (command === undefined) {
    return Promise.resolve({
      kind: 'spawn-error',
      error: createSpawnError(display, 'empty command'),
    });
  }

  let child: SupervisedChild;
  try {
    child = (options.spawnChild ?? spawnChild)(command, args, { env: options.env });
  } catch (error) {
    return Promise.resolve({ kind: 'spawn-error', error: createSpawnError(display, error) });
  }
  return waitForChild(child, display);
}
