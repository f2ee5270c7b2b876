/**
 * Runs the initialization step as a child process so that its exit
 * status can be observed.
 */

import { parseCommandLine, runChild, type ChildResult, type SpawnChild } from './child-process.js';
import { createSpawnError } from '../core/errors.js';

export interface InitRunnerOptions {
  /** External command line (PARFUME_INIT_COMMAND); defaults to this CLI's `init-db` */
  command?: string | undefined;
  /** Script path of this CLI; defaults to process.argv[1] */
  cliPath?: string | undefined;
  env?: NodeJS.ProcessEnv;
  spawnChild?: SpawnChild;
}

/**
 * Command line of the init step.
 * The default re-runs the current CLI with the same Node.js flags
 * (so `--import tsx` carries over in development).
 */
export function resolveInitCommand(options: InitRunnerOptions): readonly string[] | undefined {
  if (options.command) {
    return parseCommandLine(options.command);
  }
  const cliPath = options.cliPath ?? process.argv[1];
  if (!cliPath) return undefined;
  return [process.execPath, ...process.execArgv, cliPath, 'init-db'];
}

export function runInitStep(options: InitRunnerOptions = {}): Promise<ChildResult> {
  const commandLine = resolveInitCommand(options);
  if (!commandLine) {
    return Promise.resolve({
      kind: 'spawn-error',
      error: createSpawnError(options.command ?? 'init-db', 'no command to run'),
    });
  }
  return runChild(commandLine, {
    env: options.env ?? process.env,
    spawnChild: options.spawnChild,
  });
}
