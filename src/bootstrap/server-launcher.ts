/**
 * Server hand-off after the init step.
 *
 * In-process: this process becomes the server (same PID, so signals sent
 * to the container reach the server directly).
 * Supervised: an external server command runs as a child; termination
 * signals are relayed to it and its exit status becomes ours.
 */

import type { FastifyInstance } from 'fastify';
import type { Config } from '../config/index.js';
import { FORWARDED_SIGNALS, type SignalSource } from '../core/signals.js';
import { signalExitCode, InitExitCode } from '../core/exit-codes.js';
import { runServer } from '../restapi/server.js';
import { createComponentLogger } from '../utils/logger.js';
import {
  parseCommandLine,
  spawnChild as defaultSpawnChild,
  waitForChild,
  type SpawnChild,
  type SupervisedChild,
} from './child-process.js';

const logger = createComponentLogger('launcher');

export type LaunchResult =
  | { kind: 'serving'; app?: FastifyInstance }
  | { kind: 'exited'; exitCode: number };

export interface ServerLauncher {
  readonly description: string;
  launch(): Promise<LaunchResult>;
}

export type StartServer = (configuration: Config) => Promise<FastifyInstance>;

/**
 * Serve from this process. Resolves once the server listens; the process
 * then stays alive until SIGTERM/SIGINT closes the server.
 */
export class InProcessLauncher implements ServerLauncher {
  readonly description = 'in-process HTTP server';

  constructor(
    private readonly configuration: Config,
    private readonly startServer: StartServer = (configuration) => runServer(configuration)
  ) {}

  async launch(): Promise<LaunchResult> {
    const app = await this.startServer(this.configuration);
    return { kind: 'serving', app };
  }
}

export interface SupervisedLauncherOptions {
  env?: NodeJS.ProcessEnv;
  signals?: SignalSource;
  spawnChild?: SpawnChild;
}

/**
 * Run an external server command and relay signals to it.
 * Resolves with the child's exit status, or 128 + signum when it was
 * killed by a signal.
 */
export class SupervisedCommandLauncher implements ServerLauncher {
  readonly description: string;

  constructor(
    private readonly commandLine: string,
    private readonly options: SupervisedLauncherOptions = {}
  ) {
    this.description = `supervised command \`${commandLine}\``;
  }

  async launch(): Promise<LaunchResult> {
    const parsed = parseCommandLine(this.commandLine);
    if (!parsed) {
      logger.error('Empty server command');
      return { kind: 'exited', exitCode: InitExitCode.Fatal };
    }

    const [command, ...args] = parsed;
    const signals = this.options.signals ?? process;

    let child: SupervisedChild;
    try {
      child = (this.options.spawnChild ?? defaultSpawnChild)(command, args, {
        env: this.options.env ?? process.env,
      });
    } catch (error) {
      logger.error({ command: this.commandLine, error: String(error) }, 'Could not start server');
      return { kind: 'exited', exitCode: InitExitCode.Fatal };
    }

    const forward = (signal: NodeJS.Signals): void => {
      logger.info({ signal, pid: child.pid }, 'Forwarding signal to server');
      child.kill(signal);
    };
    for (const signal of FORWARDED_SIGNALS) {
      signals.on(signal, forward);
    }

    const result = await waitForChild(child, this.commandLine);

    for (const signal of FORWARDED_SIGNALS) {
      signals.off(signal, forward);
    }

    switch (result.kind) {
      case 'exited':
        logger.info({ exitCode: result.code }, 'Server exited');
        return { kind: 'exited', exitCode: result.code };
      case 'signaled':
        logger.info({ signal: result.signal }, 'Server killed by signal');
        return { kind: 'exited', exitCode: signalExitCode(result.signal) };
      case 'spawn-error':
        logger.error({ error: result.error.message }, 'Could not start server');
        return { kind: 'exited', exitCode: InitExitCode.Fatal };
    }
  }
}
