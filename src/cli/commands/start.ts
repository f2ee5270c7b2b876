/**
 * start: run the initialization step, apply the startup policy, then hand
 * the process over to the server.
 */

import { Option, type Command } from 'commander';
import { config, type Config, type InitPolicy } from '../../config/index.js';
import { INIT_POLICIES } from '../../config/registry/index.js';
import { runStartup, type StartupResult } from '../../bootstrap/orchestrator.js';
import { runInitStep } from '../../bootstrap/init-runner.js';
import {
  InProcessLauncher,
  SupervisedCommandLauncher,
  type ServerLauncher,
} from '../../bootstrap/server-launcher.js';
import { handleCliError } from '../utils/errors.js';

export interface StartCommandOptions {
  policy?: InitPolicy;
  skipInit?: boolean;
  initCommand?: string;
  serverCommand?: string;
}

function isInitPolicy(value: unknown): value is InitPolicy {
  return value === 'strict' || value === 'lenient';
}

/**
 * Command-line options over configuration
 */
export function resolveStartOptions(configuration: Config, options: StartCommandOptions) {
  return {
    policy: options.policy ?? configuration.bootstrap.initPolicy,
    skipInit: options.skipInit ?? configuration.bootstrap.skipInit,
    initCommand: options.initCommand ?? configuration.bootstrap.initCommand,
    serverCommand: options.serverCommand ?? configuration.bootstrap.serverCommand,
  };
}

export function runStart(
  configuration: Config,
  options: StartCommandOptions = {}
): Promise<StartupResult> {
  const resolved = resolveStartOptions(configuration, options);
  const launcher: ServerLauncher = resolved.serverCommand
    ? new SupervisedCommandLauncher(resolved.serverCommand)
    : new InProcessLauncher(configuration);

  return runStartup({
    policy: resolved.policy,
    skipInit: resolved.skipInit,
    runInit: () => runInitStep({ command: resolved.initCommand }),
    launcher,
  });
}

export function addStartCommand(program: Command): void {
  program
    .command('start')
    .description('Initialize the database, then serve (container entry point)')
    .addOption(
      new Option('--policy <policy>', 'Startup policy (default: PARFUME_INIT_POLICY)').choices(
        INIT_POLICIES
      )
    )
    .option('--skip-init', 'Do not run the initialization step')
    .option('--init-command <command>', 'External initialization command line')
    .option('--server-command <command>', 'External server command line to supervise')
    .action(
      async (options: {
        policy?: unknown;
        skipInit?: boolean;
        initCommand?: string;
        serverCommand?: string;
      }) => {
        try {
          const result = await runStart(config, {
            policy: isInitPolicy(options.policy) ? options.policy : undefined,
            skipInit: options.skipInit,
            initCommand: options.initCommand,
            serverCommand: options.serverCommand,
          });
          if (result.exitCode !== undefined) {
            process.exitCode = result.exitCode;
          }
        } catch (error) {
          handleCliError(error);
        }
      }
    );
}
