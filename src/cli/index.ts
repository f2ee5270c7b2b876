/**
 * CLI Main Program
 *
 * Commander.js program setup for the bv-parfume CLI.
 */

import { Command, CommanderError, Option } from 'commander';
import { VERSION } from '../version.js';
import { InitExitCode } from '../core/exit-codes.js';
import { OUTPUT_FORMATS } from './utils/output.js';

import { addInitDbCommand } from './commands/init-db.js';
import { addServeCommand } from './commands/serve.js';
import { addStartCommand } from './commands/start.js';
import { addStatusCommand } from './commands/status.js';
import { addResetCommand } from './commands/reset.js';
import { addConfigCommand } from './commands/config.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('bv-parfume')
    .description('BV Parfume backend: database initialization and HTTP server')
    .version(VERSION)
    // Throw instead of exiting so usage errors can be mapped to Fatal;
    // inherited by subcommands added below
    .exitOverride()
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('json')
    );

  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  // Deployment
  addStartCommand(program);
  addInitDbCommand(program);
  addServeCommand(program);

  // Operations
  addStatusCommand(program);
  addResetCommand(program);
  addConfigCommand(program);
}

/**
 * Exit status for an error thrown by commander itself: help and version
 * exit 0, usage errors exit Fatal (2) rather than commander's 1.
 */
export function exitCodeForCommanderError(error: CommanderError): number {
  return error.exitCode === 0 ? 0 : InitExitCode.Fatal;
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = exitCodeForCommanderError(error);
      return;
    }
    throw error;
  }
}
