import type { Command } from 'commander';
import { config } from '../../config/index.js';
import { runServer } from '../../restapi/server.js';
import { handleCliError } from '../utils/errors.js';

export function addServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the HTTP server until SIGTERM or SIGINT')
    .action(async () => {
      try {
        await runServer(config);
      } catch (error) {
        handleCliError(error);
      }
    });
}
