import type { Command } from 'commander';
import { configRegistry, getAllEnvVars } from '../../config/registry/index.js';
import { formatOutput } from '../utils/output.js';
import { getOutputFormat } from '../utils/context.js';

export function addConfigCommand(program: Command): void {
  program
    .command('config')
    .description('List the environment variables read by the service')
    .action((_options: unknown, cmd: Command) => {
      const rows = getAllEnvVars(configRegistry.sections).map((doc) => ({
        envKey: doc.envKey,
        section: doc.section,
        default: doc.defaultValue,
        description: doc.description,
      }));
      console.log(formatOutput(rows, getOutputFormat(cmd)));
    });
}
