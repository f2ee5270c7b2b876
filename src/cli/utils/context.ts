/**
 * Shared helpers for command actions
 */

import type { Command } from 'commander';
import { isOutputFormat, type OutputFormat } from './output.js';

/**
 * The global --format option as seen from a subcommand
 */
export function getOutputFormat(cmd: Command): OutputFormat {
  const format: unknown = cmd.optsWithGlobals().format;
  return isOutputFormat(format) ? format : 'json';
}
