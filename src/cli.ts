#!/usr/bin/env node
// CLI entry point for bv-parfume.
// .env is loaded before any module that reads configuration.

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadEnv } from './config/env.js';
import { ParfumeError } from './core/errors.js';
import { InitExitCode } from './core/exit-codes.js';

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..');
loadEnv(projectRoot);

async function main(): Promise<void> {
  // Configuration is validated when first imported
  const { runCli } = await import('./cli/index.js');
  await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  const output =
    error instanceof ParfumeError
      ? error.toJSON()
      : { error: error instanceof Error ? error.message : String(error), code: 'E5000' };
  console.error(JSON.stringify(output, null, 2));
  process.exitCode = InitExitCode.Fatal;
});
