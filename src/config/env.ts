import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

/**
 * Load environment variables from .env file
 *
 * Call as early as possible, before any configuration is read.
 * Variables already present in the environment win over the file.
 */
export function loadEnv(projectRoot: string): void {
  // Guard: only load once (child processes inherit the flag)
  if (process.env.__PARFUME_ENV_LOADED) return;

  const envPath = resolve(projectRoot, '.env');
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath, quiet: true });
  }

  process.env.__PARFUME_ENV_LOADED = '1';
}
