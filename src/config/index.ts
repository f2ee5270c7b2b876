/**
 * Centralized configuration module for BV Parfume
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description and parser; each
 * section owns the Zod schema its values are validated against.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the field to the section schema
 *   3. Add the option with envKey, defaultValue, description
 *   4. Optionally add parse: 'int' | 'port' | 'path' | 'stringArray' or fromEnv
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.database.path);
 */

import {
  configRegistry,
  configSchema,
  formatZodErrors,
  readSectionEnv,
  type Config,
} from './registry/index.js';
import { createValidationError } from '../core/errors.js';

export type { Config, InitPolicy, LogLevel } from './registry/index.js';

/**
 * Build and validate the configuration from the current environment.
 *
 * @throws ParfumeError (E1000) when any value fails validation
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, Record<string, unknown>> = {};
  for (const [name, section] of Object.entries(configRegistry.sections)) {
    raw[name] = readSectionEnv(section.options, env);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodErrors(result.error);
    throw createValidationError('config', `invalid configuration: ${issues.join('; ')}`, {
      issues,
    });
  }
  return result.data;
}

/**
 * Configuration singleton, built on import.
 */
export let config: Config = buildConfig();

/**
 * Rebuild the singleton from the current environment.
 * Tests use this after changing process.env.
 */
export function reloadConfig(): Config {
  config = buildConfig();
  return config;
}
