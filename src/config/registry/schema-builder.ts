/**
 * Registry-driven config building
 *
 * Reads every option of a section from the environment, then validates the
 * section against its Zod schema.
 */

import type { z } from 'zod';
import type { ConfigOptionMeta, ConfigSectionMeta, ParserType } from './types.js';
import {
  parseBoolean,
  parseInt_,
  parsePort,
  parseString,
  parseStringArray,
  resolveDataPath,
  getDataDir,
} from './parsers.js';

/**
 * Identity helper that lets TypeScript infer the section schema type.
 */
export function defineSection<S extends z.AnyZodObject>(
  section: ConfigSectionMeta<S>
): ConfigSectionMeta<S> {
  return section;
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

// =============================================================================
// ENV READING
// =============================================================================

/**
 * Infer parser type from the default value when not explicitly specified
 */
function inferParser(defaultValue: unknown): ParserType {
  if (typeof defaultValue === 'boolean') return 'boolean';
  if (typeof defaultValue === 'number') return 'int';
  if (Array.isArray(defaultValue)) return 'stringArray';
  return 'string';
}

/**
 * Parse an environment variable value using the option's parser.
 * The result is validated later against the section schema.
 */
export function parseEnvValue(
  option: ConfigOptionMeta<unknown>,
  envValue: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): unknown {
  const defaultValue = option.defaultValue;

  if (option.fromEnv) {
    return option.fromEnv(envValue, defaultValue, env);
  }

  const parserType: ParserType = option.parse ?? inferParser(defaultValue);

  // Path parser resolves default values too
  if (parserType === 'path') {
    return resolveDataPath(
      envValue,
      typeof defaultValue === 'string' ? defaultValue : '',
      getDataDir(env)
    );
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);

    case 'int':
      return parseInt_(envValue, typeof defaultValue === 'number' ? defaultValue : 0);

    case 'port':
      return parsePort(envValue, typeof defaultValue === 'number' ? defaultValue : 0);

    case 'stringArray':
      return parseStringArray(envValue, []);

    case 'string':
      return parseString(
        envValue,
        typeof defaultValue === 'string' ? defaultValue : envValue,
        option.allowedValues
      );
  }
}

/**
 * Read the raw (unvalidated) values of a section from the environment
 */
export function readSectionEnv(
  options: Record<string, ConfigOptionMeta<unknown>>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(options)) {
    result[key] = parseEnvValue(option, option.envKey ? env[option.envKey] : undefined, env);
  }

  return result;
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

export interface EnvVarDoc {
  envKey: string;
  description: string;
  defaultValue: unknown;
  section: string;
}

/**
 * List every environment variable declared by the given sections
 */
export function getAllEnvVars(sections: Record<string, ConfigSectionMeta>): EnvVarDoc[] {
  const envVars: EnvVarDoc[] = [];

  for (const [sectionKey, section] of Object.entries(sections)) {
    const options: Record<string, ConfigOptionMeta<unknown>> = section.options;
    for (const option of Object.values(options)) {
      if (!option.envKey) continue; // computed values
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        section: sectionKey,
      });
    }
  }

  return envVars;
}
