/**
 * Config Registry Type Definitions
 *
 * Provides metadata-driven configuration with Zod validation.
 * Each config option declares envKey, default, description and parser;
 * each section owns the Zod schema its options are validated against.
 */

import type { z } from 'zod';

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Built-in parser types for common env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'int' // parseInt
  | 'port' // parseInt with 1-65535 validation
  | 'path' // Resolve relative to data dir
  | 'stringArray'; // CSV parsing

// =============================================================================
// CONFIG OPTION TYPES
// =============================================================================

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T> {
  /** Environment variable key (e.g., 'PARFUME_DB_PATH') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  /** Description for documentation */
  description: string;

  /** Parser type; inferred from the default value when omitted */
  parse?: ParserType;

  /** Custom conversion, takes precedence over `parse` */
  fromEnv?(envValue: string | undefined, defaultValue: T, env: NodeJS.ProcessEnv): T;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];
}

/**
 * One option per key of the section's parsed shape
 */
export type SectionOptions<T> = {
  [K in keyof T]-?: ConfigOptionMeta<T[K]>;
};

// =============================================================================
// CONFIG SECTION TYPES
// =============================================================================

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta<S extends z.AnyZodObject = z.AnyZodObject> {
  /** Section name (e.g., 'database', 'server') */
  name: string;

  /** Section description for documentation */
  description: string;

  /** Schema the parsed section must satisfy */
  schema: S;

  /** Options in this section, keyed by config property name */
  options: SectionOptions<z.infer<S>>;
}
