/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import { z } from 'zod';
import { runtimeSection } from './sections/runtime.js';
import { pathsSection } from './sections/paths.js';
import { databaseSection } from './sections/database.js';
import { loggingSection } from './sections/logging.js';
import { serverSection } from './sections/server.js';
import { bootstrapSection } from './sections/bootstrap.js';
import { seedSection } from './sections/seed.js';

export { INIT_POLICIES } from './sections/bootstrap.js';

/**
 * The complete config registry with all sections.
 */
export const configRegistry = {
  sections: {
    runtime: runtimeSection,
    paths: pathsSection,
    database: databaseSection,
    logging: loggingSection,
    server: serverSection,
    bootstrap: bootstrapSection,
    seed: seedSection,
  },
};

/**
 * Schema of the assembled configuration object.
 */
export const configSchema = z.object({
  runtime: runtimeSection.schema,
  paths: pathsSection.schema,
  database: databaseSection.schema,
  logging: loggingSection.schema,
  server: serverSection.schema,
  bootstrap: bootstrapSection.schema,
  seed: seedSection.schema,
});

export type Config = z.infer<typeof configSchema>;
export type InitPolicy = Config['bootstrap']['initPolicy'];
export type LogLevel = Config['logging']['level'];

export { readSectionEnv, getAllEnvVars, formatZodErrors } from './schema-builder.js';
export type { EnvVarDoc } from './schema-builder.js';
export type { ConfigOptionMeta, ConfigSectionMeta, ParserType } from './types.js';
