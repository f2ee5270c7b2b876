/**
 * Library entry point
 */

export { config, buildConfig, reloadConfig } from './config/index.js';
export type { Config, InitPolicy, LogLevel } from './config/index.js';
export { loadEnv } from './config/env.js';

export { ParfumeError, DatabaseError, ErrorCodes } from './core/errors.js';
export { InitExitCode, outcomeForExitCode, signalExitCode } from './core/exit-codes.js';
export type { InitOutcome } from './core/exit-codes.js';

export { openDatabase } from './db/factory.js';
export type { AppDb, SQLiteConnection } from './db/factory.js';
export { DatabaseHandle } from './db/connection.js';
export { applyMigrations, getMigrationStatus, dropAllTables } from './db/init.js';
export { seedDemoAccounts, DEMO_ACCOUNTS } from './db/seed.js';

export { initializeStore } from './bootstrap/initializer.js';
export type { InitializeResult } from './bootstrap/initializer.js';
export { decideStartup } from './bootstrap/policy.js';
export type { StartupDecision } from './bootstrap/policy.js';
export { runInitStep } from './bootstrap/init-runner.js';
export { InProcessLauncher, SupervisedCommandLauncher } from './bootstrap/server-launcher.js';
export { runStartup } from './bootstrap/orchestrator.js';

export { createServer, runServer } from './restapi/server.js';
export { createProgram, runCli } from './cli/index.js';
