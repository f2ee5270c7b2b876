/**
 * Startup orchestrator: init step, policy decision, server hand-off.
 */

import type { InitPolicy } from '../config/index.js';
import type { ChildResult } from './child-process.js';
import { decideStartup, type StartupDecision } from './policy.js';
import type { LaunchResult, ServerLauncher } from './server-launcher.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('bootstrap');

export interface StartupOptions {
  policy: InitPolicy;
  /** Go straight to the server */
  skipInit: boolean;
  runInit: () => Promise<ChildResult>;
  launcher: ServerLauncher;
}

export interface StartupResult {
  initResult?: ChildResult;
  decision: StartupDecision;
  launch?: LaunchResult;
  /** Set when this process should exit; undefined while the server runs in-process */
  exitCode?: number;
}

export async function runStartup(options: StartupOptions): Promise<StartupResult> {
  let decision: StartupDecision;
  let initResult: ChildResult | undefined;

  if (options.skipInit) {
    decision = { launch: true, reason: 'initialization skipped' };
    logger.info('Skipping initialization step');
  } else {
    logger.info({ policy: options.policy }, 'Running initialization step');
    initResult = await options.runInit();
    decision = decideStartup(options.policy, initResult);
  }

  if (!decision.launch) {
    logger.error(
      { policy: options.policy, exitCode: decision.exitCode },
      `Initialization failed: ${decision.reason}; server not started`
    );
    return { initResult, decision, exitCode: decision.exitCode };
  }

  logger.info(
    { policy: options.policy, server: options.launcher.description },
    `Initialization: ${decision.reason}; starting server`
  );
  const launch = await options.launcher.launch();

  return {
    initResult,
    decision,
    launch,
    exitCode: launch.kind === 'exited' ? launch.exitCode : undefined,
  };
}
