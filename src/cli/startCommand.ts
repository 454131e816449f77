/**
 * startCommand.ts - Runs the pipeline until interrupted
 *
 * Loads the config, configures logging, starts a PipelineController and
 * waits for a shutdown signal. Separated from the commander wiring so the
 * lifecycle can be driven from tests.
 */

import { configureLogging, createLogger } from '../main/logging/logger';
import { PipelineController, type PipelineStatus } from '../main/pipeline/PipelineController';
import { ConfigError, errnoCode } from '../main/pipeline/errors';
import { loadConfig, type PipelineConfig } from '../main/settings/config';
import { StaticProvider } from '../main/transcription/ModelRegistry';

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

export const DRY_RUN_TEXT = '[{name}]';

// ============================================================================
// Types
// ============================================================================

export interface StartOptions {
  config?: string;
  dryRun: boolean;
  verbose: boolean;
}

export interface StartHooks {
  /** Resolves with the signal name once shutdown is requested */
  waitForShutdown: () => Promise<NodeJS.Signals>;
  log: (message: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Called after the controller starts */
  onStarted?: (controller: PipelineController, config: PipelineConfig) => void;
}

export interface StartResult {
  exitCode: number;
  status: PipelineStatus;
}

const USER_FS_ERRORS = new Set(['EACCES', 'EPERM', 'ENOENT', 'ENOTDIR', 'EEXIST']);

/**
 * Map an error raised while starting to a process exit code. A bad config
 * or an unusable directory is the user's to fix; everything else is a
 * system error.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) return EXIT_USER_ERROR;
  const code = errnoCode(error);
  if (code && USER_FS_ERRORS.has(code)) return EXIT_USER_ERROR;
  return EXIT_SYSTEM_ERROR;
}

/**
 * Start the pipeline, wait for a signal, shut down gracefully.
 */
export async function runStart(options: StartOptions, hooks: StartHooks): Promise<StartResult> {
  const config = await loadConfig({ path: options.config, env: hooks.env });
  const logFile = configureLogging({
    logsDir: config.logsDir,
    level: options.verbose ? 'debug' : config.logLevel,
  });

  const controller = new PipelineController({
    config,
    provider: options.dryRun ? new StaticProvider({ kind: 'static', text: DRY_RUN_TEXT }) : undefined,
    loggerFor: createLogger,
  });

  hooks.log(`Config:  ${config.configPath ?? 'defaults'}`);
  hooks.log(`Input:   ${config.inputDir}`);
  hooks.log(`Archive: ${config.archiveDir}`);
  if (logFile) {
    hooks.log(`Log:     ${logFile}`);
  }
  if (options.dryRun) {
    hooks.log('Mode:    DRY RUN (no model; transcripts contain file names)');
  }

  await controller.start();
  hooks.onStarted?.(controller, config);

  const signal = await hooks.waitForShutdown();
  hooks.log(`Received ${signal}; finishing in-flight fragments...`);

  const status = await controller.stop();
  return {
    exitCode: signal === 'SIGINT' ? EXIT_SIGINT : EXIT_SUCCESS,
    status,
  };
}

/**
 * Resolves on the first SIGINT or SIGTERM.
 */
export function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const handler = (signal: NodeJS.Signals) => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
      resolve(signal);
    };
    process.on('SIGINT', handler);
    process.on('SIGTERM', handler);
  });
}
