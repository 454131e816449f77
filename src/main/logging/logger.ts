/**
 * Logging setup on electron-log's Node.js transport set.
 *
 * Console plus a rotating file at `<logsDir>/pipeline.log`. Components log
 * through scoped loggers so every line names its source:
 *
 *   [2025-03-04 10:15:02.117] [warn]  (Watcher) Skipping notes.wav: ...
 */

import log from 'electron-log/node';
import { join } from 'path';
import type { PipelineLogger } from '../pipeline/types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingOptions {
  /** Directory for pipeline.log; file logging is off when omitted */
  logsDir?: string;
  level?: LogLevel;
}

export const LOG_FILE_NAME = 'pipeline.log';
const MAX_LOG_SIZE_BYTES = 5 * 1024 * 1024; // 5MB
const LOG_FORMAT = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';

/**
 * Point the shared electron-log instance at the pipeline's log file and set
 * levels for both transports. Returns the log file path, if any.
 */
export function configureLogging(options: LoggingOptions = {}): string | null {
  const level = options.level ?? 'info';

  log.transports.console.level = level;
  log.transports.console.format = LOG_FORMAT;

  if (!options.logsDir) {
    log.transports.file.level = false;
    return null;
  }

  const filePath = join(options.logsDir, LOG_FILE_NAME);
  log.transports.file.level = level;
  log.transports.file.format = LOG_FORMAT;
  log.transports.file.maxSize = MAX_LOG_SIZE_BYTES;
  log.transports.file.resolvePathFn = () => filePath;
  return filePath;
}

/** A logger whose lines carry `(scope)`. */
export function createLogger(scope: string): PipelineLogger {
  return log.scope(scope);
}
