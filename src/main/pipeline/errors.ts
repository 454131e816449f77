/**
 * errors.ts - Error taxonomy for the fragment pipeline
 *
 * Every error raised by the pipeline carries a stable `code` and a
 * `severity`:
 * - transient: the loop that raised it logs and tries again on its next tick
 * - job:       contained to one fragment, which is routed to the failed dir
 * - fatal:     startup cannot continue (bad config, closed pool)
 */

export type PipelineErrorSeverity = 'transient' | 'job' | 'fatal';

export type PipelineErrorCode =
  | 'dispatch'
  | 'disk-low'
  | 'duplicate-sequence'
  | 'transcription'
  | 'timeout'
  | 'io'
  | 'model-unavailable'
  | 'merge'
  | 'pool-closed'
  | 'config';

// ============================================================================
// Base class
// ============================================================================

export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly severity: PipelineErrorSeverity;

  constructor(
    message: string,
    code: PipelineErrorCode,
    severity: PipelineErrorSeverity,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.severity = severity;
  }
}

// ============================================================================
// Concrete errors
// ============================================================================

/** The fragment source directory could not be listed. */
export class DispatchError extends PipelineError {
  public readonly directory: string;

  constructor(directory: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Cannot read fragment directory ${directory}: ${reason}`, 'dispatch', 'transient', { cause });
    this.name = 'DispatchError';
    this.directory = directory;
  }
}

/** Free space on the archive volume is below the configured threshold. */
export class DiskLowError extends PipelineError {
  public readonly freeBytes: number;
  public readonly thresholdBytes: number;

  constructor(path: string, freeBytes: number, thresholdBytes: number) {
    super(
      `Disk low on ${path}: ${formatBytes(freeBytes)} free, ${formatBytes(thresholdBytes)} required`,
      'disk-low',
      'transient'
    );
    this.name = 'DiskLowError';
    this.freeBytes = freeBytes;
    this.thresholdBytes = thresholdBytes;
  }
}

/** A result for this sequence number is already buffered or merged. */
export class DuplicateSequenceError extends PipelineError {
  public readonly sequence: number;
  public readonly holder: 'buffered' | 'merged';

  constructor(sequence: number, holder: 'buffered' | 'merged' = 'buffered') {
    super(
      holder === 'merged' ? `Sequence ${sequence} was already merged` : `Sequence ${sequence} is already buffered`,
      'duplicate-sequence',
      'job'
    );
    this.name = 'DuplicateSequenceError';
    this.sequence = sequence;
    this.holder = holder;
  }
}

export class TranscriptionError extends PipelineError {
  constructor(
    message: string,
    code: Extract<PipelineErrorCode, 'transcription' | 'timeout' | 'io'> = 'transcription',
    cause?: unknown
  ) {
    super(message, code, 'job', { cause });
    this.name = 'TranscriptionError';
  }
}

export class ModelUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'model-unavailable', 'job', { cause });
    this.name = 'ModelUnavailableError';
  }
}

export class MergeError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'merge', 'transient', { cause });
    this.name = 'MergeError';
  }
}

export class PoolClosedError extends PipelineError {
  constructor() {
    super('Worker pool is closed and no longer accepts fragments', 'pool-closed', 'fatal');
    this.name = 'PoolClosedError';
  }
}

export class ConfigError extends PipelineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message, 'config', 'fatal');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize anything thrown into a PipelineError. Errors that already belong
 * to the taxonomy pass through untouched.
 */
export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const code = errnoCode(error);
  if (code) {
    return new TranscriptionError(`I/O error (${code}): ${message}`, 'io', error);
  }
  return new TranscriptionError(message, 'transcription', error);
}

/** The `code` of a Node.js system error (`ENOENT`, `ENOSPC`, ...), if any. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string' && /^E[A-Z]+$/.test(error.code)) {
    return error.code;
  }
  return undefined;
}

export function formatBytes(bytes: number): string {
  if (bytes >= 1024 ** 3) return `${(bytes / 1024 ** 3).toFixed(1)} GB`;
  if (bytes >= 1024 ** 2) return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${bytes} B`;
}
