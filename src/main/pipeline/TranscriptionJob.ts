/**
 * TranscriptionJob.ts - One fragment, end to end
 *
 * read → acquire transcriber → transcribe (with timeout) → buffer the text
 * → move the source file to the processed dir. Any failure moves the file to
 * the failed dir and appends a line to its failure log instead. The job
 * never retries and never rejects: every path ends in a JobOutcome.
 */

import { existsSync } from 'fs';
import { appendFile, mkdir, readFile, rename, copyFile, stat, unlink } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { ModelProvider } from '../transcription/types';
import { DuplicateSequenceError, TranscriptionError, errnoCode, toPipelineError, type PipelineError } from './errors';
import type { ResultBuffer } from './ResultBuffer';
import { silentLogger, type FailureRecord, type Fragment, type JobOutcome, type PipelineLogger } from './types';

// ============================================================================
// Types
// ============================================================================

export interface TranscriptionJobOptions {
  provider: ModelProvider;
  buffer: ResultBuffer;
  processedDir: string;
  failedDir: string;
  /** Upper bound for one transcription call (default: 120000) */
  timeoutMs?: number;
  logger?: PipelineLogger;
}

/** Name of the append-only failure log inside the failed dir */
export const FAILURE_LOG_FILENAME = 'failures.jsonl';

const DEFAULT_TIMEOUT_MS = 120_000;

// ============================================================================
// File helpers
// ============================================================================

/**
 * Move a file, falling back to copy + unlink across devices.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') throw error;
    await copyFile(from, to);
    await unlink(from);
  }
}

/**
 * First free destination for `fileName` in `dir`:
 * `a.wav`, then `a_failed.wav`, `a_failed_2.wav`, ...
 */
export function uniqueDestination(dir: string, fileName: string, suffix: string): string {
  const direct = join(dir, fileName);
  if (!existsSync(direct)) return direct;

  const ext = extname(fileName);
  const base = basename(fileName, ext);
  let candidate = join(dir, `${base}_${suffix}${ext}`);
  for (let n = 2; existsSync(candidate); n++) {
    candidate = join(dir, `${base}_${suffix}_${n}${ext}`);
  }
  return candidate;
}

// ============================================================================
// TranscriptionJob Class
// ============================================================================

export class TranscriptionJob {
  private readonly provider: ModelProvider;
  private readonly buffer: ResultBuffer;
  private readonly processedDir: string;
  private readonly failedDir: string;
  private readonly timeoutMs: number;
  private readonly logger: PipelineLogger;

  constructor(options: TranscriptionJobOptions) {
    this.provider = options.provider;
    this.buffer = options.buffer;
    this.processedDir = options.processedDir;
    this.failedDir = options.failedDir;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  async run(fragment: Fragment): Promise<JobOutcome> {
    const startedAt = Date.now();
    fragment.status = 'in-progress';

    let text: string;
    try {
      text = await this.transcribe(fragment);
    } catch (error) {
      return this.fail(fragment, toPipelineError(error), startedAt);
    }

    try {
      this.buffer.insert(fragment.sequence, text);
    } catch (error) {
      if (error instanceof DuplicateSequenceError) {
        this.logger.warn(`${error.message}; ${fragment.name} is not used`);
      }
      return this.fail(fragment, toPipelineError(error), startedAt);
    }

    fragment.status = 'succeeded';
    await this.archiveSource(fragment);

    const durationMs = Date.now() - startedAt;
    this.logger.info(`Transcribed seq=${fragment.sequence} (${fragment.name}) len=${text.length} in ${durationMs}ms`);
    return { status: 'succeeded', fragment, text, durationMs };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async transcribe(fragment: Fragment): Promise<string> {
    let size: number;
    try {
      size = (await stat(fragment.path)).size;
    } catch (error) {
      throw new TranscriptionError(`Fragment file not found: ${fragment.path}`, 'io', error);
    }
    if (size === 0) {
      throw new TranscriptionError(`Fragment file is empty (0 bytes): ${fragment.path}`, 'io');
    }

    const bytes = await readFile(fragment.path);
    this.logger.debug(`Transcribing ${fragment.name} (${(size / (1024 * 1024)).toFixed(2)} MB)`);

    // The timeout starts once the model is ours; queueing for it is not counted
    const transcriber = await this.provider.acquire();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TranscriptionError(`Transcription of ${fragment.name} timed out after ${this.timeoutMs}ms`, 'timeout'));
      }, this.timeoutMs);
    });

    try {
      const text = await Promise.race([
        transcriber.transcribe({ bytes, path: fragment.path, fileName: fragment.name }, controller.signal),
        timeout,
      ]);
      return text.trim();
    } finally {
      clearTimeout(timer);
      transcriber.release?.();
    }
  }

  /**
   * Move a transcribed fragment into the processed dir. The text is already
   * buffered, so a failed move is logged and the outcome stays a success.
   */
  private async archiveSource(fragment: Fragment): Promise<void> {
    try {
      await mkdir(this.processedDir, { recursive: true });
      const destination = uniqueDestination(this.processedDir, fragment.name, 'dup');
      await moveFile(fragment.path, destination);
      fragment.path = destination;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to move ${fragment.name} to processed dir: ${message}`);
    }
  }

  private async fail(fragment: Fragment, error: PipelineError, startedAt: number): Promise<JobOutcome> {
    fragment.status = 'failed';
    this.logger.error(`Fragment ${fragment.name} (seq=${fragment.sequence}) failed [${error.code}]: ${error.message}`);

    let movedTo: string | null = null;
    try {
      await mkdir(this.failedDir, { recursive: true });
      movedTo = uniqueDestination(this.failedDir, fragment.name, 'failed');
      await moveFile(fragment.path, movedTo);
      fragment.path = movedTo;
      this.logger.info(`Moved ${fragment.name} to failed dir: ${movedTo}`);
    } catch (moveError) {
      movedTo = null;
      const message = moveError instanceof Error ? moveError.message : String(moveError);
      this.logger.error(`Failed to move ${fragment.name} to failed dir: ${message}`);
    }

    await this.recordFailure({
      name: fragment.name,
      sequence: fragment.sequence,
      reason: error.code,
      message: error.message,
      movedTo,
      failedAt: new Date().toISOString(),
    });

    return { status: 'failed', fragment, error, durationMs: Date.now() - startedAt };
  }

  private async recordFailure(record: FailureRecord): Promise<void> {
    try {
      await appendFile(join(this.failedDir, FAILURE_LOG_FILENAME), `${JSON.stringify(record)}\n`, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to append failure record for ${record.name}: ${message}`);
    }
  }
}
