/**
 * MergeCoordinator.ts - Turns buffered results into ordered transcripts
 *
 * On every tick the coordinator drains the contiguous run starting at its
 * cursor and writes it as one archived transcript named after the covered
 * range. A missing sequence number stalls the merge at that point until it
 * is filled or skipped with skipTo().
 *
 * State machine: idle → scanning → merging → idle
 *
 * Guarantees:
 * - Archived ranges are contiguous and pairwise disjoint.
 * - The cursor only moves after the transcript is on disk; a failed write
 *   keeps the drained run and retries it first on the next tick.
 */

import { EventEmitter } from 'events';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { DiskGuard } from './diskSpace';
import { DiskLowError, MergeError, errnoCode, toPipelineError } from './errors';
import type { ResultBuffer } from './ResultBuffer';
import { archiveFileName } from './sequence';
import { silentLogger, type ArchivedTranscript, type PipelineLogger, type TranscriptionResult } from './types';

// ============================================================================
// Types
// ============================================================================

export type MergeState = 'idle' | 'scanning' | 'merging';

export interface MergeCoordinatorOptions {
  buffer: ResultBuffer;
  archiveDir: string;
  /** Tick interval in ms (default: 5000) */
  intervalMs?: number;
  /** Cursor to start from (default: 0) */
  firstSequence?: number;
  diskGuard?: DiskGuard;
  logger?: PipelineLogger;
}

export interface MergeStopOptions {
  /** Run one last tick after the loop has stopped (default: true) */
  flush?: boolean;
}

interface PendingRun {
  results: TranscriptionResult[];
  nextCursor: number;
}

/**
 * Transcript body for a run: texts in sequence order, one per line.
 * Whitespace-only texts contribute no line.
 */
export function joinTranscript(texts: string[]): string {
  const lines = texts.map((t) => t.trim()).filter((t) => t.length > 0);
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

// ============================================================================
// MergeCoordinator Class
// ============================================================================

export class MergeCoordinator extends EventEmitter {
  private readonly buffer: ResultBuffer;
  private readonly archiveDir: string;
  private readonly intervalMs: number;
  private readonly diskGuard: DiskGuard | null;
  private readonly logger: PipelineLogger;

  private _cursor: number;
  private _state: MergeState = 'idle';
  private pending: PendingRun | null = null;
  private archivedTranscripts: ArchivedTranscript[] = [];
  private stalledAt: number | null = null;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private currentTick: Promise<ArchivedTranscript | null> | null = null;

  constructor(options: MergeCoordinatorOptions) {
    super();
    this.buffer = options.buffer;
    this.archiveDir = options.archiveDir;
    this.intervalMs = options.intervalMs ?? 5000;
    this._cursor = options.firstSequence ?? 0;
    this.diskGuard = options.diskGuard ?? null;
    this.logger = options.logger ?? silentLogger;
    this.buffer.raiseWatermark(this._cursor);
  }

  get cursor(): number {
    return this._cursor;
  }

  get state(): MergeState {
    return this._state;
  }

  get archived(): readonly ArchivedTranscript[] {
    return this.archivedTranscripts;
  }

  /** True while a drained run is waiting to be written again */
  get hasPendingWrite(): boolean {
    return this.pending !== null;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info(`Merge loop started (cursor ${this._cursor}, every ${this.intervalMs}ms)`);
    this.scheduleTick();
  }

  /**
   * Stop the loop, wait for a tick in progress, then optionally flush.
   */
  async stop(options: MergeStopOptions = {}): Promise<void> {
    const flush = options.flush ?? true;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentTick) {
      await this.currentTick;
    }
    if (flush) {
      await this.tick();
    }
    this.logger.info(`Merge loop stopped at cursor ${this._cursor}; ${this.buffer.size} result(s) left buffered`);
  }

  /**
   * Run one scan/merge cycle. Resolves with the transcript written, or null
   * when nothing was merged. Errors are logged and never reject.
   */
  async tick(): Promise<ArchivedTranscript | null> {
    if (this._state !== 'idle') {
      return null;
    }

    this._state = 'scanning';
    try {
      if (this.diskGuard) {
        await this.diskGuard.assertFree();
      }

      const run = this.pending ?? this.drain();
      if (!run) {
        this.checkStall();
        return null;
      }

      this._state = 'merging';
      return await this.write(run);
    } catch (error) {
      const pipelineError = toPipelineError(error);
      if (pipelineError instanceof DiskLowError) {
        this.logger.warn(`Merge skipped: ${pipelineError.message}`);
      } else {
        this.logger.error(`Merge failed: ${pipelineError.message}`);
        this.emit('merge-error', pipelineError);
      }
      return null;
    } finally {
      this._state = 'idle';
    }
  }

  /**
   * Move the cursor forward past a permanent gap. Refuses to move backwards
   * or past results that are still buffered. Jobs still running for a
   * skipped sequence fail at insert.
   */
  skipTo(sequence: number): void {
    if (!Number.isSafeInteger(sequence) || sequence <= this._cursor) {
      throw new RangeError(`Cannot skip to ${sequence}: cursor is already at ${this._cursor}`);
    }
    if (this.pending) {
      throw new RangeError(`Cannot skip while ${this.describeRun(this.pending)} is waiting to be written`);
    }
    const skipped = this.buffer.sequences().filter((s) => s >= this._cursor && s < sequence);
    if (skipped.length > 0) {
      throw new RangeError(`Cannot skip to ${sequence}: sequence ${skipped[0]} is buffered`);
    }

    this.logger.warn(`Skipping sequences ${this._cursor}..${sequence - 1}`);
    this.buffer.raiseWatermark(sequence);
    this._cursor = sequence;
    this.stalledAt = null;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private scheduleTick(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.currentTick = this.tick().finally(() => {
        this.currentTick = null;
        if (this.running) {
          this.scheduleTick();
        }
      });
    }, this.intervalMs);
  }

  private drain(): PendingRun | null {
    const { results, nextCursor } = this.buffer.drainContiguousFrom(this._cursor);
    if (results.length === 0) {
      return null;
    }
    return { results, nextCursor };
  }

  private async write(run: PendingRun): Promise<ArchivedTranscript> {
    const start = this._cursor;
    const end = run.nextCursor - 1;
    const path = join(this.archiveDir, archiveFileName(start, end));

    try {
      await mkdir(this.archiveDir, { recursive: true });
      await writeFile(path, joinTranscript(run.results.map((r) => r.text)), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      this.pending = run;
      if (errnoCode(error) === 'EEXIST') {
        throw new MergeError(`Transcript ${path} already exists; ${this.describeRun(run)} kept for retry`, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new MergeError(`Cannot write ${path}: ${message}; ${this.describeRun(run)} kept for retry`, error);
    }

    this.pending = null;
    this._cursor = run.nextCursor;
    this.stalledAt = null;

    const transcript: ArchivedTranscript = {
      start,
      end,
      path,
      fragmentCount: run.results.length,
      createdAt: new Date(),
    };
    this.archivedTranscripts.push(transcript);
    this.logger.info(`Archived ${transcript.fragmentCount} fragment(s) as ${path}`);
    this.emit('archived', transcript);
    return transcript;
  }

  /** Emit `stalled` once per cursor value while later results wait. */
  private checkStall(): void {
    const lowest = this.buffer.lowestSequence();
    if (lowest === null || lowest <= this._cursor || this.stalledAt === this._cursor) {
      return;
    }
    this.stalledAt = this._cursor;
    this.logger.warn(
      `Merge stalled at sequence ${this._cursor}; ${this.buffer.size} result(s) waiting from ${lowest}`
    );
    this.emit('stalled', { cursor: this._cursor, waiting: this.buffer.size, lowest });
  }

  private describeRun(run: PendingRun): string {
    return `run ${this._cursor}..${run.nextCursor - 1}`;
  }
}
