/**
 * ResultBuffer - In-memory holding area for transcribed fragments
 *
 * Maps sequence number to transcription result until the merge coordinator
 * drains a contiguous prefix. Entries never leave individually.
 *
 * The watermark is the lowest sequence still accepted. Draining a run or
 * skipping a gap raises it, so a late result for a range the merge has
 * already taken is rejected at insert instead of vanishing later.
 *
 * Both operations run to completion synchronously, so on the single JS
 * thread an insert can never interleave with a drain.
 */

import { DuplicateSequenceError } from './errors';
import type { DrainResult, TranscriptionResult } from './types';

export interface ResultBufferOptions {
  /** Entry count above which isOverCapacity() reports pressure (default: 1000) */
  softLimit?: number;
}

export class ResultBuffer {
  private entries = new Map<number, TranscriptionResult>();
  private softLimit: number;
  private _watermark = 0;

  constructor(options: ResultBufferOptions = {}) {
    this.softLimit = options.softLimit ?? 1000;
  }

  /**
   * Buffer the text for `sequence`. The first insert for a sequence wins;
   * a second one throws DuplicateSequenceError and leaves the original.
   * So does any sequence below the watermark.
   */
  insert(sequence: number, text: string, producedAt: Date = new Date()): TranscriptionResult {
    if (!Number.isSafeInteger(sequence) || sequence < 0) {
      throw new RangeError(`Invalid sequence number: ${sequence}`);
    }
    if (sequence < this._watermark) {
      throw new DuplicateSequenceError(sequence, 'merged');
    }
    if (this.entries.has(sequence)) {
      throw new DuplicateSequenceError(sequence, 'buffered');
    }

    const result: TranscriptionResult = Object.freeze({ sequence, text, producedAt });
    this.entries.set(sequence, result);
    return result;
  }

  /**
   * Remove and return the longest gap-free run starting at `cursor`.
   * When nothing is buffered at `cursor` the run is empty and the cursor
   * comes back unchanged.
   */
  drainContiguousFrom(cursor: number): DrainResult {
    const results: TranscriptionResult[] = [];
    let next = cursor;

    let entry = this.entries.get(next);
    while (entry !== undefined) {
      results.push(entry);
      this.entries.delete(next);
      next += 1;
      entry = this.entries.get(next);
    }
    if (results.length > 0) {
      this.raiseWatermark(next);
    }

    return {
      results,
      texts: results.map((r) => r.text),
      nextCursor: next,
    };
  }

  /** Reject inserts below `sequence` from now on. Never lowers it. */
  raiseWatermark(sequence: number): void {
    if (sequence > this._watermark) {
      this._watermark = sequence;
    }
  }

  get watermark(): number {
    return this._watermark;
  }

  has(sequence: number): boolean {
    return this.entries.has(sequence);
  }

  get(sequence: number): TranscriptionResult | undefined {
    return this.entries.get(sequence);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Sorted snapshot of the buffered sequence numbers */
  sequences(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  lowestSequence(): number | null {
    let lowest: number | null = null;
    for (const seq of this.entries.keys()) {
      if (lowest === null || seq < lowest) {
        lowest = seq;
      }
    }
    return lowest;
  }

  isOverCapacity(): boolean {
    return this.entries.size > this.softLimit;
  }
}
