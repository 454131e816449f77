/**
 * ResultBuffer Unit Tests
 *
 * - Contiguous-prefix drain with a gap
 * - Duplicate sequence rejection (first insert wins)
 * - Watermark: inserts below a merged range are rejected
 * - Capacity signalling
 */

import { describe, it, expect } from 'vitest';
import { ResultBuffer } from '../../../src/main/pipeline/ResultBuffer';
import { DuplicateSequenceError } from '../../../src/main/pipeline/errors';

function fill(buffer: ResultBuffer, sequences: number[]): void {
  for (const seq of sequences) {
    buffer.insert(seq, `text-${seq}`);
  }
}

describe('ResultBuffer', () => {
  // --------------------------------------------------------------------------
  // drainContiguousFrom
  // --------------------------------------------------------------------------

  describe('drainContiguousFrom', () => {
    it('drains up to the first gap and resumes once it is filled', () => {
      const buffer = new ResultBuffer();
      fill(buffer, [0, 1, 2, 4, 5]);

      const first = buffer.drainContiguousFrom(0);
      expect(first.results.map((r) => r.sequence)).toEqual([0, 1, 2]);
      expect(first.texts).toEqual(['text-0', 'text-1', 'text-2']);
      expect(first.nextCursor).toBe(3);

      const blocked = buffer.drainContiguousFrom(3);
      expect(blocked.results).toEqual([]);
      expect(blocked.nextCursor).toBe(3);
      expect(buffer.sequences()).toEqual([4, 5]);

      buffer.insert(3, 'text-3');
      const second = buffer.drainContiguousFrom(3);
      expect(second.texts).toEqual(['text-3', 'text-4', 'text-5']);
      expect(second.nextCursor).toBe(6);
      expect(buffer.size).toBe(0);
    });

    it('returns results in ascending order regardless of insert order', () => {
      const buffer = new ResultBuffer();
      fill(buffer, [12, 10, 11]);

      const drained = buffer.drainContiguousFrom(10);

      expect(drained.results.map((r) => r.sequence)).toEqual([10, 11, 12]);
      expect(drained.nextCursor).toBe(13);
    });

    it('returns an empty run on an empty buffer', () => {
      const buffer = new ResultBuffer();

      expect(buffer.drainContiguousFrom(7)).toEqual({ results: [], texts: [], nextCursor: 7 });
    });

    it('leaves entries below the cursor untouched', () => {
      const buffer = new ResultBuffer();
      fill(buffer, [1, 5, 6]);

      const drained = buffer.drainContiguousFrom(5);

      expect(drained.nextCursor).toBe(7);
      expect(buffer.sequences()).toEqual([1]);
    });
  });

  // --------------------------------------------------------------------------
  // insert
  // --------------------------------------------------------------------------

  describe('insert', () => {
    it('rejects a duplicate sequence and keeps the first value', () => {
      const buffer = new ResultBuffer();
      buffer.insert(4, 'original');

      expect(() => buffer.insert(4, 'replacement')).toThrow(DuplicateSequenceError);
      expect(buffer.get(4)?.text).toBe('original');
      expect(buffer.size).toBe(1);
    });

    it('reports the duplicate sequence on the error', () => {
      const buffer = new ResultBuffer();
      buffer.insert(9, 'a');

      try {
        buffer.insert(9, 'b');
        expect.unreachable('insert should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(DuplicateSequenceError);
        if (error instanceof DuplicateSequenceError) {
          expect(error.sequence).toBe(9);
          expect(error.code).toBe('duplicate-sequence');
          expect(error.severity).toBe('job');
        }
      }
    });

    it('rejects negative and fractional sequence numbers', () => {
      const buffer = new ResultBuffer();

      expect(() => buffer.insert(-1, 'x')).toThrow(RangeError);
      expect(() => buffer.insert(1.5, 'x')).toThrow(RangeError);
      expect(buffer.size).toBe(0);
    });

    it('returns a frozen result carrying the given timestamp', () => {
      const buffer = new ResultBuffer();
      const producedAt = new Date('2025-01-02T03:04:05.000Z');

      const result = buffer.insert(0, 'hello', producedAt);

      expect(result).toEqual({ sequence: 0, text: 'hello', producedAt });
      expect(Object.isFrozen(result)).toBe(true);
    });
  });

  // --------------------------------------------------------------------------
  // Watermark
  // --------------------------------------------------------------------------

  describe('watermark', () => {
    it('rejects a sequence that was already drained', () => {
      const buffer = new ResultBuffer();
      fill(buffer, [0, 1, 2]);
      buffer.drainContiguousFrom(0);

      expect(buffer.watermark).toBe(3);
      expect(() => buffer.insert(1, 'resent')).toThrow('Sequence 1 was already merged');
      expect(buffer.size).toBe(0);
      buffer.insert(3, 'next');
      expect(buffer.has(3)).toBe(true);
    });

    it('is not moved by an empty drain', () => {
      const buffer = new ResultBuffer();

      buffer.drainContiguousFrom(5);

      expect(buffer.watermark).toBe(0);
      buffer.insert(2, 'x');
      expect(buffer.has(2)).toBe(true);
    });

    it('only moves forward when raised', () => {
      const buffer = new ResultBuffer();
      buffer.raiseWatermark(10);
      buffer.raiseWatermark(4);

      expect(buffer.watermark).toBe(10);
      expect(() => buffer.insert(9, 'x')).toThrow(DuplicateSequenceError);
      buffer.insert(10, 'y');
      expect(buffer.has(10)).toBe(true);
    });
  });

  // --------------------------------------------------------------------------
  // Inspection helpers
  // --------------------------------------------------------------------------

  describe('inspection', () => {
    it('reports the lowest buffered sequence', () => {
      const buffer = new ResultBuffer();
      expect(buffer.lowestSequence()).toBeNull();

      fill(buffer, [8, 3, 5]);
      expect(buffer.lowestSequence()).toBe(3);
      expect(buffer.sequences()).toEqual([3, 5, 8]);
      expect(buffer.has(5)).toBe(true);
      expect(buffer.has(4)).toBe(false);
    });

    it('signals when the soft limit is exceeded', () => {
      const buffer = new ResultBuffer({ softLimit: 2 });
      fill(buffer, [0, 1]);
      expect(buffer.isOverCapacity()).toBe(false);

      buffer.insert(2, 'x');
      expect(buffer.isOverCapacity()).toBe(true);
    });
  });
});
