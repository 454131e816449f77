/**
 * WorkerPool Unit Tests
 *
 * Tests the bounded queue and executor loops:
 * - Exactly-once completion under load
 * - No fragment on two executors at once
 * - Backpressure when the queue is full
 * - Crash isolation
 * - drain() and PoolClosedError
 */

import { describe, it, expect } from 'vitest';
import { WorkQueue, WorkerPool } from '../../../src/main/pipeline/WorkerPool';
import { PoolClosedError, TranscriptionError } from '../../../src/main/pipeline/errors';
import type { Fragment, JobOutcome } from '../../../src/main/pipeline/types';
import { deferred, flushPromises } from '../../setup';

// ============================================================================
// Helpers
// ============================================================================

function makeFragment(sequence: number): Fragment {
  return {
    name: `chunk_${String(sequence).padStart(3, '0')}.wav`,
    path: `/in/chunk_${sequence}.wav`,
    sequence,
    arrivedAt: new Date(),
    status: 'pending',
  };
}

function succeeded(fragment: Fragment): JobOutcome {
  return { status: 'succeeded', fragment, text: `text-${fragment.sequence}`, durationMs: 1 };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

// ============================================================================
// WorkQueue
// ============================================================================

describe('WorkQueue', () => {
  it('hands items out in FIFO order', async () => {
    const queue = new WorkQueue<number>(3);
    await queue.put(1);
    await queue.put(2);

    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBe(2);
  });

  it('makes put wait while full and admits it on take', async () => {
    const queue = new WorkQueue<string>(1);
    await queue.put('a');

    let admitted = false;
    const pending = queue.put('b').then(() => {
      admitted = true;
    });
    await flushPromises();
    expect(admitted).toBe(false);
    expect(queue.waitingProducers).toBe(1);

    expect(await queue.take()).toBe('a');
    await pending;
    expect(admitted).toBe(true);
    expect(await queue.take()).toBe('b');
  });

  it('hands a put straight to a waiting taker', async () => {
    const queue = new WorkQueue<string>(1);
    const taken = queue.take();

    await queue.put('x');

    expect(await taken).toBe('x');
    expect(queue.size).toBe(0);
  });

  it('releases waiting takers with null on close', async () => {
    const queue = new WorkQueue<string>(2);
    const taken = queue.take();

    queue.close();

    expect(await taken).toBeNull();
    await expect(queue.put('late')).rejects.toBeInstanceOf(PoolClosedError);
  });

  it('still hands out queued items after close', async () => {
    const queue = new WorkQueue<number>(2);
    await queue.put(1);
    queue.close();

    expect(await queue.take()).toBe(1);
    expect(await queue.take()).toBeNull();
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new WorkQueue<number>(0)).toThrow(RangeError);
  });
});

// ============================================================================
// WorkerPool
// ============================================================================

describe('WorkerPool', () => {
  it('completes 100 fragments exactly once with 4 workers and capacity 10', async () => {
    const runs = new Map<number, number>();
    const active = new Set<number>();
    let maxActive = 0;
    let overlap = false;

    const pool = new WorkerPool({
      concurrency: 4,
      queueCapacity: 10,
      runJob: async (fragment) => {
        if (active.has(fragment.sequence)) overlap = true;
        active.add(fragment.sequence);
        maxActive = Math.max(maxActive, active.size);
        runs.set(fragment.sequence, (runs.get(fragment.sequence) ?? 0) + 1);
        await new Promise((resolve) => setTimeout(resolve, fragment.sequence % 3));
        active.delete(fragment.sequence);
        return succeeded(fragment);
      },
    });
    pool.start();

    const completed: number[] = [];
    pool.on('job:complete', (outcome: JobOutcome) => completed.push(outcome.fragment.sequence));

    for (let seq = 0; seq < 100; seq++) {
      await pool.submit(makeFragment(seq));
    }
    await pool.drain();

    expect(completed).toHaveLength(100);
    expect(new Set(completed).size).toBe(100);
    expect([...runs.values()].every((count) => count === 1)).toBe(true);
    expect(overlap).toBe(false);
    expect(maxActive).toBeLessThanOrEqual(4);
    expect(pool.stats()).toMatchObject({ completed: 100, failed: 0, crashed: 0, inFlight: 0, queued: 0 });
  });

  it('blocks submit once executors are busy and the queue is full', async () => {
    const gate = deferred<void>();
    const pool = new WorkerPool({
      concurrency: 1,
      queueCapacity: 1,
      runJob: async (fragment) => {
        await gate.promise;
        return succeeded(fragment);
      },
    });
    pool.start();

    await pool.submit(makeFragment(0)); // taken by the executor
    await tick();
    await pool.submit(makeFragment(1)); // fills the queue

    let thirdQueued = false;
    const third = pool.submit(makeFragment(2)).then(() => {
      thirdQueued = true;
    });
    await tick();

    expect(thirdQueued).toBe(false);
    expect(pool.stats()).toMatchObject({ inFlight: 1, queued: 1, waitingProducers: 1 });

    gate.resolve();
    await third;
    await pool.drain();
    expect(pool.stats().completed).toBe(3);
  });

  it('counts failed outcomes separately from successes', async () => {
    const pool = new WorkerPool({
      concurrency: 2,
      queueCapacity: 4,
      runJob: async (fragment) =>
        fragment.sequence === 1
          ? { status: 'failed', fragment, error: new TranscriptionError('bad audio'), durationMs: 0 }
          : succeeded(fragment),
    });
    pool.start();

    for (const seq of [0, 1, 2]) await pool.submit(makeFragment(seq));
    await pool.drain();

    expect(pool.stats()).toMatchObject({ completed: 2, failed: 1, crashed: 0 });
  });

  it('keeps running after a job throws', async () => {
    const pool = new WorkerPool({
      concurrency: 1,
      queueCapacity: 4,
      runJob: async (fragment) => {
        if (fragment.sequence === 0) throw new Error('boom');
        return succeeded(fragment);
      },
    });
    const errors: string[] = [];
    pool.on('job:error', (fragment: Fragment, error: Error) => errors.push(`${fragment.sequence}:${error.message}`));
    pool.start();

    await pool.submit(makeFragment(0));
    await pool.submit(makeFragment(1));
    await pool.drain();

    expect(errors).toEqual(['0:boom']);
    expect(pool.stats()).toMatchObject({ completed: 1, crashed: 1 });
  });

  it('finishes in-flight jobs on drain and then refuses submissions', async () => {
    const gate = deferred<void>();
    const pool = new WorkerPool({
      concurrency: 2,
      queueCapacity: 2,
      runJob: async (fragment) => {
        await gate.promise;
        return succeeded(fragment);
      },
    });
    pool.start();
    await pool.submit(makeFragment(0));
    await tick();
    expect(pool.inFlightFragments().map((f) => f.sequence)).toEqual([0]);

    let drained = false;
    const drain = pool.drain().then(() => {
      drained = true;
    });
    await tick();

    expect(pool.isAccepting).toBe(false);
    expect(drained).toBe(false);
    await expect(pool.submit(makeFragment(1))).rejects.toBeInstanceOf(PoolClosedError);

    gate.resolve();
    await drain;
    expect(pool.stats().completed).toBe(1);
  });

  it('rejects an invalid concurrency', () => {
    expect(
      () => new WorkerPool({ concurrency: 0, queueCapacity: 1, runJob: async (f) => succeeded(f) })
    ).toThrow(RangeError);
  });
});
