/**
 * WorkerPool.ts - Bounded queue plus a fixed set of executors
 *
 * The watcher submits fragments; N executors each pull one fragment at a
 * time and run its transcription job to completion. A full queue makes
 * submit() wait instead of dropping work, which bounds memory under bursts.
 *
 * Executors are async loops on the event loop. The concurrent work they
 * wait on (child processes, HTTP requests) is what runs in parallel.
 */

import { EventEmitter } from 'events';
import { PoolClosedError } from './errors';
import { silentLogger, type Fragment, type JobOutcome, type PipelineLogger } from './types';

// ============================================================================
// WorkQueue
// ============================================================================

interface PendingPut<T> {
  item: T;
  resolve: () => void;
}

/**
 * FIFO queue with a fixed capacity. `put` waits while full; `take` waits
 * while empty and resolves null once the queue is closed and exhausted.
 */
export class WorkQueue<T> {
  private items: T[] = [];
  private pendingPuts: PendingPut<T>[] = [];
  private pendingTakes: Array<(item: T | null) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  put(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError());
    }

    const taker = this.pendingTakes.shift();
    if (taker) {
      taker(item);
      return Promise.resolve();
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.pendingPuts.push({ item, resolve });
    });
  }

  take(): Promise<T | null> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.admitWaitingPut();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      this.pendingTakes.push(resolve);
    });
  }

  /**
   * Refuse further puts. Items already queued, and puts already waiting for
   * room, are still handed out.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.items.length === 0 && this.pendingPuts.length === 0) {
      for (const taker of this.pendingTakes.splice(0)) {
        taker(null);
      }
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Producers currently waiting for room */
  get waitingProducers(): number {
    return this.pendingPuts.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private admitWaitingPut(): void {
    const waiting = this.pendingPuts.shift();
    if (waiting) {
      this.items.push(waiting.item);
      waiting.resolve();
    }
  }
}

// ============================================================================
// WorkerPool
// ============================================================================

export interface WorkerPoolOptions {
  concurrency: number;
  queueCapacity: number;
  /** Runs one fragment end to end */
  runJob: (fragment: Fragment) => Promise<JobOutcome>;
  logger?: PipelineLogger;
}

export interface WorkerPoolStats {
  concurrency: number;
  queued: number;
  waitingProducers: number;
  inFlight: number;
  completed: number;
  failed: number;
  /** Jobs that threw instead of returning an outcome */
  crashed: number;
}

export class WorkerPool extends EventEmitter {
  private readonly queue: WorkQueue<Fragment>;
  private readonly concurrency: number;
  private readonly runJob: (fragment: Fragment) => Promise<JobOutcome>;
  private readonly logger: PipelineLogger;
  private executors: Promise<void>[] = [];
  private inFlight = new Map<string, Fragment>();
  private completed = 0;
  private failed = 0;
  private crashed = 0;

  constructor(options: WorkerPoolOptions) {
    super();
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.concurrency = options.concurrency;
    this.queue = new WorkQueue<Fragment>(options.queueCapacity);
    this.runJob = options.runJob;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Spawn the executors. Calling start() on a running pool is a no-op.
   */
  start(): void {
    if (this.executors.length > 0) return;
    for (let i = 0; i < this.concurrency; i++) {
      this.executors.push(this.executorLoop(i));
    }
    this.logger.info(`Worker pool started (${this.concurrency} executors, queue ${this.queue.capacity})`);
  }

  /**
   * Queue a fragment, waiting while the queue is full. Rejects with
   * PoolClosedError once drain() has been called.
   */
  submit(fragment: Fragment): Promise<void> {
    return this.queue.put(fragment);
  }

  /**
   * Stop accepting fragments and resolve once every queued and in-flight
   * job has finished.
   */
  async drain(): Promise<void> {
    this.queue.close();
    await Promise.all(this.executors);
    this.logger.info(
      `Worker pool drained (${this.completed} succeeded, ${this.failed} failed, ${this.crashed} crashed)`
    );
  }

  get isAccepting(): boolean {
    return !this.queue.isClosed;
  }

  inFlightFragments(): Fragment[] {
    return [...this.inFlight.values()];
  }

  stats(): WorkerPoolStats {
    return {
      concurrency: this.concurrency,
      queued: this.queue.size,
      waitingProducers: this.queue.waitingProducers,
      inFlight: this.inFlight.size,
      completed: this.completed,
      failed: this.failed,
      crashed: this.crashed,
    };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async executorLoop(index: number): Promise<void> {
    for (;;) {
      const fragment = await this.queue.take();
      if (fragment === null) {
        this.logger.debug(`Executor ${index} exiting`);
        return;
      }

      this.inFlight.set(fragment.name, fragment);
      this.emit('job:start', fragment);

      try {
        const outcome = await this.runJob(fragment);
        if (outcome.status === 'succeeded') {
          this.completed += 1;
        } else {
          this.failed += 1;
        }
        this.emit('job:complete', outcome);
      } catch (error) {
        // A job that throws must not take the executor down with it
        this.crashed += 1;
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Job for ${fragment.name} crashed: ${message}`);
        this.emit('job:error', fragment, error);
      } finally {
        this.inFlight.delete(fragment.name);
      }
    }
  }
}
