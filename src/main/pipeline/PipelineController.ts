/**
 * PipelineController - Owns and wires the fragment pipeline
 *
 *   FragmentWatcher → WorkerPool → TranscriptionJob → ResultBuffer
 *                                                         ↓
 *                                                 MergeCoordinator
 *
 * Every component is instance state of the controller; two controllers in
 * one process share nothing. Shutdown order: stop dispatch, drain the pool
 * (in-flight jobs finish), then one final merge.
 */

import { EventEmitter } from 'events';
import { mkdir } from 'fs/promises';
import type { ModelProvider } from '../transcription/types';
import { ModelRegistry } from '../transcription/ModelRegistry';
import type { PipelineConfig } from '../settings/config';
import { DiskGuard, type DiskSpaceProbe } from './diskSpace';
import { FragmentWatcher } from './FragmentWatcher';
import { MergeCoordinator, type MergeState } from './MergeCoordinator';
import { ResultBuffer } from './ResultBuffer';
import { TranscriptionJob } from './TranscriptionJob';
import { WorkerPool, type WorkerPoolStats } from './WorkerPool';
import { silentLogger, type Fragment, type JobOutcome, type PipelineLogger } from './types';

// ============================================================================
// Types
// ============================================================================

export type ControllerConfig = Omit<PipelineConfig, 'configPath' | 'logsDir' | 'logLevel'>;

export interface PipelineControllerOptions {
  config: ControllerConfig;
  /** Overrides the provider built from `config.model`; disposed on stop */
  provider?: ModelProvider;
  /** Source of the provider when none is given; cleared on stop */
  registry?: ModelRegistry;
  /** Builds the logger for each component scope */
  loggerFor?: (scope: string) => PipelineLogger;
  diskProbe?: DiskSpaceProbe;
}

export interface PipelineStatus {
  running: boolean;
  diskLow: boolean;
  seen: number;
  pool: WorkerPoolStats;
  buffered: number;
  /** Buffered entries exceed bufferSoftLimit */
  bufferOverCapacity: boolean;
  bufferedSequences: number[];
  cursor: number;
  mergeState: MergeState;
  archivedCount: number;
  failedCount: number;
  failedSequences: number[];
}

// ============================================================================
// PipelineController Class
// ============================================================================

export class PipelineController extends EventEmitter {
  readonly buffer: ResultBuffer;
  readonly pool: WorkerPool;
  readonly watcher: FragmentWatcher;
  readonly merger: MergeCoordinator;

  private readonly config: ControllerConfig;
  private readonly provider: ModelProvider;
  private readonly registry: ModelRegistry | null;
  private readonly logger: PipelineLogger;
  private failedSequences = new Set<number>();
  private running = false;

  constructor(options: PipelineControllerOptions) {
    super();
    const config = options.config;
    const loggerFor = options.loggerFor ?? (() => silentLogger);
    this.config = config;
    this.logger = loggerFor('Pipeline');

    if (options.provider) {
      this.provider = options.provider;
      this.registry = null;
    } else {
      const registry = options.registry ?? new ModelRegistry(undefined, loggerFor('Models'));
      this.provider = registry.get(config.model);
      this.registry = registry;
    }

    this.buffer = new ResultBuffer({ softLimit: config.bufferSoftLimit });

    const diskGuard = new DiskGuard(
      config.archiveDir,
      config.minFreeDiskBytes,
      options.diskProbe,
      loggerFor('Disk')
    );

    const job = new TranscriptionJob({
      provider: this.provider,
      buffer: this.buffer,
      processedDir: config.processedDir,
      failedDir: config.failedDir,
      timeoutMs: config.jobTimeoutMs,
      logger: loggerFor('Job'),
    });

    this.pool = new WorkerPool({
      concurrency: config.concurrency,
      queueCapacity: config.queueCapacity,
      runJob: (fragment) => job.run(fragment),
      logger: loggerFor('Pool'),
    });

    this.watcher = new FragmentWatcher({
      inputDir: config.inputDir,
      extensions: config.extensions,
      intervalMs: config.pollIntervalMs,
      submit: (fragment) => this.pool.submit(fragment),
      diskGuard,
      logger: loggerFor('Watcher'),
    });

    this.merger = new MergeCoordinator({
      buffer: this.buffer,
      archiveDir: config.archiveDir,
      intervalMs: config.mergeIntervalMs,
      firstSequence: config.firstSequence,
      diskGuard,
      logger: loggerFor('Merge'),
    });

    this.forwardEvents();
  }

  /**
   * Create the working directories and start every loop.
   */
  async start(): Promise<void> {
    if (this.running) return;

    const { inputDir, processedDir, failedDir, archiveDir } = this.config;
    await Promise.all([inputDir, processedDir, failedDir, archiveDir].map((dir) => mkdir(dir, { recursive: true })));

    this.pool.start();
    this.watcher.start();
    this.merger.start();
    this.running = true;

    this.logger.info(
      `Pipeline started: ${inputDir} → ${archiveDir} (provider ${this.provider.id}, ${this.config.concurrency} workers)`
    );
    this.emit('started');
  }

  /**
   * Stop dispatch, let in-flight jobs finish, then run a final merge.
   */
  async stop(options: { flush?: boolean } = {}): Promise<PipelineStatus> {
    if (!this.running) return this.status();
    this.running = false;

    this.logger.info('Stopping: dispatch halted, draining workers');
    await this.watcher.stop();
    await this.pool.drain();
    await this.merger.stop({ flush: options.flush ?? true });
    if (this.registry) {
      await this.registry.clear();
    } else {
      await this.provider.dispose?.();
    }

    const status = this.status();
    if (status.buffered > 0) {
      this.logger.warn(
        `Stopped with ${status.buffered} unmerged result(s) behind a gap at sequence ${status.cursor}: ` +
          status.bufferedSequences.join(', ')
      );
    }
    this.logger.info(`Pipeline stopped (${status.archivedCount} transcript(s), ${status.failedCount} failure(s))`);
    this.emit('stopped', status);
    return status;
  }

  isRunning(): boolean {
    return this.running;
  }

  status(): PipelineStatus {
    return {
      running: this.running,
      diskLow: this.watcher.isDiskLow(),
      seen: this.watcher.seenCount,
      pool: this.pool.stats(),
      buffered: this.buffer.size,
      bufferOverCapacity: this.buffer.isOverCapacity(),
      bufferedSequences: this.buffer.sequences(),
      cursor: this.merger.cursor,
      mergeState: this.merger.state,
      archivedCount: this.merger.archived.length,
      failedCount: this.failedSequences.size,
      failedSequences: [...this.failedSequences].sort((a, b) => a - b),
    };
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private forwardEvents(): void {
    this.pool.on('job:complete', (outcome: JobOutcome) => {
      if (outcome.status === 'failed') {
        this.failedSequences.add(outcome.fragment.sequence);
      }
      this.emit('job:complete', outcome);
    });

    // A crashed job wrote no outcome; its sequence still counts as failed
    this.pool.on('job:error', (fragment: Fragment, error: unknown) => {
      this.failedSequences.add(fragment.sequence);
      this.emit('job:error', fragment, error);
    });
    this.pool.on('job:start', (fragment: Fragment) => this.emit('job:start', fragment));
    for (const event of ['dispatched', 'disk-low', 'disk-recovered', 'poll-error']) {
      this.watcher.on(event, (...args: unknown[]) => this.emit(event, ...args));
    }
    for (const event of ['archived', 'stalled', 'merge-error']) {
      this.merger.on(event, (...args: unknown[]) => this.emit(event, ...args));
    }
  }
}
