/**
 * FragmentWatcher.ts - Polls the fragment source and feeds the worker pool
 *
 * Lists the input directory on a fixed interval and submits every fragment
 * whose name has not been seen before. Polling (rather than fs.watch) keeps
 * behaviour identical across platforms and network filesystems.
 *
 * Guarantees:
 * - A name is submitted at most once per watcher instance.
 * - Submission follows arrival order (mtime, then name), not sequence order.
 * - An unreadable directory or a low disk only costs one tick.
 */

import { EventEmitter } from 'events';
import { readdir, stat } from 'fs/promises';
import { extname, join } from 'path';
import { DiskLowError, DispatchError, toPipelineError } from './errors';
import type { DiskGuard } from './diskSpace';
import { parseSequence } from './sequence';
import { silentLogger, type Fragment, type PipelineLogger } from './types';

// ============================================================================
// Types
// ============================================================================

export interface FragmentWatcherOptions {
  inputDir: string;
  /** Lower-case extensions including the dot (default: ['.wav']) */
  extensions?: string[];
  /** Poll interval in ms (default: 500) */
  intervalMs?: number;
  /** Receives each new fragment; may wait to apply backpressure */
  submit: (fragment: Fragment) => Promise<void>;
  diskGuard?: DiskGuard;
  logger?: PipelineLogger;
}

interface Candidate {
  name: string;
  path: string;
  sequence: number;
  mtimeMs: number;
}

export const DEFAULT_EXTENSIONS = ['.wav'];

// ============================================================================
// FragmentWatcher Class
// ============================================================================

export class FragmentWatcher extends EventEmitter {
  private readonly inputDir: string;
  private readonly extensions: Set<string>;
  private readonly intervalMs: number;
  private readonly submit: (fragment: Fragment) => Promise<void>;
  private readonly diskGuard: DiskGuard | null;
  private readonly logger: PipelineLogger;

  private seen = new Set<string>();
  private ignored = new Set<string>();
  private diskLow = false;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private currentPoll: Promise<void> | null = null;
  private stopping = false;

  constructor(options: FragmentWatcherOptions) {
    super();
    this.inputDir = options.inputDir;
    this.extensions = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map((e) => e.toLowerCase()));
    this.intervalMs = options.intervalMs ?? 500;
    this.submit = options.submit;
    this.diskGuard = options.diskGuard ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Submit every fragment not seen before and return them.
   *
   * Rejects with DispatchError when the directory cannot be listed and with
   * DiskLowError while free space is below the threshold; neither marks any
   * name as seen, so the next poll picks the same files up.
   */
  async poll(): Promise<Fragment[]> {
    await this.checkDisk();

    const candidates = await this.listCandidates();
    const dispatched: Fragment[] = [];

    for (const candidate of candidates) {
      if (this.seen.has(candidate.name)) continue;
      // stop() between submissions leaves the rest for a later run
      if (this.stopping) break;

      const fragment: Fragment = {
        name: candidate.name,
        path: candidate.path,
        sequence: candidate.sequence,
        arrivedAt: new Date(),
        status: 'pending',
      };

      this.seen.add(candidate.name);
      try {
        await this.submit(fragment);
      } catch (error) {
        this.seen.delete(candidate.name);
        throw error;
      }
      dispatched.push(fragment);
      this.emit('dispatched', fragment);
    }

    if (dispatched.length > 0) {
      this.logger.info(`Dispatched ${dispatched.length} fragment(s): ${dispatched.map((f) => f.name).join(', ')}`);
    }
    return dispatched;
  }

  /**
   * Poll every `intervalMs` until stop(). The next tick is scheduled only
   * after the current poll settles, so a poll held up by backpressure never
   * overlaps the next one.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.stopping = false;
    this.logger.info(`Watching ${this.inputDir} for ${[...this.extensions].join(', ')} every ${this.intervalMs}ms`);
    this.scheduleTick(0);
  }

  /**
   * Stop polling. Resolves once an in-progress poll has settled.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.stopping = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentPoll) {
      await this.currentPoll;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  isDiskLow(): boolean {
    return this.diskLow;
  }

  hasSeen(name: string): boolean {
    return this.seen.has(name);
  }

  get seenCount(): number {
    return this.seen.size;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private scheduleTick(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.currentPoll = this.tick().finally(() => {
        this.currentPoll = null;
        if (this.running) {
          this.scheduleTick(this.intervalMs);
        }
      });
    }, delayMs);
  }

  /** One poll with every error logged; never rejects. */
  private async tick(): Promise<void> {
    try {
      await this.poll();
    } catch (error) {
      const pipelineError = toPipelineError(error);
      if (pipelineError instanceof DiskLowError) {
        this.logger.debug(pipelineError.message);
      } else {
        this.logger.error(`Watcher error: ${pipelineError.message}`);
        this.emit('poll-error', pipelineError);
      }
    }
  }

  private async checkDisk(): Promise<void> {
    if (!this.diskGuard) return;

    try {
      await this.diskGuard.assertFree();
    } catch (error) {
      if (error instanceof DiskLowError && !this.diskLow) {
        this.diskLow = true;
        this.logger.warn(`Dispatch paused: ${error.message}`);
        this.emit('disk-low', error);
      }
      throw error;
    }

    if (this.diskLow) {
      this.diskLow = false;
      this.logger.info('Disk space recovered; dispatch resumed');
      this.emit('disk-recovered');
    }
  }

  /**
   * Matching files in arrival order. Names without a sequence number are
   * warned about once and ignored from then on.
   */
  private async listCandidates(): Promise<Candidate[]> {
    let entries;
    try {
      entries = await readdir(this.inputDir, { withFileTypes: true });
    } catch (error) {
      throw new DispatchError(this.inputDir, error);
    }

    const candidates: Candidate[] = [];
    for (const entry of entries) {
      const name = entry.name;
      if (!entry.isFile() || name.startsWith('.')) continue;
      if (!this.extensions.has(extname(name).toLowerCase())) continue;
      if (this.seen.has(name) || this.ignored.has(name)) continue;

      const sequence = parseSequence(name);
      if (sequence === null) {
        this.ignored.add(name);
        this.logger.warn(`Skipping ${name}: no sequence number in file name`);
        continue;
      }

      const path = join(this.inputDir, name);
      let mtimeMs: number;
      try {
        mtimeMs = (await stat(path)).mtimeMs;
      } catch {
        // Gone between readdir and stat (moved by a finished job or removed)
        continue;
      }
      candidates.push({ name, path, sequence, mtimeMs });
    }

    return candidates.sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name));
  }
}
