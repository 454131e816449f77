/**
 * PipelineController Unit Tests
 *
 * - Failed-sequence bookkeeping for crashed jobs
 * - Provider disposal on stop
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { PipelineController, type ControllerConfig } from '../../../src/main/pipeline/PipelineController';
import type { Fragment } from '../../../src/main/pipeline/types';
import { ModelRegistry } from '../../../src/main/transcription/ModelRegistry';
import type { ModelProvider } from '../../../src/main/transcription/types';
import { makeTempDir, removeTempDir } from '../../setup';

function makeConfig(root: string): ControllerConfig {
  return {
    inputDir: join(root, 'incoming'),
    processedDir: join(root, 'processed'),
    failedDir: join(root, 'failed'),
    archiveDir: join(root, 'transcripts'),
    extensions: ['.wav'],
    concurrency: 1,
    queueCapacity: 2,
    pollIntervalMs: 60_000,
    mergeIntervalMs: 60_000,
    jobTimeoutMs: 5000,
    minFreeDiskBytes: 0,
    firstSequence: 0,
    bufferSoftLimit: 1000,
    model: { kind: 'static', text: '{name}' },
  };
}

function disposableProvider(dispose: () => Promise<void>): ModelProvider {
  return {
    id: 'disposable',
    kind: 'static',
    acquire: async () => ({ transcribe: async () => '' }),
    dispose,
  };
}

describe('PipelineController', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('counts a crashed job as a failed sequence', () => {
    const controller = new PipelineController({ config: makeConfig(root) });
    const fragment: Fragment = {
      name: 'chunk_004.wav',
      path: join(root, 'incoming', 'chunk_004.wav'),
      sequence: 4,
      arrivedAt: new Date(),
      status: 'in-progress',
    };
    const forwarded: Fragment[] = [];
    controller.on('job:error', (crashed: Fragment) => forwarded.push(crashed));

    controller.pool.emit('job:error', fragment, new Error('executor blew up'));

    expect(controller.status()).toMatchObject({ failedCount: 1, failedSequences: [4] });
    expect(forwarded).toEqual([fragment]);
  });

  it('clears the registry it took the provider from on stop', async () => {
    const dispose = vi.fn(async () => {});
    const factory = vi.fn((): ModelProvider => disposableProvider(dispose));
    const registry = new ModelRegistry(factory);
    const config = makeConfig(root);
    const controller = new PipelineController({ config, registry });

    await controller.start();
    await controller.stop();

    expect(dispose).toHaveBeenCalledTimes(1);
    registry.get(config.model);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('disposes a provider passed in directly', async () => {
    const dispose = vi.fn(async () => {});
    const controller = new PipelineController({ config: makeConfig(root), provider: disposableProvider(dispose) });

    await controller.start();
    await controller.stop();

    expect(dispose).toHaveBeenCalledTimes(1);
  });
});
