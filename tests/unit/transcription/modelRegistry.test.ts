/**
 * ModelRegistry Unit Tests
 *
 * - Provider construction per config kind
 * - Instance caching by model key
 * - SerializedProvider single-slot behaviour
 * - StaticProvider templating
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ModelRegistry,
  SerializedProvider,
  StaticProvider,
  createProvider,
  providerCacheKey,
} from '../../../src/main/transcription/ModelRegistry';
import { OpenAIProvider } from '../../../src/main/transcription/OpenAIProvider';
import { WhisperCppProvider } from '../../../src/main/transcription/WhisperCppProvider';
import type { AudioInput, ModelProvider, ProviderConfig } from '../../../src/main/transcription/types';
import { deferred } from '../../setup';

const INPUT: AudioInput = { bytes: Buffer.from(''), path: '/in/part_3.wav', fileName: 'part_3.wav' };

const WHISPER: ProviderConfig = {
  kind: 'whisper-cpp',
  modelPath: '/models/ggml-base.en.bin',
  language: 'en',
  serialize: true,
};

describe('createProvider', () => {
  it('wraps whisper-cpp in SerializedProvider when serialize is set', () => {
    const provider = createProvider(WHISPER);

    expect(provider).toBeInstanceOf(SerializedProvider);
    expect(provider.id).toBe('serialized(whisper-cpp:/models/ggml-base.en.bin)');
    expect(provider.kind).toBe('whisper-cpp');
  });

  it('returns a bare WhisperCppProvider when serialize is off', () => {
    expect(createProvider({ ...WHISPER, serialize: false })).toBeInstanceOf(WhisperCppProvider);
  });

  it('builds openai and static providers', () => {
    expect(
      createProvider({ kind: 'openai', baseUrl: 'http://localhost:9000', model: 'whisper-1', apiKeyEnv: 'K' })
    ).toBeInstanceOf(OpenAIProvider);
    expect(createProvider({ kind: 'static', text: 'x' })).toBeInstanceOf(StaticProvider);
  });
});

describe('providerCacheKey', () => {
  it('keys by kind and model', () => {
    expect(providerCacheKey(WHISPER)).toBe('whisper-cpp:/models/ggml-base.en.bin:en');
    expect(
      providerCacheKey({ kind: 'openai', baseUrl: 'http://localhost:9000', model: 'whisper-1', apiKeyEnv: 'K' })
    ).toBe('openai:http://localhost:9000:whisper-1');
  });
});

describe('ModelRegistry', () => {
  it('returns the cached instance for the same model', () => {
    const factory = vi.fn((config: ProviderConfig): ModelProvider => new StaticProvider({ kind: 'static', text: config.kind }));
    const registry = new ModelRegistry(factory);

    const first = registry.get({ kind: 'static', text: 'a' });
    const second = registry.get({ kind: 'static', text: 'a' });
    const other = registry.get({ kind: 'static', text: 'b' });

    expect(second).toBe(first);
    expect(other).not.toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('disposes providers when cleared', async () => {
    const dispose = vi.fn(async () => {});
    const factory = vi.fn(
      (): ModelProvider => ({
        id: 'disposable',
        kind: 'static',
        acquire: async () => ({ transcribe: async () => '' }),
        dispose,
      })
    );
    const registry = new ModelRegistry(factory);
    const before = registry.get({ kind: 'static', text: 'a' });

    await registry.clear();
    const after = registry.get({ kind: 'static', text: 'a' });

    expect(dispose).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(after).not.toBe(before);
  });
});

describe('StaticProvider', () => {
  it('substitutes the file name into the template', async () => {
    const transcriber = await new StaticProvider({ kind: 'static', text: '[{name}] {name}' }).acquire();

    expect(await transcriber.transcribe(INPUT)).toBe('[part_3.wav] part_3.wav');
  });
});

describe('SerializedProvider', () => {
  function innerProvider(acquire: ModelProvider['acquire']): ModelProvider {
    return { id: 'inner', kind: 'whisper-cpp', acquire };
  }

  it('hands the slot to one caller at a time in arrival order', async () => {
    const provider = new SerializedProvider(
      innerProvider(async () => ({ transcribe: async (input) => input.fileName }))
    );
    const order: string[] = [];

    const first = await provider.acquire();
    const second = provider.acquire().then((t) => {
      order.push('second');
      return t;
    });
    const third = provider.acquire().then((t) => {
      order.push('third');
      return t;
    });
    await new Promise((resolve) => setImmediate(resolve));

    expect(order).toEqual([]);
    expect(provider.activeCount).toBe(1);
    expect(provider.waitingCount).toBe(2);
    expect(await first.transcribe(INPUT)).toBe('part_3.wav');

    first.release?.();
    (await second).release?.();
    (await third).release?.();

    expect(order).toEqual(['second', 'third']);
    expect(provider.activeCount).toBe(0);
    expect(provider.waitingCount).toBe(0);
  });

  it('ignores a second release of the same transcriber', async () => {
    const provider = new SerializedProvider(innerProvider(async () => ({ transcribe: async () => '' })));

    const first = await provider.acquire();
    first.release?.();
    const second = await provider.acquire();
    first.release?.();
    const gate = deferred<void>();
    const third = provider.acquire().then(() => gate.resolve());
    await new Promise((resolve) => setImmediate(resolve));

    expect(provider.waitingCount).toBe(1);
    second.release?.();
    await third;
    await gate.promise;
    expect(provider.activeCount).toBe(1);
  });

  it('frees the slot when the inner provider cannot be acquired', async () => {
    let attempts = 0;
    const provider = new SerializedProvider(
      innerProvider(async () => {
        attempts += 1;
        if (attempts === 1) throw new Error('model missing');
        return { transcribe: async () => 'ok' };
      })
    );

    await expect(provider.acquire()).rejects.toThrow('model missing');
    expect(provider.activeCount).toBe(0);

    const transcriber = await provider.acquire();
    expect(await transcriber.transcribe(INPUT)).toBe('ok');
  });
});
