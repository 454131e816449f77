/**
 * ModelRegistry.ts - Provider construction and instance caching
 *
 * Builds a ModelProvider from configuration and caches it per model key so
 * every worker shares one instance. Providers that cannot be used
 * concurrently are wrapped in SerializedProvider here, keeping locking out
 * of the job logic.
 */

import type { AudioInput, ModelProvider, ProviderConfig, StaticConfig, Transcriber } from './types';
import { WhisperCppProvider } from './WhisperCppProvider';
import { OpenAIProvider } from './OpenAIProvider';
import { silentLogger, type PipelineLogger } from '../pipeline/types';

// ============================================================================
// StaticProvider
// ============================================================================

/**
 * Returns fixed text for every fragment. `{name}` in the template is
 * replaced by the fragment file name.
 */
export class StaticProvider implements ModelProvider {
  readonly kind = 'static' as const;
  readonly id = 'static';

  constructor(private readonly config: StaticConfig) {}

  async acquire(): Promise<Transcriber> {
    return {
      transcribe: async (input: AudioInput) => this.config.text.split('{name}').join(input.fileName),
    };
  }
}

// ============================================================================
// SerializedProvider
// ============================================================================

/**
 * Lets exactly one caller at a time hold the wrapped provider. acquire()
 * resolves once the slot is free, in arrival order, and the transcriber it
 * returns keeps the slot until release().
 */
export class SerializedProvider implements ModelProvider {
  readonly id: string;
  readonly kind: ModelProvider['kind'];
  private held = false;
  private waiters: Array<() => void> = [];

  constructor(private readonly inner: ModelProvider) {
    this.id = `serialized(${inner.id})`;
    this.kind = inner.kind;
  }

  /** Callers holding the slot (0 or 1) */
  get activeCount(): number {
    return this.held ? 1 : 0;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<Transcriber> {
    await this.lock();

    let transcriber: Transcriber;
    try {
      transcriber = await this.inner.acquire();
    } catch (error) {
      this.unlock();
      throw error;
    }

    let released = false;
    return {
      transcribe: (input, signal) => transcriber.transcribe(input, signal),
      release: () => {
        if (released) return;
        released = true;
        transcriber.release?.();
        this.unlock();
      },
    };
  }

  async dispose(): Promise<void> {
    await this.inner.dispose?.();
  }

  private lock(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Pass the slot straight to the next waiter, or free it. */
  private unlock(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.held = false;
    }
  }
}

// ============================================================================
// ModelRegistry
// ============================================================================

export function providerCacheKey(config: ProviderConfig): string {
  switch (config.kind) {
    case 'whisper-cpp':
      return `whisper-cpp:${config.modelPath}:${config.language}`;
    case 'openai':
      return `openai:${config.baseUrl}:${config.model}`;
    case 'static':
      return `static:${config.text}`;
  }
}

export function createProvider(config: ProviderConfig): ModelProvider {
  switch (config.kind) {
    case 'whisper-cpp': {
      const provider = new WhisperCppProvider(config);
      return config.serialize ? new SerializedProvider(provider) : provider;
    }
    case 'openai':
      return new OpenAIProvider(config);
    case 'static':
      return new StaticProvider(config);
  }
}

export class ModelRegistry {
  private cache = new Map<string, ModelProvider>();

  constructor(
    private readonly factory: (config: ProviderConfig) => ModelProvider = createProvider,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  /**
   * Return the cached provider for this configuration, creating it on first
   * use.
   */
  get(config: ProviderConfig): ModelProvider {
    const key = providerCacheKey(config);
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug(`Using cached provider: ${key}`);
      return cached;
    }

    const provider = this.factory(config);
    this.cache.set(key, provider);
    this.logger.info(`Created provider: ${provider.id}`);
    return provider;
  }

  /** Dispose every cached provider and empty the cache. */
  async clear(): Promise<void> {
    const providers = [...this.cache.values()];
    this.cache.clear();
    await Promise.all(providers.map((p) => p.dispose?.()));
    this.logger.info('Provider cache cleared');
  }
}
