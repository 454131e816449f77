/**
 * Transcription Module
 *
 * Speech backends behind the ModelProvider interface:
 * - whisper-cpp: local whisper.cpp CLI (default)
 * - openai:      OpenAI-compatible HTTP endpoint
 * - static:      fixed text for dry runs
 *
 * The ModelRegistry builds and caches providers from configuration.
 */

export { ModelRegistry, StaticProvider, SerializedProvider, createProvider, providerCacheKey } from './ModelRegistry';
export { WhisperCppProvider, findWhisperCppBinary } from './WhisperCppProvider';
export { OpenAIProvider, extractApiError } from './OpenAIProvider';

export type {
  ProviderKind,
  AudioInput,
  Transcriber,
  ModelProvider,
  ProviderConfig,
  WhisperCppConfig,
  OpenAIConfig,
  StaticConfig,
} from './types';
