/**
 * Shared Types for Transcription Providers
 *
 * The pipeline treats a speech backend as an opaque provider that hands out
 * a ready-to-use transcriber. Available providers:
 * - whisper-cpp: local whisper.cpp CLI binary
 * - openai:      OpenAI-compatible /v1/audio/transcriptions endpoint
 * - static:      fixed text, for dry runs and tests
 */

// ============================================================================
// Provider Types
// ============================================================================

export type ProviderKind = 'whisper-cpp' | 'openai' | 'static';

/**
 * Audio handed to a transcriber. Providers that shell out use `path`;
 * providers that upload use `bytes`.
 */
export interface AudioInput {
  bytes: Buffer;
  path: string;
  fileName: string;
}

export interface Transcriber {
  /**
   * Resolve to the recognized text. Rejects with ModelUnavailableError or
   * TranscriptionError. Implementations should stop work when `signal`
   * aborts.
   */
  transcribe(input: AudioInput, signal?: AbortSignal): Promise<string>;
  /** Hand back whatever acquire() reserved. Safe to call more than once. */
  release?(): void;
}

/**
 * Supplies transcribers. A provider must be safe for concurrent use by
 * several workers; wrap one that is not in SerializedProvider, whose
 * acquire() waits for the model and holds it until release().
 */
export interface ModelProvider {
  readonly id: string;
  readonly kind: ProviderKind;
  acquire(): Promise<Transcriber>;
  dispose?(): Promise<void>;
}

// ============================================================================
// Provider Configuration
// ============================================================================

export interface WhisperCppConfig {
  kind: 'whisper-cpp';
  /** whisper.cpp CLI binary; looked up on PATH when omitted */
  binaryPath?: string;
  modelPath: string;
  language: string;
  threads?: number;
  /** Run one transcription at a time through this provider */
  serialize: boolean;
}

export interface OpenAIConfig {
  kind: 'openai';
  baseUrl: string;
  model: string;
  language?: string;
  /** Name of the environment variable holding the API key */
  apiKeyEnv: string;
}

export interface StaticConfig {
  kind: 'static';
  /** Text returned for every fragment; `{name}` is replaced by the file name */
  text: string;
}

export type ProviderConfig = WhisperCppConfig | OpenAIConfig | StaticConfig;
