/**
 * OpenAIProvider.ts - Cloud transcription via an OpenAI-compatible API
 *
 * Uploads each fragment to `<baseUrl>/v1/audio/transcriptions` and returns
 * the `text` field of the JSON response. Works with OpenAI itself and with
 * self-hosted servers exposing the same endpoint.
 */

import { extname } from 'path';
import { ModelUnavailableError, TranscriptionError } from '../pipeline/errors';
import type { AudioInput, ModelProvider, OpenAIConfig, Transcriber } from './types';

const MIME_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.ogg': 'audio/ogg',
  '.webm': 'audio/webm',
  '.flac': 'audio/flac',
};

/**
 * Extract a user-friendly error message from an API error response.
 */
export async function extractApiError(response: Response): Promise<string> {
  let raw: string;
  try {
    raw = await response.text();
  } catch {
    return `HTTP ${response.status}`;
  }

  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return `HTTP ${response.status}`;
  }

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (isErrorPayload(parsed) && parsed.error.message.trim().length > 0) {
      return parsed.error.message.trim();
    }
  } catch {
    // Plain-text body
  }
  return trimmed.length > 220 ? `${trimmed.slice(0, 220)}...` : trimmed;
}

function isErrorPayload(value: unknown): value is { error: { message: string } } {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false;
  const error = value.error;
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

function isTextPayload(value: unknown): value is { text: string } {
  return typeof value === 'object' && value !== null && 'text' in value && typeof value.text === 'string';
}

// ============================================================================
// OpenAIProvider Class
// ============================================================================

export class OpenAIProvider implements ModelProvider {
  readonly kind = 'openai' as const;
  readonly id: string;

  constructor(
    private readonly config: OpenAIConfig,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.id = `openai:${config.model}`;
  }

  async acquire(): Promise<Transcriber> {
    const apiKey = this.env[this.config.apiKeyEnv]?.trim();
    if (!apiKey) {
      throw new ModelUnavailableError(`${this.config.apiKeyEnv} is not set`);
    }

    return {
      transcribe: (input, signal) => this.transcribe(apiKey, input, signal),
    };
  }

  private async transcribe(apiKey: string, input: AudioInput, signal?: AbortSignal): Promise<string> {
    const form = new FormData();
    form.append('model', this.config.model);
    form.append('response_format', 'json');
    form.append('temperature', '0');
    if (this.config.language) {
      form.append('language', this.config.language);
    }
    const mimeType = MIME_TYPES[extname(input.fileName).toLowerCase()] ?? 'application/octet-stream';
    form.append('file', new Blob([new Uint8Array(input.bytes)], { type: mimeType }), input.fileName);

    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/v1/audio/transcriptions`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { Authorization: `Bearer ${apiKey}` },
        body: form,
        signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TranscriptionError(`Transcription request for ${input.fileName} was aborted`, 'timeout', error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ModelUnavailableError(`Cannot reach ${url}: ${message}`, error);
    }

    if (!response.ok) {
      const detail = await extractApiError(response);
      const message = `Transcription failed (${response.status}): ${detail}`;
      if (response.status === 401 || response.status === 403 || response.status >= 500) {
        throw new ModelUnavailableError(message);
      }
      throw new TranscriptionError(message);
    }

    const payload: unknown = await response.json();
    if (!isTextPayload(payload)) {
      throw new TranscriptionError(`Transcription response for ${input.fileName} has no text field`);
    }
    return payload.text.trim();
  }
}
