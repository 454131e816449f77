/**
 * Shared types for the fragment pipeline
 */

import type { PipelineError } from './errors';

// ============================================================================
// Fragments
// ============================================================================

export type FragmentStatus = 'pending' | 'in-progress' | 'succeeded' | 'failed';

/**
 * One audio file in the fragment source directory. Identity is the sequence
 * number parsed from its name.
 */
export interface Fragment {
  name: string;
  path: string;
  sequence: number;
  arrivedAt: Date;
  status: FragmentStatus;
}

// ============================================================================
// Results
// ============================================================================

export interface TranscriptionResult {
  readonly sequence: number;
  readonly text: string;
  readonly producedAt: Date;
}

export interface DrainResult {
  results: TranscriptionResult[];
  /** Texts of `results`, ascending by sequence */
  texts: string[];
  nextCursor: number;
}

export type JobOutcome =
  | {
      status: 'succeeded';
      fragment: Fragment;
      text: string;
      durationMs: number;
    }
  | {
      status: 'failed';
      fragment: Fragment;
      error: PipelineError;
      durationMs: number;
    };

/** One line of `failures.jsonl` in the failed directory */
export interface FailureRecord {
  name: string;
  sequence: number;
  reason: string;
  message: string;
  movedTo: string | null;
  failedAt: string;
}

// ============================================================================
// Archived transcripts
// ============================================================================

export interface ArchivedTranscript {
  start: number;
  end: number;
  path: string;
  fragmentCount: number;
  createdAt: Date;
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Minimal logger surface the core depends on. The CLI binds it to scoped
 * electron-log loggers; tests pass spies.
 */
export interface PipelineLogger {
  debug(...params: unknown[]): void;
  info(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  error(...params: unknown[]): void;
}

export const silentLogger: PipelineLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
