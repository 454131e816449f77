/**
 * Pipeline Module - Fragment ingestion, transcription and ordered merge
 *
 *   1. FragmentWatcher polls the input dir and submits new fragments
 *   2. WorkerPool runs a TranscriptionJob per fragment
 *   3. Results land in the ResultBuffer keyed by sequence number
 *   4. MergeCoordinator writes each gap-free run as full_<start>_to_<end>.txt
 */

// ============================================================================
// Classes
// ============================================================================

export { PipelineController } from './PipelineController';
export { FragmentWatcher, DEFAULT_EXTENSIONS } from './FragmentWatcher';
export { WorkerPool, WorkQueue } from './WorkerPool';
export { TranscriptionJob, FAILURE_LOG_FILENAME, moveFile, uniqueDestination } from './TranscriptionJob';
export { ResultBuffer } from './ResultBuffer';
export { MergeCoordinator, joinTranscript } from './MergeCoordinator';
export { DiskGuard, statfsProbe } from './diskSpace';
export { parseSequence, archiveFileName, parseArchiveFileName } from './sequence';

// ============================================================================
// Errors
// ============================================================================

export {
  PipelineError,
  DispatchError,
  DiskLowError,
  DuplicateSequenceError,
  TranscriptionError,
  ModelUnavailableError,
  MergeError,
  PoolClosedError,
  ConfigError,
  toPipelineError,
} from './errors';

// ============================================================================
// Types
// ============================================================================

export type { PipelineControllerOptions, PipelineStatus, ControllerConfig } from './PipelineController';
export type { FragmentWatcherOptions } from './FragmentWatcher';
export type { WorkerPoolOptions, WorkerPoolStats } from './WorkerPool';
export type { TranscriptionJobOptions } from './TranscriptionJob';
export type { MergeCoordinatorOptions, MergeState, MergeStopOptions } from './MergeCoordinator';
export type { DiskSpaceProbe } from './diskSpace';
export type { PipelineErrorCode, PipelineErrorSeverity } from './errors';
export type {
  Fragment,
  FragmentStatus,
  TranscriptionResult,
  DrainResult,
  JobOutcome,
  FailureRecord,
  ArchivedTranscript,
  PipelineLogger,
} from './types';
export { silentLogger } from './types';
