// =============================================================================
// BlipVM - VM Types
// =============================================================================

import type { SampleFormat } from './constants'

/**
 * Scheduler configuration.
 */
export interface SchedulerConfig {
  /** Output sample rate in Hz (default: 8000) */
  sampleRate?: number
  /** Seed of the root thread's decision source (default: 0) */
  seed?: number
  /** PCM encoding used by `run()` (default: 'u8') */
  format?: SampleFormat
  /** Samples per sink write in `run()` (default: 512) */
  blockSize?: number
}

/**
 * Per-call overrides for `Scheduler.run()`.
 */
export interface RunOptions {
  format?: SampleFormat
  blockSize?: number
  /** Stop at the next block boundary once aborted */
  signal?: AbortSignal
}

/**
 * Why a run ended.
 * - halted: every thread ran off the end of the program
 * - closed: the sink stopped accepting data
 * - aborted: the caller's AbortSignal fired
 */
export type StopReason = 'halted' | 'closed' | 'aborted'

export interface RunResult {
  /** Samples in blocks the sink accepted */
  samples: number
  reason: StopReason
}
