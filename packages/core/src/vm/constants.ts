// =============================================================================
// BlipVM - VM Constants
// =============================================================================

/**
 * Default output sample rate in Hz (8 kHz mono, the `aplay` default).
 */
export const DEFAULT_SAMPLE_RATE = 8000

/**
 * Default seed for the root decision source.
 */
export const DEFAULT_SEED = 0

/**
 * Default number of samples encoded per sink write.
 */
export const DEFAULT_BLOCK_SIZE = 512

/**
 * Initial thread arena capacity. Grows by doubling.
 */
export const DEFAULT_THREAD_CAPACITY = 16

export const TAU = 2 * Math.PI

// =============================================================================
// Thread Status
// =============================================================================

/**
 * Thread status values stored in the arena's status column.
 */
export const STATUS = {
  /** Slot is free (thread halted and removed) */
  HALTED: 0x00,
  /** About to resolve the instruction at its program counter */
  READY: 0x01,
  /** Emitting a tone */
  PLAYING: 0x02
} as const

export type ThreadStatus = typeof STATUS[keyof typeof STATUS]

// =============================================================================
// PCM Formats
// =============================================================================

/**
 * Bytes per encoded sample for each output format.
 */
export const BYTES_PER_SAMPLE = {
  /** Unsigned 8-bit, 128 = silence */
  u8: 1,
  /** Signed 16-bit little-endian, 0 = silence */
  s16le: 2
} as const

export type SampleFormat = keyof typeof BYTES_PER_SAMPLE
