// =============================================================================
// BlipVM - Mixer
// =============================================================================
// Sums every sounding thread into one sample and hard-clips the result.
// There is no automatic gain: two full-scale tones in phase clip audibly.

import type { ThreadSet } from './ThreadSet'
import { STATUS, BYTES_PER_SAMPLE } from './constants'
import type { SampleFormat } from './constants'

/**
 * Clamp an amplitude to [-1, 1].
 */
export function saturate(amplitude: number): number {
  if (amplitude > 1) return 1
  if (amplitude < -1) return -1
  return amplitude
}

/**
 * Mix one sample: the saturated sum of sin(phase) over every PLAYING
 * thread. No PLAYING threads gives silence (0).
 */
export function mix(threads: ThreadSet): number {
  let sum = 0
  for (const id of threads.live) {
    if (threads.statusOf(id) === STATUS.PLAYING) {
      sum += Math.sin(threads.phaseOf(id))
    }
  }
  return saturate(sum)
}

// =============================================================================
// PCM Encoding
// =============================================================================

/**
 * Unsigned 8-bit: -1 → 0, 0 → 128, 1 → 255.
 */
export function encodeU8(amplitude: number): number {
  return Math.round(127.5 * (1 + saturate(amplitude)))
}

/**
 * Signed 16-bit: -1 → -32767, 0 → 0, 1 → 32767.
 */
export function encodeS16(amplitude: number): number {
  return Math.round(32767 * saturate(amplitude))
}

/**
 * Encode a block of amplitudes as raw headerless PCM.
 */
export function encodeBlock(samples: ArrayLike<number>, format: SampleFormat): Uint8Array {
  const bytes = new Uint8Array(samples.length * BYTES_PER_SAMPLE[format])

  if (format === 'u8') {
    for (let i = 0; i < samples.length; i++) {
      bytes[i] = encodeU8(samples[i])
    }
    return bytes
  }

  const view = new DataView(bytes.buffer)
  for (let i = 0; i < samples.length; i++) {
    view.setInt16(i * 2, encodeS16(samples[i]), true)
  }
  return bytes
}
