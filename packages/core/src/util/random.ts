/**
 * Seeded random number generator for reproducible decisions.
 * Uses the mulberry32 algorithm.
 */

/**
 * A lazy, infinite sequence of uniform draws in [0, 1).
 */
export interface DecisionSource {
  /** Next draw in [0, 1). Each value is returned once. */
  next(): number
  /** Create an independent source seeded from this one's next draw. */
  split(): DecisionSource
}

export class SeededRandom implements DecisionSource {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0 // Ensure unsigned 32-bit
  }

  /**
   * Get next random float in [0, 1).
   */
  next(): number {
    return this.nextUint32() / 4294967296
  }

  /**
   * Get next random unsigned 32-bit integer.
   */
  nextUint32(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0)
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return (t ^ (t >>> 14)) >>> 0
  }

  /**
   * Split off a child generator. Consumes exactly one draw from this one.
   */
  split(): SeededRandom {
    return new SeededRandom(this.nextUint32() ^ 0x5deece66)
  }
}

/**
 * Create a seeded random generator.
 * If no seed provided, uses the current time.
 */
export function createRandom(seed?: number): SeededRandom {
  return new SeededRandom(seed ?? Date.now())
}
