// =============================================================================
// BlipVM - Scheduler
// =============================================================================

import type { Program } from '../program/types'
import { SeededRandom } from '../util/random'
import { ThreadSet } from './ThreadSet'
import { mix, encodeBlock } from './mixer'
import { StreamClosedError } from './sink'
import type { SampleSink } from './sink'
import type { SchedulerConfig, RunOptions, RunResult } from './types'
import {
  STATUS,
  TAU,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_SEED,
  DEFAULT_BLOCK_SIZE
} from './constants'

function checkBlockSize(blockSize: number): void {
  if (!Number.isSafeInteger(blockSize) || blockSize < 1) {
    throw new RangeError(`Scheduler: blockSize must be a positive integer, got ${blockSize}`)
  }
}

/**
 * Drives every virtual thread of a program forward one sample at a time.
 *
 * Each tick has two phases:
 * 1. Resolve: every READY thread executes zero-duration instructions
 *    (labels, jumps, forks, empty tones) until it is PLAYING or halted.
 *    Threads forked during the pass are resolved in the same pass.
 * 2. Mix + advance: PLAYING threads are summed into one sample, then every
 *    phase moves on by one sample.
 *
 * A run ends when no thread is left. A program that loops without ever
 * halting produces an endless stream, and one that loops without ever
 * reaching a tone spins in the resolve phase forever.
 *
 * @example
 * ```typescript
 * const program = loadProgram([
 *   { op: 'label', name: 'a' },
 *   { op: 'tone', frequency: 440, duration: 0.25 },
 *   { op: 'jump', target: 'a', probability: 0.5 }
 * ])
 * const scheduler = new Scheduler(program, { seed: 7 })
 * await scheduler.run(new MemorySink())
 * ```
 */
export class Scheduler {
  private readonly config: Required<SchedulerConfig>
  private threads: ThreadSet
  private clock = 0

  constructor(
    private readonly program: Program,
    config: SchedulerConfig = {}
  ) {
    this.config = {
      sampleRate: config.sampleRate ?? DEFAULT_SAMPLE_RATE,
      seed: config.seed ?? DEFAULT_SEED,
      format: config.format ?? 'u8',
      blockSize: config.blockSize ?? DEFAULT_BLOCK_SIZE
    }
    if (!(this.config.sampleRate > 0)) {
      throw new RangeError(`Scheduler: sampleRate must be positive, got ${this.config.sampleRate}`)
    }
    checkBlockSize(this.config.blockSize)
    this.threads = this.createThreads()
  }

  /** Samples emitted so far. */
  get tick(): number {
    return this.clock
  }

  /** Live threads after the last completed tick. */
  get threadCount(): number {
    return this.threads.size
  }

  /** True once every thread has halted. */
  get halted(): boolean {
    return this.threads.size === 0
  }

  get sampleRate(): number {
    return this.config.sampleRate
  }

  /**
   * Rewind to tick 0 with a fresh root thread. Replays bit-exactly.
   */
  reset(): void {
    this.threads = this.createThreads()
    this.clock = 0
  }

  /**
   * Produce the next sample, or `null` once every thread has halted.
   */
  step(): number | null {
    this.resolve()
    if (this.threads.size === 0) {
      return null
    }
    const sample = mix(this.threads)
    this.threads.advance()
    this.clock++
    return sample
  }

  /**
   * Lazy, possibly infinite sample stream.
   */
  *samples(): Generator<number, void, undefined> {
    let sample = this.step()
    while (sample !== null) {
      yield sample
      sample = this.step()
    }
  }

  /**
   * Render up to `maxSamples` samples, fewer if the program halts first.
   */
  render(maxSamples: number): Float64Array {
    const out = new Float64Array(maxSamples)
    let count = 0
    while (count < maxSamples) {
      const sample = this.step()
      if (sample === null) break
      out[count++] = sample
    }
    return count === maxSamples ? out : out.slice(0, count)
  }

  /**
   * Stream encoded PCM to a sink until the program halts or the sink closes.
   *
   * Sink closure ends the run normally with reason 'closed', and an aborted
   * `signal` with reason 'aborted'. Any other error from the sink propagates.
   */
  async run(sink: SampleSink, options: RunOptions = {}): Promise<RunResult> {
    const format = options.format ?? this.config.format
    const blockSize = options.blockSize ?? this.config.blockSize
    checkBlockSize(blockSize)
    const block = new Float64Array(blockSize)
    let accepted = 0

    for (;;) {
      if (options.signal?.aborted) {
        return { samples: accepted, reason: 'aborted' }
      }

      let count = 0
      while (count < blockSize) {
        const sample = this.step()
        if (sample === null) break
        block[count++] = sample
      }

      if (count > 0) {
        if (options.signal?.aborted) {
          return { samples: accepted, reason: 'aborted' }
        }
        const open = await this.write(sink, encodeBlock(block.subarray(0, count), format))
        if (!open) {
          return { samples: accepted, reason: 'closed' }
        }
        accepted += count
      }

      if (count < blockSize) {
        return { samples: accepted, reason: 'halted' }
      }
    }
  }

  // ===========================================================================
  // Resolve Phase
  // ===========================================================================

  /**
   * Resolve every READY thread to a fixed point, then drop halted ones.
   */
  private resolve(): void {
    const live = this.threads.live
    // live grows while we walk it when a fork succeeds
    for (let i = 0; i < live.length; i++) {
      this.resolveThread(live[i])
    }
    this.threads.compact()
  }

  private resolveThread(id: number): void {
    const threads = this.threads
    const code = this.program.code
    const sampleRate = this.config.sampleRate

    while (threads.statusOf(id) === STATUS.READY) {
      const pc = threads.pcOf(id)
      if (pc >= code.length) {
        threads.halt(id)
        return
      }

      const instr = code[pc]
      switch (instr.op) {
        case 'label':
          threads.setPc(id, pc + 1)
          break

        case 'tone': {
          const samples = Math.round(instr.duration * sampleRate)
          threads.setPc(id, pc + 1)
          if (samples > 0) {
            threads.play(id, (TAU * instr.frequency) / sampleRate, samples)
          }
          break
        }

        case 'jump': {
          const taken = threads.decisionsOf(id).next() < instr.probability
          threads.setPc(id, taken ? instr.target : pc + 1)
          break
        }

        case 'fork': {
          const decisions = threads.decisionsOf(id)
          if (decisions.next() < instr.probability) {
            threads.spawn(instr.target, decisions.split())
          }
          threads.setPc(id, pc + 1)
          break
        }
      }
    }
  }

  private createThreads(): ThreadSet {
    const threads = new ThreadSet()
    threads.spawn(0, new SeededRandom(this.config.seed))
    return threads
  }

  private async write(sink: SampleSink, bytes: Uint8Array): Promise<boolean> {
    try {
      return await sink.write(bytes)
    } catch (error) {
      if (error instanceof StreamClosedError) {
        return false
      }
      throw error
    }
  }
}
