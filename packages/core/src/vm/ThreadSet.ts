// =============================================================================
// BlipVM - Thread Set
// =============================================================================
// Arena of virtual threads, struct-of-arrays over typed arrays. Threads are
// addressed by small stable integer ids, never by reference, so the scheduler
// can spawn while it is walking the set.

import type { DecisionSource } from '../util/random'
import { STATUS, TAU, DEFAULT_THREAD_CAPACITY } from './constants'
import type { ThreadStatus } from './constants'

/**
 * Mutable collection of live threads, owned by a single Scheduler.
 *
 * Slot lifecycle:
 * - `spawn()` takes a slot from the free list (or a fresh one) as READY
 * - `halt()` marks it HALTED; it stays in `live` until `compact()`
 * - `compact()` drops halted ids from `live` and returns their slots
 *
 * Deferring slot reuse to `compact()` keeps an id from appearing twice in
 * `live` during one traversal.
 */
export class ThreadSet {
  private capacity: number
  private nextSlot = 0

  // Columns
  private status: Uint8Array
  private pc: Int32Array
  private phase: Float64Array
  private phaseStep: Float64Array
  private remaining: Float64Array
  private decisions: Array<DecisionSource | null>

  private freeSlots: number[] = []
  private order: number[] = []

  constructor(capacity: number = DEFAULT_THREAD_CAPACITY) {
    this.capacity = Math.max(1, capacity)
    this.status = new Uint8Array(this.capacity)
    this.pc = new Int32Array(this.capacity)
    this.phase = new Float64Array(this.capacity)
    this.phaseStep = new Float64Array(this.capacity)
    this.remaining = new Float64Array(this.capacity)
    this.decisions = new Array<DecisionSource | null>(this.capacity).fill(null)
  }

  /**
   * Live thread ids in creation order. Ids spawned during a traversal are
   * appended, so an index-based loop that re-reads `length` visits them.
   */
  get live(): readonly number[] {
    return this.order
  }

  /** Number of ids in `live` (including halted ones not yet compacted). */
  get size(): number {
    return this.order.length
  }

  /**
   * Create a READY thread at `pc` and return its id.
   */
  spawn(pc: number, decisions: DecisionSource): number {
    const id = this.allocate()
    this.status[id] = STATUS.READY
    this.pc[id] = pc
    this.phase[id] = 0
    this.phaseStep[id] = 0
    this.remaining[id] = 0
    this.decisions[id] = decisions
    this.order.push(id)
    return id
  }

  /**
   * Mark a thread HALTED. Its slot is recycled on the next `compact()`.
   */
  halt(id: number): void {
    this.status[id] = STATUS.HALTED
    this.decisions[id] = null
  }

  /**
   * Remove halted threads from the live order and free their slots.
   */
  compact(): void {
    let write = 0
    for (let read = 0; read < this.order.length; read++) {
      const id = this.order[read]
      if (this.status[id] === STATUS.HALTED) {
        this.freeSlots.push(id)
      } else {
        this.order[write++] = id
      }
    }
    this.order.length = write
  }

  /**
   * Start a tone on a thread: phase 0, `samples` ticks to go.
   */
  play(id: number, phaseStep: number, samples: number): void {
    this.status[id] = STATUS.PLAYING
    this.phase[id] = 0
    this.phaseStep[id] = phaseStep
    this.remaining[id] = samples
  }

  /**
   * Advance every PLAYING thread by one sample. Threads whose tone ends
   * become READY at the program counter recorded when the tone started.
   */
  advance(): void {
    for (const id of this.order) {
      if (this.status[id] !== STATUS.PLAYING) continue
      this.phase[id] = (this.phase[id] + this.phaseStep[id]) % TAU
      if (--this.remaining[id] <= 0) {
        this.status[id] = STATUS.READY
      }
    }
  }

  // ===========================================================================
  // Column Access
  // ===========================================================================

  statusOf(id: number): ThreadStatus {
    switch (this.status[id]) {
      case STATUS.READY: return STATUS.READY
      case STATUS.PLAYING: return STATUS.PLAYING
      default: return STATUS.HALTED
    }
  }

  pcOf(id: number): number {
    return this.pc[id]
  }

  setPc(id: number, pc: number): void {
    this.pc[id] = pc
  }

  phaseOf(id: number): number {
    return this.phase[id]
  }

  remainingOf(id: number): number {
    return this.remaining[id]
  }

  /**
   * Decision source owned by a live thread.
   * @throws Error if the thread has halted
   */
  decisionsOf(id: number): DecisionSource {
    const source = this.decisions[id]
    if (!source) {
      throw new Error(`ThreadSet: thread ${id} has no decision source (halted)`)
    }
    return source
  }

  // ===========================================================================
  // Allocation
  // ===========================================================================

  private allocate(): number {
    const recycled = this.freeSlots.pop()
    if (recycled !== undefined) return recycled
    if (this.nextSlot === this.capacity) {
      this.grow(this.capacity * 2)
    }
    return this.nextSlot++
  }

  private grow(capacity: number): void {
    const status = new Uint8Array(capacity)
    status.set(this.status)
    const pc = new Int32Array(capacity)
    pc.set(this.pc)
    const phase = new Float64Array(capacity)
    phase.set(this.phase)
    const phaseStep = new Float64Array(capacity)
    phaseStep.set(this.phaseStep)
    const remaining = new Float64Array(capacity)
    remaining.set(this.remaining)

    this.status = status
    this.pc = pc
    this.phase = phase
    this.phaseStep = phaseStep
    this.remaining = remaining
    for (let i = this.capacity; i < capacity; i++) {
      this.decisions.push(null)
    }
    this.capacity = capacity
  }
}
