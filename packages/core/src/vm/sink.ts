// =============================================================================
// BlipVM - Sample Sinks
// =============================================================================

/**
 * Destination for encoded PCM blocks.
 *
 * `write` resolves `false` (or throws StreamClosedError) once the consumer
 * is gone. The scheduler treats both as a clean stop, never as a failure.
 */
export interface SampleSink {
  write(block: Uint8Array): boolean | Promise<boolean>
}

/**
 * Error signalling that the output sink no longer accepts data.
 */
export class StreamClosedError extends Error {
  constructor(reason: string = 'stream closed') {
    super(`Sample sink: ${reason}`)
    this.name = 'StreamClosedError'
  }
}

/**
 * MemorySink configuration options.
 */
export interface MemorySinkOptions {
  /** Close after accepting this many bytes (default: unlimited) */
  limit?: number
}

/**
 * Sink that keeps every byte in memory.
 *
 * With `limit`, the block that would cross the limit is truncated to fit
 * and the sink closes, like a consumer that disconnects mid-stream.
 */
export class MemorySink implements SampleSink {
  private chunks: Uint8Array[] = []
  private length = 0
  private closed = false
  private readonly limit: number

  constructor(options: MemorySinkOptions = {}) {
    this.limit = options.limit ?? Infinity
  }

  write(block: Uint8Array): boolean {
    if (this.closed) return false

    const room = this.limit - this.length
    if (block.length >= room) {
      this.push(block.subarray(0, room))
      this.closed = true
      return block.length === room
    }

    this.push(block)
    return true
  }

  /** Whether the sink has stopped accepting data. */
  get isClosed(): boolean {
    return this.closed
  }

  /** Number of bytes accepted so far. */
  get byteLength(): number {
    return this.length
  }

  /**
   * Everything written so far as one buffer.
   */
  bytes(): Uint8Array {
    const out = new Uint8Array(this.length)
    let offset = 0
    for (const chunk of this.chunks) {
      out.set(chunk, offset)
      offset += chunk.length
    }
    return out
  }

  private push(block: Uint8Array): void {
    if (block.length === 0) return
    this.chunks.push(block.slice())
    this.length += block.length
  }
}
