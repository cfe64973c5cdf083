/**
 * @blipvm/node - StreamSink
 *
 * SampleSink over a Node.js Writable (usually process.stdout). A consumer
 * that goes away (EPIPE, closed or destroyed stream) ends playback cleanly;
 * any other stream error is rethrown from the next write.
 */

import type { Writable } from 'stream'
import type { SampleSink } from '@blipvm/core'

const CLOSED_CODES = new Set(['EPIPE', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END'])

function hasCode(error: Error): error is Error & { code: string } {
  return 'code' in error && typeof error.code === 'string'
}

/**
 * Whether an error means the reader has gone rather than a real failure.
 */
export function isClosedStreamError(error: Error): boolean {
  return hasCode(error) && CLOSED_CODES.has(error.code)
}

export class StreamSink implements SampleSink {
  private closed = false
  private failure: Error | null = null

  constructor(private readonly stream: Writable) {
    stream.on('error', (error: Error) => {
      if (isClosedStreamError(error)) {
        this.closed = true
      } else {
        this.failure = error
      }
    })
    stream.on('close', () => {
      this.closed = true
    })
  }

  /** Whether the underlying stream stopped accepting data. */
  get isClosed(): boolean {
    return this.closed || this.stream.destroyed || this.stream.writableEnded
  }

  /**
   * Write one block, waiting for 'drain' when the stream is backed up.
   * Resolves false once the stream is closed.
   */
  async write(block: Uint8Array): Promise<boolean> {
    if (this.failure) throw this.failure
    if (this.isClosed) return false

    if (this.stream.write(block)) {
      return true
    }
    return this.waitForDrain()
  }

  private waitForDrain(): Promise<boolean> {
    const stream = this.stream
    return new Promise<boolean>((resolve, reject) => {
      const cleanup = (): void => {
        stream.off('drain', onDrain)
        stream.off('close', onClose)
        stream.off('error', onError)
      }
      const onDrain = (): void => {
        cleanup()
        resolve(true)
      }
      const onClose = (): void => {
        cleanup()
        resolve(false)
      }
      const onError = (error: Error): void => {
        cleanup()
        if (isClosedStreamError(error)) {
          resolve(false)
        } else {
          reject(error)
        }
      }
      stream.on('drain', onDrain)
      stream.on('close', onClose)
      stream.on('error', onError)
    })
  }
}
