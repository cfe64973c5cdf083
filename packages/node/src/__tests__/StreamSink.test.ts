/**
 * @blipvm/node - StreamSink Tests
 */

import { PassThrough, Writable } from 'stream'
import { compileProgram, Scheduler } from '@blipvm/core'
import { StreamSink, isClosedStreamError } from '../StreamSink'

/**
 * Writable whose every write fails with the given error.
 */
function failingStream(error: Error): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback(error)
    }
  })
}

function errorWithCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code })
}

describe('StreamSink', () => {
  it('writes blocks through to the stream', async () => {
    const stream = new PassThrough()
    const sink = new StreamSink(stream)

    await expect(sink.write(Uint8Array.of(1, 2, 3))).resolves.toBe(true)
    expect(Array.from(stream.read())).toEqual([1, 2, 3])
  })

  it('waits for drain when the stream is backed up', async () => {
    const stream = new PassThrough({ highWaterMark: 4 })
    const sink = new StreamSink(stream)

    const pending = sink.write(new Uint8Array(64))
    stream.resume()
    await expect(pending).resolves.toBe(true)
  })

  it('reports closure once the stream is destroyed', async () => {
    const stream = new PassThrough()
    const sink = new StreamSink(stream)
    stream.destroy()

    await expect(sink.write(Uint8Array.of(1))).resolves.toBe(false)
    expect(sink.isClosed).toBe(true)
  })

  it('treats EPIPE as the reader going away', async () => {
    const sink = new StreamSink(failingStream(errorWithCode('write EPIPE', 'EPIPE')))

    await sink.write(Uint8Array.of(1))
    await expect(sink.write(Uint8Array.of(2))).resolves.toBe(false)
    expect(sink.isClosed).toBe(true)
  })

  it('rejects on other stream errors', async () => {
    const sink = new StreamSink(failingStream(new Error('disk on fire')))
    await expect(sink.write(Uint8Array.of(1))).rejects.toThrow('disk on fire')
  })

  it('ends an endless program cleanly when stdout breaks', async () => {
    const result = compileProgram('lbl a\nsin 100 0.01\npjump a 1')
    if (!result.ok) throw new Error('program should compile')

    const sink = new StreamSink(failingStream(errorWithCode('write EPIPE', 'EPIPE')))
    const run = await new Scheduler(result.program).run(sink)
    expect(run.reason).toBe('closed')
  })
})

describe('isClosedStreamError', () => {
  it('recognises reader-gone error codes only', () => {
    expect(isClosedStreamError(errorWithCode('x', 'EPIPE'))).toBe(true)
    expect(isClosedStreamError(errorWithCode('x', 'ERR_STREAM_DESTROYED'))).toBe(true)
    expect(isClosedStreamError(errorWithCode('x', 'ENOSPC'))).toBe(false)
    expect(isClosedStreamError(new Error('no code'))).toBe(false)
  })
})
