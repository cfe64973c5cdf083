// =============================================================================
// BlipVM - Scheduler Tests
// =============================================================================

import { Scheduler } from '../Scheduler'
import { MemorySink, StreamClosedError } from '../sink'
import type { SampleSink } from '../sink'
import { compileProgram } from '../../program/parse'
import { loadProgram } from '../../program/load'
import type { Program } from '../../program/types'

function compile(text: string): Program {
  const result = compileProgram(text)
  if (!result.ok) {
    throw new Error(result.errors.map(e => e.message).join('\n'))
  }
  return result.program
}

const clip = (x: number) => Math.max(-1, Math.min(1, x))
const sine = (frequency: number, i: number) => Math.sin((2 * Math.PI * frequency * i) / 8000)

/** Program that loops a 10 ms tone forever. */
const LOOP = 'lbl a\nsin 100 0.01\npjump a 1'

/** Branches and forks at random, halts with probability 1. */
const BRANCHY = [
  'lbl top',
  'sin 440 0.002',
  'pfork high 0.3',
  'pjump top 0.7',
  'lbl high',
  'sin 880 0.003'
].join('\n')

describe('Scheduler', () => {
  describe('termination', () => {
    it('emits the sum of rounded tone lengths for a straight-line program', () => {
      const scheduler = new Scheduler(compile('sin 440 0.01\nsin 220 0.0125\nsin 100 0.00005'))
      expect(scheduler.render(1000).length).toBe(80 + 100 + 0)
      expect(scheduler.halted).toBe(true)
      expect(scheduler.tick).toBe(180)
    })

    it('halts immediately for an empty program', () => {
      const scheduler = new Scheduler(loadProgram([]))
      expect(scheduler.step()).toBeNull()
      expect(scheduler.halted).toBe(true)
      expect(scheduler.tick).toBe(0)
    })

    it('halts immediately for a program of labels only', () => {
      const scheduler = new Scheduler(compile('lbl a\nlbl b\nlbl c'))
      expect(scheduler.render(10).length).toBe(0)
    })

    it('keeps returning null once halted', () => {
      const scheduler = new Scheduler(compile('sin 1000 0.001'))
      scheduler.render(8)
      expect(scheduler.step()).toBeNull()
      expect(scheduler.step()).toBeNull()
    })
  })

  describe('tones', () => {
    it('starts every tone at phase 0 and steps by 2π·f/R', () => {
      const samples = new Scheduler(compile('sin 1000 0.001')).render(100)
      expect(samples.length).toBe(8)
      samples.forEach((sample, i) => {
        expect(sample).toBeCloseTo(Math.sin((i * Math.PI) / 4), 12)
      })
      expect(samples[0]).toBe(0)
    })

    it('skips zero-length tones without emitting', () => {
      const samples = new Scheduler(compile('sin 100 0\nsin 100 0.001')).render(100)
      expect(samples.length).toBe(8)
      expect(samples[1]).toBeCloseTo(sine(100, 1), 12)
    })

    it('plays consecutive tones without a gap', () => {
      const samples = new Scheduler(compile('sin 1000 0.001\nsin 2000 0.001')).render(100)
      expect(samples.length).toBe(16)
      expect(samples[8]).toBe(0)
      expect(samples[9]).toBeCloseTo(1, 12)
    })

    it('follows the sample rate', () => {
      const samples = new Scheduler(compile('sin 1000 0.001'), { sampleRate: 16000 }).render(100)
      expect(samples.length).toBe(16)
      expect(samples[2]).toBeCloseTo(Math.sin(Math.PI / 4), 12)
    })

    it('rejects a non-positive sample rate', () => {
      expect(() => new Scheduler(loadProgram([]), { sampleRate: 0 })).toThrow(RangeError)
    })

    it('rejects a block size that is not a positive integer', () => {
      for (const blockSize of [0, -4, 1.5, NaN, Infinity]) {
        expect(() => new Scheduler(loadProgram([]), { blockSize })).toThrow(
          `Scheduler: blockSize must be a positive integer, got ${blockSize}`
        )
      }
    })
  })

  describe('jumps', () => {
    it('always takes a probability-1 jump', () => {
      for (let seed = 0; seed < 20; seed++) {
        const program = compile('pjump end 1\nsin 1000 0.001\nlbl end')
        expect(new Scheduler(program, { seed }).render(100).length).toBe(0)
      }
    })

    it('never takes a probability-0 jump', () => {
      for (let seed = 0; seed < 20; seed++) {
        const program = compile('pjump end 0\nsin 1000 0.001\nlbl end')
        expect(new Scheduler(program, { seed }).render(100).length).toBe(8)
      }
    })

    it('repeats a probability-1 loop bit-identically', () => {
      const scheduler = new Scheduler(compile(LOOP))
      const samples = scheduler.render(240)

      expect(samples.length).toBe(240)
      expect(Array.from(samples.subarray(80, 160))).toEqual(Array.from(samples.subarray(0, 80)))
      expect(Array.from(samples.subarray(160, 240))).toEqual(Array.from(samples.subarray(0, 80)))
      expect(scheduler.halted).toBe(false)
    })
  })

  describe('forks', () => {
    it('spawns exactly one thread per successful draw without moving the spawner', () => {
      const scheduler = new Scheduler(compile('pfork x 1\nsin 100 0.001\nlbl x\nsin 100 0.001'))
      scheduler.step()
      expect(scheduler.threadCount).toBe(2)
      // parent plays both tones, child only the second
      expect(scheduler.render(100).length).toBe(15)
    })

    it('never spawns on a probability-0 fork', () => {
      for (let seed = 0; seed < 20; seed++) {
        const scheduler = new Scheduler(compile('pfork x 0\nsin 100 0.001\nlbl x\nsin 100 0.001'), { seed })
        scheduler.step()
        expect(scheduler.threadCount).toBe(1)
        expect(scheduler.render(100).length).toBe(15)
      }
    })

    it('starts the child at the same tick as the spawn point', () => {
      const samples = new Scheduler(compile('pfork X 1\nsin 200 0.01\nlbl X\nsin 300 0.01')).render(1000)

      // parent: 200 Hz then falls through to 300 Hz; child: 300 Hz only
      expect(samples.length).toBe(160)
      for (let i = 0; i < 80; i++) {
        expect(samples[i]).toBeCloseTo(clip(sine(200, i) + sine(300, i)), 9)
      }
      for (let i = 80; i < 160; i++) {
        expect(samples[i]).toBeCloseTo(sine(300, i - 80), 9)
      }
    })

    it('saturates when in-phase tones exceed full scale', () => {
      const scheduler = new Scheduler(compile('pfork a 1\npfork a 1\nlbl a\nsin 2000 0.001'))
      const first = scheduler.step()
      expect(first).toBe(0)
      expect(scheduler.threadCount).toBe(3)

      const rest = scheduler.render(100)
      expect(rest.length).toBe(7)
      expect(rest[0]).toBe(1)
      expect(rest[2]).toBe(-1)
      expect(rest[4]).toBe(1)
      expect(rest[6]).toBe(-1)
    })
  })

  describe('determinism', () => {
    it('replays identically for the same seed', () => {
      const a = new Scheduler(compile(BRANCHY), { seed: 11 }).render(20000)
      const b = new Scheduler(compile(BRANCHY), { seed: 11 }).render(20000)
      expect(Array.from(a)).toEqual(Array.from(b))
    })

    it('replays identically after reset()', () => {
      const scheduler = new Scheduler(compile(BRANCHY), { seed: 3 })
      const first = scheduler.render(20000)
      scheduler.reset()
      expect(scheduler.tick).toBe(0)
      expect(Array.from(scheduler.render(20000))).toEqual(Array.from(first))
    })

    it('writes byte-identical streams for the same seed', async () => {
      const sinkA = new MemorySink()
      const sinkB = new MemorySink({ limit: 1 << 20 })
      await new Scheduler(compile(BRANCHY), { seed: 5 }).run(sinkA, { blockSize: 64 })
      await new Scheduler(compile(BRANCHY), { seed: 5 }).run(sinkB, { blockSize: 1000 })
      expect(Array.from(sinkB.bytes())).toEqual(Array.from(sinkA.bytes()))
    })
  })

  describe('samples()', () => {
    it('is lazy over an endless program', () => {
      const scheduler = new Scheduler(compile(LOOP))
      let count = 0
      for (const sample of scheduler.samples()) {
        expect(Math.abs(sample)).toBeLessThanOrEqual(1)
        if (++count === 5) break
      }
      expect(scheduler.tick).toBe(5)
    })

    it('ends when the program halts', () => {
      expect(Array.from(new Scheduler(compile('sin 1000 0.001')).samples()).length).toBe(8)
    })
  })

  describe('run()', () => {
    it('streams encoded samples until the program halts', async () => {
      const sink = new MemorySink()
      const result = await new Scheduler(compile('sin 1000 0.001')).run(sink)

      expect(result).toEqual({ samples: 8, reason: 'halted' })
      const bytes = Array.from(sink.bytes())
      expect(bytes.slice(0, 4)).toEqual([128, 218, 255, 218])
      expect(bytes.slice(5)).toEqual([37, 0, 37])
      // sin(π) lands within one ulp of zero on either side
      expect([127, 128]).toContain(bytes[4])
    })

    it('writes s16le when configured', async () => {
      const sink = new MemorySink()
      const result = await new Scheduler(compile('sin 1000 0.001'), { format: 's16le' }).run(sink)
      expect(result.samples).toBe(8)
      expect(sink.byteLength).toBe(16)
      expect(Array.from(sink.bytes().subarray(4, 6))).toEqual([255, 127])
    })

    it('writes nothing for an empty program', async () => {
      const sink = new MemorySink()
      expect(await new Scheduler(loadProgram([])).run(sink)).toEqual({ samples: 0, reason: 'halted' })
      expect(sink.byteLength).toBe(0)
    })

    it('stops cleanly when the sink closes', async () => {
      const sink = new MemorySink({ limit: 100 })
      const result = await new Scheduler(compile(LOOP)).run(sink, { blockSize: 64 })

      expect(result).toEqual({ samples: 64, reason: 'closed' })
      expect(sink.byteLength).toBe(100)
      expect(sink.isClosed).toBe(true)
    })

    it('treats StreamClosedError from the sink as closure', async () => {
      const sink: SampleSink = {
        write: () => {
          throw new StreamClosedError('consumer went away')
        }
      }
      expect(await new Scheduler(compile(LOOP)).run(sink)).toEqual({ samples: 0, reason: 'closed' })
    })

    it('propagates any other sink failure', async () => {
      const sink: SampleSink = {
        write: () => Promise.reject(new Error('disk full'))
      }
      await expect(new Scheduler(compile(LOOP)).run(sink)).rejects.toThrow('disk full')
    })

    it('stops at a block boundary when aborted', async () => {
      const controller = new AbortController()
      const sink: SampleSink = {
        write: () => {
          controller.abort()
          return true
        }
      }
      const result = await new Scheduler(compile(LOOP)).run(sink, { blockSize: 32, signal: controller.signal })
      expect(result).toEqual({ samples: 32, reason: 'aborted' })
    })

    it('rejects a bad per-run block size before writing anything', async () => {
      const sink = new MemorySink()
      const scheduler = new Scheduler(compile(LOOP))

      await expect(scheduler.run(sink, { blockSize: NaN })).rejects.toThrow(RangeError)
      await expect(scheduler.run(sink, { blockSize: 1.5 })).rejects.toThrow('got 1.5')
      expect(sink.byteLength).toBe(0)
      expect(scheduler.tick).toBe(0)
    })
  })
})
