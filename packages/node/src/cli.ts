/**
 * @blipvm/node - Command line
 *
 *   blipvm [file] [--rate 8000] [--format u8|s16le] [--seed 0] [--watch] [--quiet]
 *
 * Reads a whole program (file or stdin), then streams raw PCM to stdout
 * until every thread halts or stdout closes:
 *
 *   blipvm song.blip | aplay
 *   blipvm --format s16le --rate 16000 song.blip | aplay -f S16_LE -r 16000
 */

import * as fs from 'fs'
import * as path from 'path'
import type { Readable, Writable } from 'stream'
import { Command, CommanderError } from 'commander'
import {
  compileProgram,
  validateProgram,
  Scheduler,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_SEED
} from '@blipvm/core'
import type { Program, ProgramError, SchedulerConfig, SampleFormat, ValidationIssue } from '@blipvm/core'
import { StreamSink, isClosedStreamError } from './StreamSink'
import { FileWatcher } from './FileWatcher'

export const PROGRAM_NAME = 'blipvm'

export const USAGE = `usage: ${PROGRAM_NAME} [file] [options]

Compiles a blip program and writes raw mono PCM to stdout.
Reads the program from stdin when no file is given.

options:
  -r, --rate <hz>       sample rate (default: ${DEFAULT_SAMPLE_RATE})
  -f, --format <fmt>    u8 or s16le (default: u8)
  -s, --seed <n>        decision seed (default: ${DEFAULT_SEED})
  -w, --watch           restart playback whenever the file changes
  -q, --quiet           do not print warnings
  -h, --help            show this help
`

/**
 * Standard streams, injectable for tests.
 */
export interface CliIO {
  stdin: Readable
  stdout: Writable
  stderr: Writable
}

export interface CliOptions {
  file: string | null
  config: Required<Pick<SchedulerConfig, 'sampleRate' | 'seed' | 'format'>>
  watch: boolean
  quiet: boolean
  help: boolean
}

/**
 * Error for invalid command line usage (exit status 2).
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

// =============================================================================
// Argument Parsing
// =============================================================================

function isSampleFormat(value: string): value is SampleFormat {
  return value === 'u8' || value === 's16le'
}

function integerOption(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined) return fallback
  const value = Number(raw)
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value < min) {
    throw new UsageError(`--${name} expects an integer >= ${min}, got '${raw}'`)
  }
  return value
}

type RawOptions = {
  rate?: string
  format?: string
  seed?: string
  watch?: boolean
  quiet?: boolean
  help?: boolean
}

function createCommand(): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .argument('[file]')
    .option('-r, --rate <hz>')
    .option('-f, --format <fmt>')
    .option('-s, --seed <n>')
    .option('-w, --watch')
    .option('-q, --quiet')
    .option('-h, --help')
    .helpOption(false)
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
      outputError: () => undefined
    })
}

/**
 * Parse argv (without the node executable and script path).
 *
 * @throws UsageError on unknown flags or bad values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const command = createCommand()
  try {
    command.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new UsageError(error.message.replace(/^error: /, ''))
    }
    throw error
  }
  const values = command.opts<RawOptions>()
  const positionals = command.args

  if (positionals.length > 1) {
    throw new UsageError(`expected at most one program file, got ${positionals.length}`)
  }

  const format = values.format ?? 'u8'
  if (!isSampleFormat(format)) {
    throw new UsageError(`--format must be u8 or s16le, got '${format}'`)
  }

  const file = positionals[0] ?? null
  const watch = values.watch ?? false
  if (watch && file === null) {
    throw new UsageError('--watch needs a program file')
  }

  return {
    file,
    config: {
      sampleRate: integerOption('rate', values.rate, DEFAULT_SAMPLE_RATE, 1),
      seed: integerOption('seed', values.seed, DEFAULT_SEED, 0),
      format
    },
    watch,
    quiet: values.quiet ?? false,
    help: values.help ?? false
  }
}

// =============================================================================
// Diagnostics
// =============================================================================

export function formatError(error: ProgramError): string {
  const where = error.line !== undefined ? `${PROGRAM_NAME}:${error.line}` : PROGRAM_NAME
  return `${where} error: ${error.message}`
}

export function formatWarning(issue: ValidationIssue): string {
  const line = issue.location?.line
  const where = line !== undefined ? `${PROGRAM_NAME}:${line}` : PROGRAM_NAME
  return `${where} warning: ${issue.message}`
}

function reportErrors(errors: ProgramError[], stderr: Writable): void {
  for (const error of errors) {
    stderr.write(formatError(error) + '\n')
  }
  const plural = errors.length === 1 ? 'error' : 'errors'
  stderr.write(`\nerror: aborting due to ${errors.length} previous ${plural}.\n`)
}

/**
 * Compile program text, printing diagnostics. Returns null on failure.
 */
function build(code: string, options: CliOptions, stderr: Writable): Program | null {
  const result = compileProgram(code)
  if (!result.ok) {
    reportErrors(result.errors, stderr)
    return null
  }
  if (!options.quiet) {
    for (const issue of validateProgram(result.program, options.config)) {
      stderr.write(formatWarning(issue) + '\n')
    }
  }
  return result.program
}

// =============================================================================
// Entry Point
// =============================================================================

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }
  return Buffer.concat(chunks).toString('utf-8')
}

/**
 * Run the command line. Resolves to the process exit status:
 * 0 on success (including a closed stdout), 1 on program errors,
 * 2 on usage errors.
 */
export async function main(argv: string[], io: CliIO): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (error) {
    if (!(error instanceof UsageError)) throw error
    io.stderr.write(`${PROGRAM_NAME}: ${error.message}\n\n${USAGE}`)
    return 2
  }

  if (options.help) {
    io.stdout.write(USAGE)
    return 0
  }

  let code: string
  try {
    code = options.file !== null
      ? await fs.promises.readFile(options.file, 'utf-8')
      : await readAll(io.stdin)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    io.stderr.write(`${PROGRAM_NAME}: cannot read program: ${message}\n`)
    return 1
  }

  const program = build(code, options, io.stderr)
  if (!program) {
    return 1
  }

  const sink = new StreamSink(io.stdout)
  if (options.watch && options.file !== null) {
    return watch(options.file, program, options, sink, io)
  }

  await new Scheduler(program, options.config).run(sink)
  return 0
}

/**
 * Play `program`, restarting with the new program each time the file is
 * saved. A save that fails to compile leaves the current program playing.
 *
 * Resolves 0 once stdout closes, whether or not a program is playing.
 * Rejects on any other stdout failure. The watcher is stopped either way.
 */
function watch(
  file: string,
  program: Program,
  options: CliOptions,
  sink: StreamSink,
  io: CliIO
): Promise<number> {
  const watcher = new FileWatcher({ extensions: [path.extname(file)] })
  const stdout = io.stdout
  let current: AbortController | null = null
  let done = false

  return new Promise<number>((resolve, reject) => {
    const settle = (outcome: () => void): void => {
      if (done) return
      done = true
      current?.abort()
      stdout.off('close', onClose)
      stdout.off('error', onError)
      watcher.stop().then(outcome, reject)
    }
    const finish = (): void => settle(() => resolve(0))
    const fail = (error: unknown): void => settle(() => reject(error))

    const onClose = (): void => finish()
    const onError = (error: Error): void => {
      if (isClosedStreamError(error)) {
        finish()
      } else {
        fail(error)
      }
    }

    const play = (next: Program): void => {
      current?.abort()
      const controller = new AbortController()
      current = controller
      new Scheduler(next, options.config)
        .run(sink, { signal: controller.signal })
        .then(result => {
          if (result.reason === 'closed') finish()
        })
        .catch(fail)
    }

    stdout.on('close', onClose)
    stdout.on('error', onError)
    watcher.on('change', code => {
      if (done) return
      const next = build(code, options, io.stderr)
      if (next) {
        console.warn(`[${PROGRAM_NAME}] reloaded ${file}`)
        play(next)
      } else {
        console.warn(`[${PROGRAM_NAME}] keeping previous program`)
      }
    })
    watcher.add(file)
    watcher.start()

    if (sink.isClosed) {
      finish()
    } else {
      play(program)
    }
  })
}
