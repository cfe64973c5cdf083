// =============================================================================
// BlipVM - Program Text Parser
// =============================================================================
// One instruction per line, whitespace-separated tokens:
//
//   lbl <name>
//   sin <frequency> <duration>
//   pjump <name> <probability>
//   pfork <name> <probability>
//
// Blank lines and lines starting with '#' are skipped.

import type { Instruction, Program } from './types'
import { ProgramError, MalformedInstructionError } from './errors'
import { checkProgram, loadProgram } from './load'

export interface ParseResult {
  instructions: Instruction[]
  errors: MalformedInstructionError[]
}

export type CompileResult =
  | { ok: true; program: Program }
  | { ok: false; errors: ProgramError[] }

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Parse a decimal float token. Hex, 'Infinity' and 'NaN' are rejected.
 */
function parseNumber(token: string): number | null {
  if (!DECIMAL.test(token)) return null
  const value = Number(token)
  return Number.isFinite(value) ? value : null
}

/**
 * Parse one non-blank line into an instruction.
 *
 * @throws MalformedInstructionError on unknown opcode, wrong arity or a
 * non-numeric operand
 */
function parseLine(tokens: string[], line: number): Instruction {
  const [opcode, ...args] = tokens

  const number = (token: string): number => {
    const value = parseNumber(token)
    if (value === null) {
      throw new MalformedInstructionError('number', line, `'${token}'`)
    }
    return value
  }

  switch (opcode) {
    case 'lbl':
      if (args.length === 1) {
        return { op: 'label', name: args[0], line }
      }
      break

    case 'sin':
      if (args.length === 2) {
        return { op: 'tone', frequency: number(args[0]), duration: number(args[1]), line }
      }
      break

    case 'pjump':
    case 'pfork':
      if (args.length === 2) {
        return {
          op: opcode === 'pjump' ? 'jump' : 'fork',
          target: args[0],
          probability: number(args[1]),
          line
        }
      }
      break
  }

  throw new MalformedInstructionError('syntax', line, tokens.join(' '))
}

/**
 * Parse program text. Every malformed line is reported; well-formed lines
 * are returned in order even when others fail.
 *
 * Operand ranges, duplicate labels and unknown targets are not checked
 * here; see `checkProgram`.
 */
export function parseProgram(text: string): ParseResult {
  const instructions: Instruction[] = []
  const errors: MalformedInstructionError[] = []

  text.split(/\r?\n/).forEach((raw, i) => {
    const trimmed = raw.trim()
    if (trimmed === '' || trimmed.startsWith('#')) return

    try {
      instructions.push(parseLine(trimmed.split(/\s+/), i + 1))
    } catch (error) {
      if (!(error instanceof MalformedInstructionError)) throw error
      errors.push(error)
    }
  })

  return { instructions, errors }
}

/**
 * Parse and load program text, collecting every diagnostic.
 *
 * @example
 * ```typescript
 * const result = compileProgram('lbl a\nsin 440 0.5\npjump a 0.5')
 * if (result.ok) {
 *   new Scheduler(result.program).render(8000)
 * }
 * ```
 */
export function compileProgram(text: string): CompileResult {
  const parsed = parseProgram(text)
  const errors: ProgramError[] = [
    ...parsed.errors,
    ...checkProgram(parsed.instructions)
  ].sort((a, b) => (a.line ?? 0) - (b.line ?? 0))

  if (errors.length > 0) {
    return { ok: false, errors }
  }
  return { ok: true, program: loadProgram(parsed.instructions) }
}
