// =============================================================================
// BlipVM - Program Table
// =============================================================================
// Builds the label table, checks operands and resolves every jump/fork target
// to a plain instruction index, once, before anything runs.

import type { Instruction, Program, ResolvedInstruction } from './types'
import {
  ProgramError,
  DuplicateLabelError,
  UnresolvedLabelError,
  MalformedInstructionError
} from './errors'

interface IndexedError {
  index: number
  error: ProgramError
}

/**
 * Check operand ranges of a single instruction.
 */
function checkOperands(instr: Instruction): ProgramError | null {
  switch (instr.op) {
    case 'label':
      return instr.name.length === 0
        ? new MalformedInstructionError('syntax', instr.line, 'empty label name')
        : null

    case 'tone':
      if (!Number.isFinite(instr.frequency) || !Number.isFinite(instr.duration)) {
        return new MalformedInstructionError('number', instr.line)
      }
      if (instr.frequency <= 0 || instr.duration < 0) {
        return new MalformedInstructionError(
          'range',
          instr.line,
          `sin ${instr.frequency} ${instr.duration}`
        )
      }
      return null

    case 'jump':
    case 'fork':
      if (!Number.isFinite(instr.probability)) {
        return new MalformedInstructionError('number', instr.line)
      }
      if (instr.probability < 0 || instr.probability > 1) {
        return new MalformedInstructionError(
          'probability',
          instr.line,
          String(instr.probability)
        )
      }
      return null
  }
}

/**
 * Build the label → index map, recording duplicates.
 */
function collectLabels(
  instructions: readonly Instruction[],
  errors: IndexedError[]
): Map<string, number> {
  const labels = new Map<string, number>()
  instructions.forEach((instr, index) => {
    if (instr.op !== 'label') return
    if (labels.has(instr.name)) {
      errors.push({ index, error: new DuplicateLabelError(instr.name, instr.line) })
    } else {
      labels.set(instr.name, index)
    }
  })
  return labels
}

/**
 * Run every load-time check and return all errors in instruction order.
 * An empty result means `loadProgram` will succeed.
 */
export function checkProgram(instructions: readonly Instruction[]): ProgramError[] {
  const errors: IndexedError[] = []
  const labels = collectLabels(instructions, errors)

  instructions.forEach((instr, index) => {
    const operandError = checkOperands(instr)
    if (operandError) {
      errors.push({ index, error: operandError })
    }
    if ((instr.op === 'jump' || instr.op === 'fork') && !labels.has(instr.target)) {
      errors.push({ index, error: new UnresolvedLabelError(instr.target, instr.line) })
    }
  })

  // Array.prototype.sort is stable, so errors on one instruction keep their order
  return errors.sort((a, b) => a.index - b.index).map(e => e.error)
}

/**
 * Load a list of instructions into an immutable Program.
 *
 * Loading is all-or-nothing: the first error found is thrown and no
 * Program is returned.
 *
 * @throws DuplicateLabelError if a label is defined twice
 * @throws UnresolvedLabelError if a jump/fork target is undefined
 * @throws MalformedInstructionError if an operand is out of range
 */
export function loadProgram(instructions: readonly Instruction[]): Program {
  const errors = checkProgram(instructions)
  if (errors.length > 0) {
    throw errors[0]
  }

  const labels = collectLabels(instructions, [])

  const resolveTarget = (name: string): number => {
    const index = labels.get(name)
    if (index === undefined) {
      throw new UnresolvedLabelError(name)
    }
    return index
  }

  const code = instructions.map((instr): ResolvedInstruction => {
    switch (instr.op) {
      case 'label':
        return { op: 'label' }
      case 'tone':
        return { op: 'tone', frequency: instr.frequency, duration: instr.duration }
      case 'jump':
        return { op: 'jump', target: resolveTarget(instr.target), probability: instr.probability }
      case 'fork':
        return { op: 'fork', target: resolveTarget(instr.target), probability: instr.probability }
    }
  })

  return Object.freeze({
    instructions: Object.freeze(instructions.map(instr => Object.freeze({ ...instr }))),
    labels,
    code: Object.freeze(code.map(c => Object.freeze(c)))
  })
}
