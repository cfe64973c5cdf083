// =============================================================================
// BlipVM - Program Lint
// =============================================================================

import type { Program, ValidationIssue } from './types'
import { DEFAULT_SAMPLE_RATE } from '../vm/constants'

export interface ValidateOptions {
  /** Output sample rate in Hz (default: 8000) */
  sampleRate?: number
}

/**
 * Lint a loaded program. Issues are warnings only; a program that loaded
 * always runs.
 */
export function validateProgram(program: Program, options: ValidateOptions = {}): ValidationIssue[] {
  const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE
  const issues: ValidationIssue[] = []
  const targeted = new Set<string>()
  let toneCount = 0

  program.instructions.forEach((instr, index) => {
    const location = { index, line: instr.line }

    if (instr.op === 'jump' || instr.op === 'fork') {
      targeted.add(instr.target)
    } else if (instr.op === 'tone') {
      toneCount++
      if (instr.frequency > sampleRate / 2) {
        issues.push({
          level: 'warning',
          code: 'FREQUENCY_ABOVE_NYQUIST',
          message: `Frequency ${instr.frequency} Hz is above ${sampleRate / 2} Hz and will alias.`,
          location
        })
      }
      if (Math.round(instr.duration * sampleRate) === 0) {
        issues.push({
          level: 'warning',
          code: 'SILENT_TONE',
          message: `Duration ${instr.duration}s is shorter than one sample and produces no output.`,
          location
        })
      }
    }
  })

  program.instructions.forEach((instr, index) => {
    if (instr.op === 'label' && !targeted.has(instr.name)) {
      issues.push({
        level: 'warning',
        code: 'UNUSED_LABEL',
        message: `Label '${instr.name}' is never jumped or forked to.`,
        location: { index, line: instr.line }
      })
    }
  })

  if (toneCount === 0) {
    issues.push({
      level: 'warning',
      code: 'EMPTY_PROGRAM',
      message: 'Program has no sin instructions and produces no audio.'
    })
  }

  return issues
}
