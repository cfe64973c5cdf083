// =============================================================================
// BlipVM - Program Types
// =============================================================================

/**
 * Instruction - Discriminated union for the four opcodes.
 * `line` is the 1-based source line when the instruction came from text.
 */
export type Instruction =
  | LabelInstruction
  | ToneInstruction
  | JumpInstruction
  | ForkInstruction

export interface LabelInstruction {
  op: 'label'
  name: string
  line?: number
}

export interface ToneInstruction {
  op: 'tone'
  frequency: number  // Hz, > 0
  duration: number   // seconds, >= 0
  line?: number
}

export interface JumpInstruction {
  op: 'jump'
  target: string
  probability: number  // [0, 1]
  line?: number
}

export interface ForkInstruction {
  op: 'fork'
  target: string
  probability: number  // [0, 1]
  line?: number
}

export type Opcode = Instruction['op']

/**
 * Instruction with its branch target resolved to an index into the program.
 * This is what the scheduler executes.
 */
export type ResolvedInstruction =
  | { op: 'label' }
  | { op: 'tone'; frequency: number; duration: number }
  | { op: 'jump'; target: number; probability: number }
  | { op: 'fork'; target: number; probability: number }

/**
 * Validated, immutable program shared by every thread.
 */
export interface Program {
  readonly instructions: readonly Instruction[]
  readonly labels: ReadonlyMap<string, number>
  readonly code: readonly ResolvedInstruction[]
}

/**
 * Non-fatal lint finding.
 */
export interface ValidationIssue {
  level: 'warning'
  code: 'EMPTY_PROGRAM' | 'FREQUENCY_ABOVE_NYQUIST' | 'SILENT_TONE' | 'UNUSED_LABEL'
  message: string
  location?: { index: number; line?: number }
}
