// =============================================================================
// BlipVM - Program Load Errors
// =============================================================================

/**
 * Base class for every error detected while loading a program.
 * All of them are fatal and reported before any sample is produced.
 */
export class ProgramError extends Error {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(message)
    this.name = 'ProgramError'
  }
}

/**
 * Error thrown when a label name is defined more than once.
 */
export class DuplicateLabelError extends ProgramError {
  constructor(
    public readonly label: string,
    line?: number
  ) {
    super(`duplicate label '${label}'`, line)
    this.name = 'DuplicateLabelError'
  }
}

/**
 * Error thrown when a jump or fork names a label that does not exist.
 */
export class UnresolvedLabelError extends ProgramError {
  constructor(
    public readonly label: string,
    line?: number
  ) {
    super(`unknown label '${label}'`, line)
    this.name = 'UnresolvedLabelError'
  }
}

/**
 * What made an instruction malformed.
 * - syntax: unknown opcode or wrong token count
 * - number: operand is not a finite number
 * - probability: probability outside [0, 1]
 * - range: non-positive frequency or negative duration
 */
export type MalformedReason = 'syntax' | 'number' | 'probability' | 'range'

const REASON_MESSAGES: Record<MalformedReason, string> = {
  syntax: 'bad syntax',
  number: 'expected a number',
  probability: 'probabilities must be between 0 and 1',
  range: 'frequency must be positive and duration must not be negative'
}

/**
 * Error thrown for a line or instruction that cannot be understood.
 */
export class MalformedInstructionError extends ProgramError {
  constructor(
    public readonly reason: MalformedReason,
    line?: number,
    public readonly detail?: string
  ) {
    super(
      detail ? `${REASON_MESSAGES[reason]}: ${detail}` : REASON_MESSAGES[reason],
      line
    )
    this.name = 'MalformedInstructionError'
  }
}
