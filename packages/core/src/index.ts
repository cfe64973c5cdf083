// =============================================================================
// @blipvm/core - Public API
// Program table, parser, decision source, scheduler, mixer, sink contract
// =============================================================================

// --- Program Domain ---
export { loadProgram, checkProgram } from './program/load'
export { parseProgram, compileProgram } from './program/parse'
export type { ParseResult, CompileResult } from './program/parse'
export { validateProgram } from './program/validation'
export type { ValidateOptions } from './program/validation'
export {
  ProgramError,
  DuplicateLabelError,
  UnresolvedLabelError,
  MalformedInstructionError
} from './program/errors'
export type { MalformedReason } from './program/errors'
export type {
  Instruction,
  LabelInstruction,
  ToneInstruction,
  JumpInstruction,
  ForkInstruction,
  Opcode,
  ResolvedInstruction,
  Program,
  ValidationIssue
} from './program/types'

// --- Decisions ---
export { SeededRandom, createRandom } from './util/random'
export type { DecisionSource } from './util/random'

// --- VM ---
export { Scheduler } from './vm/Scheduler'
export { ThreadSet } from './vm/ThreadSet'
export { mix, saturate, encodeU8, encodeS16, encodeBlock } from './vm/mixer'
export { MemorySink, StreamClosedError } from './vm/sink'
export type { SampleSink, MemorySinkOptions } from './vm/sink'
export type { SchedulerConfig, RunOptions, RunResult, StopReason } from './vm/types'
export {
  STATUS,
  BYTES_PER_SAMPLE,
  DEFAULT_SAMPLE_RATE,
  DEFAULT_SEED,
  DEFAULT_BLOCK_SIZE
} from './vm/constants'
export type { ThreadStatus, SampleFormat } from './vm/constants'
