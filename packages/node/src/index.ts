/**
 * @blipvm/node
 *
 * Node.js stream sink, program file watcher and command line for BlipVM.
 * Requires Node.js 20+.
 */

export { StreamSink, isClosedStreamError } from './StreamSink'
export { FileWatcher } from './FileWatcher'
export type { FileWatcherOptions, ChangeHandler } from './FileWatcher'
export { main, parseCliArgs, formatError, formatWarning, UsageError, PROGRAM_NAME, USAGE } from './cli'
export type { CliIO, CliOptions } from './cli'
