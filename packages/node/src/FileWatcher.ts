/**
 * @blipvm/node - FileWatcher
 *
 * Program file watcher using chokidar. Used by `blipvm --watch` to restart
 * playback when the program file is saved.
 *
 * BEHAVIOR: When a file changes, reads the file contents and passes
 * the program text to registered handlers (not the file path).
 */

import * as fs from 'fs'
import * as path from 'path'
import * as chokidar from 'chokidar'

// =============================================================================
// Types
// =============================================================================

/**
 * FileWatcher configuration options.
 */
export interface FileWatcherOptions {
  /** Debounce delay in milliseconds (default: 150) */
  debounce?: number

  /** File extensions to watch (default: ['.blip', '.txt']) */
  extensions?: string[]

  /** Patterns to ignore (glob patterns) */
  ignore?: string[]

  /** Whether to read file on initial add (default: false) */
  readOnAdd?: boolean
}

export type ChangeHandler = (code: string, filePath: string) => void

// =============================================================================
// Debounce Utility
// =============================================================================

interface Debounced {
  (): void
  cancel(): void
}

/**
 * Create a debounced callback.
 */
function debounce(fn: () => void, delay: number): Debounced {
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const debounced = (): void => {
    if (timeoutId) {
      clearTimeout(timeoutId)
    }
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn()
    }, delay)
  }

  debounced.cancel = (): void => {
    if (timeoutId) {
      clearTimeout(timeoutId)
      timeoutId = null
    }
  }

  return debounced
}

// =============================================================================
// FileWatcher Implementation
// =============================================================================

/**
 * Watches program files and emits their contents to handlers.
 *
 * @example
 * ```typescript
 * import { FileWatcher } from '@blipvm/node'
 *
 * const watcher = new FileWatcher({ extensions: ['.blip'] })
 * watcher.on('change', (code) => {
 *   const result = compileProgram(code)
 * })
 * watcher.add('./song.blip')
 * watcher.start()
 * ```
 */
export class FileWatcher {
  private watcher: chokidar.FSWatcher | null = null
  private handlers = new Set<ChangeHandler>()
  private options: Required<FileWatcherOptions>
  private started = false
  private pendingPaths = new Set<string>()
  private debouncedEmit: Debounced

  constructor(options: FileWatcherOptions = {}) {
    this.options = {
      debounce: options.debounce ?? 150,
      extensions: options.extensions ?? ['.blip', '.txt'],
      ignore: options.ignore ?? ['**/node_modules/**', '**/.git/**'],
      readOnAdd: options.readOnAdd ?? false
    }

    // Processes every path accumulated during the debounce window
    this.debouncedEmit = debounce(() => {
      for (const filePath of this.pendingPaths) {
        this.emitFileContents(filePath)
      }
      this.pendingPaths.clear()
    }, this.options.debounce)

    this.watcher = chokidar.watch([], {
      ignored: this.options.ignore,
      persistent: true,
      ignoreInitial: !this.options.readOnAdd
    })

    this.watcher.on('add', (filePath: string) => {
      if (this.started && this.shouldWatch(filePath)) {
        this.queuePath(filePath)
      }
    })

    this.watcher.on('change', (filePath: string) => {
      if (this.started && this.shouldWatch(filePath)) {
        this.queuePath(filePath)
      }
    })

    this.watcher.on('error', (error: Error) => {
      console.error('[FileWatcher] Error:', error.message)
    })
  }

  /**
   * Register a handler for file changes.
   * Handler receives file contents as a string.
   */
  on(event: 'change', handler: ChangeHandler): void {
    if (event === 'change') {
      this.handlers.add(handler)
    }
  }

  start(): void {
    this.started = true
  }

  /**
   * Stop watching and release the underlying chokidar watcher.
   * Resolves once chokidar has closed its handles.
   */
  async stop(): Promise<void> {
    this.started = false
    this.debouncedEmit.cancel()
    this.pendingPaths.clear()
    this.handlers.clear()

    const watcher = this.watcher
    this.watcher = null
    if (watcher) {
      await watcher.close()
    }
  }

  /**
   * Add a file or directory to watch.
   */
  add(watchPath: string): void {
    this.watcher?.add(watchPath)
  }

  /**
   * Remove a file or directory from watch list.
   */
  remove(watchPath: string): void {
    this.watcher?.unwatch(watchPath)
  }

  private shouldWatch(filePath: string): boolean {
    return this.options.extensions.includes(path.extname(filePath))
  }

  private queuePath(filePath: string): void {
    this.pendingPaths.add(filePath)
    this.debouncedEmit()
  }

  private emitFileContents(filePath: string): void {
    let contents: string
    try {
      contents = fs.readFileSync(filePath, 'utf-8')
    } catch (error) {
      // File may have been deleted or replaced between event and read
      const message = error instanceof Error ? error.message : String(error)
      console.warn(`[FileWatcher] Failed to read ${filePath}: ${message}`)
      return
    }
    for (const handler of this.handlers) {
      handler(contents, filePath)
    }
  }
}
