#!/usr/bin/env node
import { main } from './cli'

main(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr
}).then(
  status => {
    process.exitCode = status
  },
  (error: unknown) => {
    console.error(`[blipvm] ${error instanceof Error ? error.stack ?? error.message : String(error)}`)
    process.exitCode = 1
  }
)
