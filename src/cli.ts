#!/usr/bin/env node
import { formatErrorMessage, isNamedError } from './errors.js'
import { runCli } from './run.js'

const controller = new AbortController()
process.once('SIGINT', () => {
  process.stderr.write('\nInterrupted, stopping…\n')
  controller.abort(new Error('Interrupted'))
})

const verbose = process.argv.includes('--verbose') || process.argv.includes('-v')

runCli(process.argv.slice(2), {
  env: process.env,
  fetch: globalThis.fetch.bind(globalThis),
  stdout: process.stdout,
  stderr: process.stderr,
  signal: controller.signal,
}).catch((error: unknown) => {
  if (isNamedError(error, 'AbortError') || controller.signal.aborted) {
    process.exitCode = 130
    return
  }
  process.stderr.write(`Error: ${formatErrorMessage(error)}\n`)
  if (verbose && error instanceof Error && error.stack) {
    process.stderr.write(`${error.stack}\n`)
  }
  process.exitCode = 1
})
