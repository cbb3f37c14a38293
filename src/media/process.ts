import { type ChildProcess, spawn } from 'node:child_process'

import { createAbortError, createExternalCallError } from '../errors.js'

const STDERR_LIMIT = 8192

export type ProcessOptions = {
  command: string
  args: string[]
  timeoutMs: number
  errorLabel: string
  signal?: AbortSignal
}

type Settle<T> = {
  resolve: (value: T) => void
  reject: (error: unknown) => void
}

/**
 * Kills the child on timeout or abort and settles the promise exactly once.
 */
function supervise<T>(
  proc: ChildProcess,
  { timeoutMs, errorLabel, signal }: ProcessOptions,
  { resolve, reject }: Settle<T>
) {
  let settled = false
  const finish = (fn: () => void) => {
    if (settled) return
    settled = true
    clearTimeout(timeout)
    signal?.removeEventListener('abort', onAbort)
    fn()
  }
  const onAbort = () => {
    proc.kill('SIGKILL')
    finish(() => reject(createAbortError(signal?.reason)))
  }
  const timeout = setTimeout(() => {
    proc.kill('SIGKILL')
    finish(() => reject(createExternalCallError(`${errorLabel} timed out`)))
  }, timeoutMs)

  if (signal?.aborted) onAbort()
  else signal?.addEventListener('abort', onAbort, { once: true })

  proc.on('error', (error) => {
    finish(() => reject(createExternalCallError(`${errorLabel} failed: ${error.message}`, error)))
  })

  return {
    succeed: (value: T) => finish(() => resolve(value)),
    fail: (code: number | null, stderr: string) => {
      const suffix = stderr.trim() ? `: ${stderr.trim()}` : ''
      finish(() => reject(createExternalCallError(`${errorLabel} exited with code ${code}${suffix}`)))
    },
  }
}

/**
 * Runs a command to completion, streaming stderr (and optionally stdout) line by line.
 */
export async function runProcess({
  onStderrLine,
  onStdoutLine,
  ...options
}: ProcessOptions & {
  onStderrLine?: (line: string) => void
  onStdoutLine?: (line: string) => void
}): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const proc = spawn(options.command, options.args, { stdio: ['ignore', 'pipe', 'pipe'] })
    const control = supervise(proc, options, { resolve, reject })
    let stderr = ''
    let stderrBuffer = ''
    let stdoutBuffer = ''

    const flushLine = (line: string) => {
      if (onStderrLine) onStderrLine(line)
      if (stderr.length < STDERR_LIMIT) {
        stderr += line
        if (!line.endsWith('\n')) stderr += '\n'
      }
    }

    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        stderrBuffer += chunk
        const lines = stderrBuffer.split(/\r?\n/)
        stderrBuffer = lines.pop() ?? ''
        for (const line of lines) {
          if (line) flushLine(line)
        }
      })
    }

    if (proc.stdout && onStdoutLine) {
      proc.stdout.setEncoding('utf8')
      proc.stdout.on('data', (chunk: string) => {
        stdoutBuffer += chunk
        const lines = stdoutBuffer.split(/\r?\n/)
        stdoutBuffer = lines.pop() ?? ''
        for (const line of lines) {
          if (line) onStdoutLine(line)
        }
      })
    }

    proc.on('close', (code: number | null) => {
      if (stderrBuffer.trim().length > 0) flushLine(stderrBuffer.trim())
      if (stdoutBuffer.trim().length > 0 && onStdoutLine) onStdoutLine(stdoutBuffer.trim())
      if (code === 0) {
        control.succeed()
        return
      }
      control.fail(code, stderr)
    })
  })
}

export async function runProcessCapture(options: ProcessOptions): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const proc = spawn(options.command, options.args, { stdio: ['ignore', 'pipe', 'pipe'] })
    const control = supervise(proc, options, { resolve, reject })
    let stdout = ''
    let stderr = ''

    if (proc.stdout) {
      proc.stdout.setEncoding('utf8')
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        if (stderr.length < STDERR_LIMIT) stderr += chunk
      })
    }

    proc.on('close', (code: number | null) => {
      if (code === 0) {
        control.succeed(stdout)
        return
      }
      control.fail(code, stderr)
    })
  })
}

export async function runProcessCaptureBuffer(options: ProcessOptions): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const proc = spawn(options.command, options.args, { stdio: ['ignore', 'pipe', 'pipe'] })
    const control = supervise(proc, options, { resolve, reject })
    const chunks: Buffer[] = []
    let stderr = ''

    if (proc.stdout) {
      proc.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk)
      })
    }
    if (proc.stderr) {
      proc.stderr.setEncoding('utf8')
      proc.stderr.on('data', (chunk: string) => {
        if (stderr.length < STDERR_LIMIT) stderr += chunk
      })
    }

    proc.on('close', (code: number | null) => {
      if (code === 0) {
        control.succeed(Buffer.concat(chunks))
        return
      }
      control.fail(code, stderr)
    })
  })
}
