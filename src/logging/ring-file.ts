import fs from 'node:fs/promises'
import path from 'node:path'

export type RingFileOptions = {
  filePath: string
  maxBytes: number
  maxFiles: number
}

export type RingFileWriter = {
  write: (line: string) => void
  /** Resolves once queued writes land; rejects with the first write failure. */
  flush: () => Promise<void>
}

const normalizeMaxFiles = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1

const normalizeMaxBytes = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1024

const isMissingFile = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await fs.stat(filePath)).size
  } catch (error) {
    if (isMissingFile(error)) return 0
    throw error
  }
}

async function renameIfPresent(src: string, dest: string): Promise<void> {
  try {
    await fs.rename(src, dest)
  } catch (error) {
    if (!isMissingFile(error)) throw error
  }
}

/**
 * `file` -> `file.1` -> ... -> `file.<maxFiles-1>`; the oldest generation is dropped.
 */
async function rotateFiles(filePath: string, maxFiles: number): Promise<void> {
  if (maxFiles <= 1) {
    await fs.rm(filePath, { force: true })
    return
  }
  await fs.rm(`${filePath}.${maxFiles - 1}`, { force: true })
  for (let i = maxFiles - 1; i >= 1; i -= 1) {
    const src = i === 1 ? filePath : `${filePath}.${i - 1}`
    await renameIfPresent(src, `${filePath}.${i}`)
  }
}

export function createRingFileWriter(options: RingFileOptions): RingFileWriter {
  const filePath = options.filePath
  const maxBytes = normalizeMaxBytes(options.maxBytes)
  const maxFiles = normalizeMaxFiles(options.maxFiles)
  let ready: Promise<unknown> | null = null
  let chain: Promise<void> = Promise.resolve()
  let failure: unknown = null

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(normalized, 'utf8')
    chain = chain
      .then(async () => {
        ready ??= fs.mkdir(path.dirname(filePath), { recursive: true })
        await ready
        const currentSize = await fileSize(filePath)
        if (currentSize > 0 && currentSize + bytes > maxBytes) {
          await rotateFiles(filePath, maxFiles)
        }
        await fs.appendFile(filePath, normalized, 'utf8')
      })
      .catch((error: unknown) => {
        failure ??= error
      })
  }

  const flush = async () => {
    await chain
    if (failure) {
      const error = failure
      failure = null
      throw error
    }
  }

  return { write, flush }
}
