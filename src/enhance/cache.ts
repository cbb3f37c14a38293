import { createHash } from 'node:crypto'
import { promises as fs } from 'node:fs'
import path from 'node:path'

import { formatErrorMessage } from '../errors.js'
import type { EnhancementLevel, ParsedEnhancement } from './types.js'

export const ENHANCEMENT_CACHE_FILE = 'enhancement-cache.json'
const CACHE_VERSION = 1

export function buildEnhancementCacheKey(level: EnhancementLevel, text: string): string {
  return createHash('sha256').update(`${level}\u0000${text}`).digest('hex')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readEntry(value: unknown): ParsedEnhancement | null {
  if (!isRecord(value) || typeof value.text !== 'string') return null
  const keyPoints = Array.isArray(value.keyPoints)
    ? value.keyPoints.filter((point): point is string => typeof point === 'string')
    : []
  return { text: value.text, keyPoints }
}

/**
 * Batch results keyed by content hash. `filePath` null keeps it in memory only.
 */
export class EnhancementCache {
  private readonly entries = new Map<string, ParsedEnhancement>()
  private dirty = false
  private failedLoad: string | null = null

  constructor(private readonly filePath: string | null = null) {}

  static forOutputDir(outputDir: string): EnhancementCache {
    return new EnhancementCache(path.join(outputDir, ENHANCEMENT_CACHE_FILE))
  }

  /** Set when `load` found an unreadable file; the cache then starts empty. */
  get loadError(): string | null {
    return this.failedLoad
  }

  get size(): number {
    return this.entries.size
  }

  get(key: string): ParsedEnhancement | null {
    return this.entries.get(key) ?? null
  }

  set(key: string, value: ParsedEnhancement): void {
    this.entries.set(key, value)
    this.dirty = true
  }

  clear(): void {
    this.entries.clear()
    this.dirty = true
  }

  async load(): Promise<void> {
    if (!this.filePath) return
    let parsed: unknown
    try {
      parsed = JSON.parse(await fs.readFile(this.filePath, 'utf8'))
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') return
      const reason = formatErrorMessage(error)
      this.failedLoad = `Could not read enhancement cache ${this.filePath}: ${reason}`
      return
    }
    if (!isRecord(parsed) || parsed.version !== CACHE_VERSION || !isRecord(parsed.entries)) return
    for (const [key, value] of Object.entries(parsed.entries)) {
      const entry = readEntry(value)
      if (entry) this.entries.set(key, entry)
    }
  }

  async save(): Promise<void> {
    if (!this.filePath || !this.dirty) return
    await fs.mkdir(path.dirname(this.filePath), { recursive: true })
    const payload = { version: CACHE_VERSION, entries: Object.fromEntries(this.entries) }
    await fs.writeFile(this.filePath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8')
    this.dirty = false
  }
}
