import { readdir, readFile } from 'node:fs/promises'
import path from 'node:path'

import type { SubtitleFormat, TranscriptSegment } from './types.js'

const TIMING_LINE = /^(\S+)\s+-->\s+(\S+)/

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parses `HH:MM:SS,mmm`, `HH:MM:SS.mmm`, `MM:SS.mmm` and plain seconds.
 */
export function parseSubtitleTimestamp(value: string): number | null {
  const normalized = value.trim().replace(',', '.')
  if (!normalized) return null
  const parts = normalized.split(':')
  if (parts.length > 3) return null
  let total = 0
  for (const part of parts) {
    if (!/^\d+(\.\d+)?$/.test(part)) return null
    total = total * 60 + Number(part)
  }
  return Number.isFinite(total) ? total : null
}

function finalizeSegments(segments: TranscriptSegment[]): TranscriptSegment[] {
  return segments
    .filter((segment) => segment.text.length > 0)
    .sort((a, b) => a.start - b.start)
}

/**
 * Parses cue blocks shared by SRT and WebVTT: an optional identifier line, a
 * `start --> end [settings]` line, then text lines until a blank line.
 */
function parseCueBlocks(content: string): TranscriptSegment[] {
  const segments: TranscriptSegment[] = []
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/)
  let current: TranscriptSegment | null = null
  let skippingBlock = false

  const flush = (cue: TranscriptSegment | null): null => {
    if (cue) segments.push({ ...cue, text: cue.text.trim() })
    return null
  }

  for (const raw of lines) {
    const line = raw.trim()
    if (!line) {
      current = flush(current)
      skippingBlock = false
      continue
    }
    if (skippingBlock) continue
    if (!current && (line.startsWith('WEBVTT') || /^(NOTE|STYLE|REGION)\b/.test(line))) {
      skippingBlock = true
      continue
    }
    const timing = line.match(TIMING_LINE)
    if (timing) {
      current = flush(current)
      const start = parseSubtitleTimestamp(timing[1] ?? '')
      const end = parseSubtitleTimestamp(timing[2] ?? '')
      if (start != null && end != null) current = { start, end, text: '' }
      continue
    }
    if (current) {
      current.text = current.text ? `${current.text} ${line}` : line
    }
  }
  flush(current)
  return finalizeSegments(segments)
}

export function parseSrt(content: string): TranscriptSegment[] {
  return parseCueBlocks(content)
}

export function parseVtt(content: string): TranscriptSegment[] {
  return parseCueBlocks(content)
}

const readNumber = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback

export function parseJsonSubtitles(content: string): TranscriptSegment[] {
  const data: unknown = JSON.parse(content)
  if (!isRecord(data)) return []
  const segments: TranscriptSegment[] = []

  if (Array.isArray(data.events)) {
    for (const event of data.events) {
      if (!isRecord(event) || !Array.isArray(event.segs)) continue
      const text = event.segs
        .map((seg) => (isRecord(seg) && typeof seg.utf8 === 'string' ? seg.utf8 : ''))
        .join('')
        .trim()
      if (!text) continue
      const startMs = readNumber(event.tStartMs, 0)
      const durationMs = readNumber(event.dDurationMs, 0)
      segments.push({ start: startMs / 1000, end: (startMs + durationMs) / 1000, text })
    }
  } else if (Array.isArray(data.captions)) {
    for (const caption of data.captions) {
      if (!isRecord(caption)) continue
      const text = typeof caption.text === 'string' ? caption.text.trim() : ''
      segments.push({
        start: readNumber(caption.start, 0),
        end: readNumber(caption.end, 0),
        text,
      })
    }
  }
  return finalizeSegments(segments)
}

export function detectSubtitleFormat(filePath: string): SubtitleFormat | null {
  const ext = path.extname(filePath).toLowerCase()
  if (ext === '.srt') return 'srt'
  if (ext === '.vtt') return 'vtt'
  if (ext === '.json' || ext === '.json3') return 'json'
  return null
}

export function parseSubtitles(content: string, format: SubtitleFormat): TranscriptSegment[] {
  switch (format) {
    case 'srt':
      return parseSrt(content)
    case 'vtt':
      return parseVtt(content)
    case 'json':
      return parseJsonSubtitles(content)
  }
}

export function isAutoGeneratedSubtitle(filePath: string): boolean {
  const name = path.basename(filePath).toLowerCase()
  if (name.includes('manual')) return false
  return name.includes('auto') || name.includes('generated')
}

/**
 * Manual captions first, then auto-generated ones; order within each group is kept.
 */
export function rankSubtitleFiles(files: readonly string[]): string[] {
  const supported = files.filter((file) => detectSubtitleFormat(file) !== null)
  return [
    ...supported.filter((file) => !isAutoGeneratedSubtitle(file)),
    ...supported.filter((file) => isAutoGeneratedSubtitle(file)),
  ]
}

export function selectSubtitleFile(files: readonly string[]): string | null {
  return rankSubtitleFiles(files)[0] ?? null
}

export async function loadSubtitleFile(filePath: string): Promise<TranscriptSegment[]> {
  const format = detectSubtitleFormat(filePath)
  if (!format) throw new Error(`Unsupported subtitle format: ${filePath}`)
  const content = await readFile(filePath, 'utf8')
  return parseSubtitles(content, format)
}

/**
 * Tries candidates in preference order and returns the first that yields segments.
 */
export async function loadPreferredSubtitles(
  files: readonly string[]
): Promise<{ file: string; segments: TranscriptSegment[] } | null> {
  for (const file of rankSubtitleFiles(files)) {
    const segments = await loadSubtitleFile(file)
    if (segments.length > 0) return { file, segments }
  }
  return null
}

/**
 * Subtitle files next to a local video that share its base name, e.g.
 * `talk.mp4` → `talk.srt`, `talk.en.vtt`. A missing directory yields none.
 */
export async function findSiblingSubtitleFiles(videoPath: string): Promise<string[]> {
  const dir = path.dirname(videoPath)
  const base = path.basename(videoPath, path.extname(videoPath))
  let entries: string[]
  try {
    entries = await readdir(dir)
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') return []
    throw error
  }
  return entries
    .filter((entry) => entry === base || entry.startsWith(`${base}.`))
    .filter((entry) => detectSubtitleFormat(entry) !== null && !entry.endsWith('.info.json'))
    .sort()
    .map((entry) => path.join(dir, entry))
}
