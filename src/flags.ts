import { ENHANCEMENT_LEVELS, type EnhancementLevel, PROMPT_STYLES, type PromptStyle } from './enhance/types.js'
import type { LogLevel } from './logging/logger.js'
import type { ScreenshotFormat } from './media/screenshot.js'
import { isVideoQuality, type VideoQuality } from './media/yt-dlp.js'
import type { DeckFormat } from './render/types.js'

const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s|m|h)?$/i
const MIN_RETRIES = 0
const MAX_RETRIES = 5

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

// Absent means undefined, null or a blank string; every parser below maps it to null.
const isAbsent = (raw: unknown): boolean =>
  raw == null || (typeof raw === 'string' && raw.trim().length === 0)

const toNumber = (raw: unknown): number =>
  typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw.trim()) : Number.NaN

export function parseBoolean(raw: unknown, label: string): boolean | null {
  if (isAbsent(raw)) return null
  if (typeof raw === 'boolean') return raw
  if (typeof raw === 'string') {
    const normalized = raw.trim().toLowerCase()
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  throw new Error(`Unsupported ${label}: ${String(raw)}`)
}

export function parsePositiveInt(raw: unknown, label: string, min = 1): number | null {
  if (isAbsent(raw)) return null
  const numeric = toNumber(raw)
  if (!Number.isFinite(numeric) || !Number.isInteger(numeric)) {
    throw new Error(`Unsupported ${label}: ${String(raw)}`)
  }
  if (numeric < min) {
    throw new Error(`Unsupported ${label}: ${String(raw)} (minimum ${min})`)
  }
  return numeric
}

export function parseNumberInRange(
  raw: unknown,
  label: string,
  { min, max, exclusiveMin = false }: { min: number; max: number; exclusiveMin?: boolean }
): number | null {
  if (isAbsent(raw)) return null
  const numeric = toNumber(raw)
  if (!Number.isFinite(numeric)) {
    throw new Error(`Unsupported ${label}: ${String(raw)}`)
  }
  if ((exclusiveMin ? numeric <= min : numeric < min) || numeric > max) {
    const lower = exclusiveMin ? `>${min}` : `${min}`
    throw new Error(`Unsupported ${label}: ${String(raw)} (range ${lower}-${max})`)
  }
  return numeric
}

/**
 * `90`, `90s`, `1.5m`, `500ms`, `1h`; bare numbers are seconds. Numbers from a
 * config file are taken as milliseconds.
 */
export function parseDurationMs(raw: unknown, label = '--timeout'): number | null {
  if (isAbsent(raw)) return null
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw <= 0) throw new Error(`Unsupported ${label}: ${raw}`)
    return Math.floor(raw)
  }
  if (typeof raw !== 'string') throw new Error(`Unsupported ${label}: ${String(raw)}`)
  const match = DURATION_PATTERN.exec(raw.trim())
  if (!match?.groups) {
    throw new Error(`Unsupported ${label}: ${raw}`)
  }

  const numeric = Number(match.groups.value)
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw new Error(`Unsupported ${label}: ${raw}`)
  }

  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const multiplier = unit === 'ms' ? 1 : unit === 's' ? 1000 : unit === 'm' ? 60_000 : 3_600_000
  return Math.floor(numeric * multiplier)
}

export function parseRetriesArg(raw: unknown, label = '--retries'): number | null {
  if (isAbsent(raw)) return null
  const numeric = toNumber(raw)
  if (!Number.isFinite(numeric) || !Number.isInteger(numeric)) {
    throw new Error(`Unsupported ${label}: ${String(raw)}`)
  }
  if (numeric < MIN_RETRIES || numeric > MAX_RETRIES) {
    throw new Error(`Unsupported ${label}: ${String(raw)} (range ${MIN_RETRIES}-${MAX_RETRIES})`)
  }
  return numeric
}

function parseChoice<T extends string>(
  raw: unknown,
  label: string,
  accept: (value: string) => T | null
): T | null {
  if (isAbsent(raw)) return null
  if (typeof raw === 'string') {
    const value = accept(raw.trim().toLowerCase())
    if (value) return value
  }
  throw new Error(`Unsupported ${label}: ${String(raw)}`)
}

export const parseEnhancementLevel = (raw: unknown, label = '--enhancement-level') =>
  parseChoice<EnhancementLevel>(raw, label, (value) => ENHANCEMENT_LEVELS.find((l) => l === value) ?? null)

export const parsePromptStyle = (raw: unknown, label = '--prompt-style') =>
  parseChoice<PromptStyle>(raw, label, (value) => PROMPT_STYLES.find((s) => s === value) ?? null)

export const parseDeckFormat = (raw: unknown, label = '--format') =>
  parseChoice<DeckFormat>(raw, label, (value) => {
    if (value === 'md' || value === 'markdown') return 'md'
    if (value === 'html') return 'html'
    return null
  })

export const parseScreenshotFormat = (raw: unknown, label = '--screenshot-format') =>
  parseChoice<ScreenshotFormat>(raw, label, (value) => {
    if (value === 'png') return 'png'
    if (value === 'jpg' || value === 'jpeg') return 'jpg'
    return null
  })

export const parseVideoQuality = (raw: unknown, label = '--video-quality') =>
  parseChoice<VideoQuality>(raw, label, (value) => (isVideoQuality(value) ? value : null))

export const parseLogLevel = (raw: unknown, label = '--log-level') =>
  parseChoice<LogLevel>(raw, label, (value) => LOG_LEVELS.find((level) => level === value) ?? null)

export function parseOptionalString(raw: unknown, label: string): string | null {
  if (isAbsent(raw)) return null
  if (typeof raw !== 'string') throw new Error(`Unsupported ${label}: ${String(raw)}`)
  return raw.trim()
}

/** A raw value and the name it is reported under: a flag, an env var or a config key. */
export type SettingLayer = readonly [raw: unknown, label: string]

/**
 * First layer that carries a value wins; a present but invalid value throws with
 * that layer's label instead of falling through.
 */
export function resolveLayered<T>(
  layers: readonly SettingLayer[],
  parse: (raw: unknown, label: string) => T | null
): T | null {
  for (const [raw, label] of layers) {
    const value = parse(raw, label)
    if (value !== null) return value
  }
  return null
}
