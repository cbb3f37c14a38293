import { readFileSync } from 'node:fs'
import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'

import JSON5 from 'json5'

export type DetectionConfig = {
  sceneChangeThreshold?: number
  histogramThreshold?: number
  minTimeBetweenCaptures?: number
  skipIntroOutro?: boolean
  introOutroDuration?: number
  comparisonWidth?: number
}

export type SlidesConfig = {
  frameRate?: number
  analysisWidth?: number
  timeLimitPerSlide?: number
  minConfidence?: number
  mergeThreshold?: number
}

export type EnhancementConfig = {
  enabled?: boolean
  level?: string
  style?: string
  /**
   * Replaces the built-in instruction block; `{text}`, `{level}` and `{style}` are substituted.
   */
  prompt?: string
  /** Provider-prefixed, e.g. `openai/gpt-4o-mini`. */
  model?: string
  batchTargetTokens?: number
  batching?: boolean
  /** USD per video; 0 disables the cap. */
  maxCost?: number
  costPer1kTokens?: number
  cache?: boolean
  retries?: number
  retryDelayMs?: number
  timeoutMs?: number
  maxOutputTokens?: number
}

export type OutputConfig = {
  format?: string
  dir?: string
  includeTimestamps?: boolean
  includeNavigation?: boolean
  screenshotFormat?: string
  screenshotWidth?: number
  /** Also write original_transcript.txt / enhanced_transcript.txt. */
  transcripts?: boolean
}

export type MediaConfig = {
  videoQuality?: string
  timeoutMs?: number
}

export type LoggingConfig = {
  level?: string
  file?: string
  maxMb?: number
  maxFiles?: number
}

export type ProviderConfig = {
  /**
   * Override the provider API base URL (e.g. a proxy or a local gateway).
   *
   * Env `<PROVIDER>_BASE_URL` wins over this value.
   */
  baseUrl?: string
}

export type TalkdeckConfig = {
  detection?: DetectionConfig
  slides?: SlidesConfig
  enhancement?: EnhancementConfig
  output?: OutputConfig
  media?: MediaConfig
  logging?: LoggingConfig
  openai?: ProviderConfig
  anthropic?: ProviderConfig
  google?: ProviderConfig
  xai?: ProviderConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function assertNoComments(raw: string, path: string): void {
  let inString: '"' | "'" | null = null
  let escaped = false
  let line = 1
  let col = 1

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i] ?? ''
    const next = raw[i + 1] ?? ''

    if (inString) {
      if (escaped) {
        escaped = false
      } else if (ch === '\\') {
        escaped = true
      } else if (ch === inString) {
        inString = null
      }
    } else if (ch === '"' || ch === "'") {
      inString = ch
    } else if (ch === '/' && (next === '/' || next === '*')) {
      throw new Error(
        `Invalid config file ${path}: comments are not allowed (found /${next} at ${line}:${col}).`
      )
    }

    if (ch === '\n') {
      line += 1
      col = 1
    } else {
      col += 1
    }
  }
}

type SectionReader = {
  number: (key: string) => number | undefined
  boolean: (key: string) => boolean | undefined
  string: (key: string) => string | undefined
}

function readSection(
  root: Record<string, unknown>,
  name: string,
  path: string
): SectionReader | undefined {
  const value = root[name]
  if (typeof value === 'undefined') return undefined
  if (!isRecord(value)) {
    throw new Error(`Invalid config file ${path}: "${name}" must be an object.`)
  }
  const fail = (key: string, kind: string): never => {
    throw new Error(`Invalid config file ${path}: "${name}.${key}" must be ${kind}.`)
  }
  return {
    number: (key) => {
      const raw = value[key]
      if (typeof raw === 'undefined') return undefined
      return typeof raw === 'number' && Number.isFinite(raw) ? raw : fail(key, 'a number')
    },
    boolean: (key) => {
      const raw = value[key]
      if (typeof raw === 'undefined') return undefined
      return typeof raw === 'boolean' ? raw : fail(key, 'a boolean')
    },
    string: (key) => {
      const raw = value[key]
      if (typeof raw === 'undefined') return undefined
      if (typeof raw !== 'string') return fail(key, 'a string')
      const trimmed = raw.trim()
      return trimmed.length > 0 ? trimmed : fail(key, 'a non-empty string')
    },
  }
}

// A section that set nothing is treated as absent.
function compact<T extends object>(value: T): T | undefined {
  return Object.values(value).some((member) => typeof member !== 'undefined') ? value : undefined
}

export function parseTalkdeckConfig(parsed: unknown, path: string): TalkdeckConfig {
  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const detection = (() => {
    const section = readSection(parsed, 'detection', path)
    if (!section) return undefined
    return compact<DetectionConfig>({
      sceneChangeThreshold: section.number('sceneChangeThreshold'),
      histogramThreshold: section.number('histogramThreshold'),
      minTimeBetweenCaptures: section.number('minTimeBetweenCaptures'),
      skipIntroOutro: section.boolean('skipIntroOutro'),
      introOutroDuration: section.number('introOutroDuration'),
      comparisonWidth: section.number('comparisonWidth'),
    })
  })()

  const slides = (() => {
    const section = readSection(parsed, 'slides', path)
    if (!section) return undefined
    return compact<SlidesConfig>({
      frameRate: section.number('frameRate'),
      analysisWidth: section.number('analysisWidth'),
      timeLimitPerSlide: section.number('timeLimitPerSlide'),
      minConfidence: section.number('minConfidence'),
      mergeThreshold: section.number('mergeThreshold'),
    })
  })()

  const enhancement = (() => {
    const section = readSection(parsed, 'enhancement', path)
    if (!section) return undefined
    return compact<EnhancementConfig>({
      enabled: section.boolean('enabled'),
      level: section.string('level'),
      style: section.string('style'),
      prompt: section.string('prompt'),
      model: section.string('model'),
      batchTargetTokens: section.number('batchTargetTokens'),
      batching: section.boolean('batching'),
      maxCost: section.number('maxCost'),
      costPer1kTokens: section.number('costPer1kTokens'),
      cache: section.boolean('cache'),
      retries: section.number('retries'),
      retryDelayMs: section.number('retryDelayMs'),
      timeoutMs: section.number('timeoutMs'),
      maxOutputTokens: section.number('maxOutputTokens'),
    })
  })()

  const output = (() => {
    const section = readSection(parsed, 'output', path)
    if (!section) return undefined
    return compact<OutputConfig>({
      format: section.string('format'),
      dir: section.string('dir'),
      includeTimestamps: section.boolean('includeTimestamps'),
      includeNavigation: section.boolean('includeNavigation'),
      screenshotFormat: section.string('screenshotFormat'),
      screenshotWidth: section.number('screenshotWidth'),
      transcripts: section.boolean('transcripts'),
    })
  })()

  const media = (() => {
    const section = readSection(parsed, 'media', path)
    if (!section) return undefined
    return compact<MediaConfig>({
      videoQuality: section.string('videoQuality'),
      timeoutMs: section.number('timeoutMs'),
    })
  })()

  const logging = (() => {
    const section = readSection(parsed, 'logging', path)
    if (!section) return undefined
    return compact<LoggingConfig>({
      level: section.string('level'),
      file: section.string('file'),
      maxMb: section.number('maxMb'),
      maxFiles: section.number('maxFiles'),
    })
  })()

  const provider = (name: string): ProviderConfig | undefined => {
    const section = readSection(parsed, name, path)
    if (!section) return undefined
    return compact<ProviderConfig>({ baseUrl: section.string('baseUrl') })
  }
  const openai = provider('openai')
  const anthropic = provider('anthropic')
  const google = provider('google')
  const xai = provider('xai')

  return {
    ...(detection ? { detection } : {}),
    ...(slides ? { slides } : {}),
    ...(enhancement ? { enhancement } : {}),
    ...(output ? { output } : {}),
    ...(media ? { media } : {}),
    ...(logging ? { logging } : {}),
    ...(openai ? { openai } : {}),
    ...(anthropic ? { anthropic } : {}),
    ...(google ? { google } : {}),
    ...(xai ? { xai } : {}),
  }
}

export function resolveDefaultConfigPath(env: Record<string, string | undefined>): string | null {
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  return home ? join(home, '.talkdeck', 'config.json') : null
}

/**
 * Reads `~/.talkdeck/config.json` (or `configPath`). A missing default file yields
 * `config: null`; a missing explicit file is an error.
 */
export function loadTalkdeckConfig({
  env,
  configPath = null,
}: {
  env: Record<string, string | undefined>
  configPath?: string | null
}): { config: TalkdeckConfig | null; path: string | null } {
  const path = configPath ?? resolveDefaultConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch (error) {
    if (configPath) {
      const message = error instanceof Error ? error.message : String(error)
      throw new Error(`Cannot read config file ${path}: ${message}`)
    }
    return { config: null, path }
  }

  assertNoComments(raw, path)
  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  return { config: parseTalkdeckConfig(parsed, path), path }
}

export async function saveTalkdeckConfig(path: string, config: TalkdeckConfig): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(config, null, 2)}\n`, 'utf8')
}
