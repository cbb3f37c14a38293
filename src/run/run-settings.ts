import path from 'node:path'

import type { TalkdeckConfig } from '../config.js'
import type { EnhancementSettings } from '../enhance/types.js'
import {
  parseBoolean,
  parseDeckFormat,
  parseDurationMs,
  parseEnhancementLevel,
  parseLogLevel,
  parseNumberInRange,
  parseOptionalString,
  parsePositiveInt,
  parsePromptStyle,
  parseRetriesArg,
  parseScreenshotFormat,
  parseVideoQuality,
  resolveLayered,
  type SettingLayer,
} from '../flags.js'
import type { LlmBaseUrls } from '../llm/generate-text.js'
import { parseGatewayStyleModelId } from '../llm/model-id.js'
import { DEFAULT_LOGGING, type LoggingSettings, resolveLogLevel } from '../logging/logger.js'
import type { ScreenshotFormat } from '../media/screenshot.js'
import type { VideoQuality } from '../media/yt-dlp.js'
import type { DeckFormat } from '../render/types.js'
import {
  type DetectionSettingsInput,
  resolveDetectionSettings,
  resolveSlideSettings,
  type SlideSettings,
  type SlideSettingsInput,
} from '../slides/settings.js'
import type { DetectionSettings } from '../slides/types.js'

export type OutputSettings = {
  format: DeckFormat
  outputDir: string
  /** Document file name inside `outputDir`. */
  fileName: string
  includeTimestamps: boolean
  includeNavigation: boolean
  screenshotFormat: ScreenshotFormat
  screenshotWidth: number | null
  writeTranscripts: boolean
}

export type MediaSettings = {
  videoQuality: VideoQuality
  /** Per external process (ffmpeg, ffprobe, yt-dlp). */
  timeoutMs: number
}

export type TalkdeckSettings = {
  detection: DetectionSettings
  slides: SlideSettings
  enhancement: EnhancementSettings
  output: OutputSettings
  media: MediaSettings
  logging: LoggingSettings
  baseUrls: LlmBaseUrls
}

/** Raw option values as commander hands them over. */
export type CliSettingsInput = DetectionSettingsInput &
  SlideSettingsInput & {
    format?: unknown
    output?: unknown
    outputDir?: unknown
    timestamps?: unknown
    navigation?: unknown
    screenshotFormat?: unknown
    screenshotWidth?: unknown
    transcripts?: unknown
    enhance?: unknown
    enhancementLevel?: unknown
    promptStyle?: unknown
    prompt?: unknown
    model?: unknown
    batchTargetTokens?: unknown
    batching?: unknown
    maxCost?: unknown
    cache?: unknown
    retries?: unknown
    timeout?: unknown
    videoQuality?: unknown
    logLevel?: unknown
    logFile?: unknown
    verbose?: unknown
    quiet?: unknown
  }

type Env = Record<string, string | undefined>

export const DEFAULT_ENHANCEMENT_SETTINGS: EnhancementSettings = {
  enabled: false,
  level: 'detailed',
  style: 'clear',
  promptTemplate: null,
  model: 'anthropic/claude-sonnet-4-5',
  batchTargetTokens: 1500,
  batching: true,
  maxCost: 5,
  costPer1kTokens: 0.003,
  cache: true,
  retries: 2,
  retryDelayMs: 1000,
  timeoutMs: 120_000,
  maxOutputTokens: 4000,
}

export const DEFAULT_OUTPUT_DIR = 'output'
export const DEFAULT_VIDEO_QUALITY: VideoQuality = '720p'
export const DEFAULT_MEDIA_TIMEOUT_MS = 30 * 60_000

export const defaultDeckFileName = (format: DeckFormat) =>
  format === 'html' ? 'presentation.html' : 'presentation.md'

const layers = (
  cli: [unknown, string],
  env: Env,
  envKey: string | null,
  config: [unknown, string]
): SettingLayer[] => (envKey ? [cli, [env[envKey], envKey], config] : [cli, config])

const nonNegative = (max: number) => (raw: unknown, label: string) =>
  parseNumberInRange(raw, label, { min: 0, max })

function resolveEnhancementSettings(
  cli: CliSettingsInput,
  env: Env,
  config: TalkdeckConfig['enhancement']
): EnhancementSettings {
  const defaults = DEFAULT_ENHANCEMENT_SETTINGS
  const model =
    resolveLayered(
      layers([cli.model, '--model'], env, 'TALKDECK_MODEL', [config?.model, 'enhancement.model']),
      parseOptionalString
    ) ?? defaults.model
  // Fails fast on an unknown provider instead of at the first batch.
  const canonicalModel = parseGatewayStyleModelId(model).canonical

  return {
    enabled:
      resolveLayered(
        layers([cli.enhance, '--enhance'], env, 'TALKDECK_ENHANCE', [
          config?.enabled,
          'enhancement.enabled',
        ]),
        parseBoolean
      ) ?? defaults.enabled,
    level:
      resolveLayered(
        layers([cli.enhancementLevel, '--enhancement-level'], env, 'TALKDECK_ENHANCEMENT_LEVEL', [
          config?.level,
          'enhancement.level',
        ]),
        parseEnhancementLevel
      ) ?? defaults.level,
    style:
      resolveLayered(
        layers([cli.promptStyle, '--prompt-style'], env, 'TALKDECK_PROMPT_STYLE', [
          config?.style,
          'enhancement.style',
        ]),
        parsePromptStyle
      ) ?? defaults.style,
    promptTemplate:
      resolveLayered(
        layers([cli.prompt, '--prompt'], env, null, [config?.prompt, 'enhancement.prompt']),
        parseOptionalString
      ) ?? defaults.promptTemplate,
    model: canonicalModel,
    batchTargetTokens:
      resolveLayered(
        layers([cli.batchTargetTokens, '--batch-target-tokens'], env, 'TALKDECK_BATCH_TARGET_TOKENS', [
          config?.batchTargetTokens,
          'enhancement.batchTargetTokens',
        ]),
        (raw, label) => parsePositiveInt(raw, label, 100)
      ) ?? defaults.batchTargetTokens,
    batching:
      resolveLayered(
        layers([cli.batching, '--batching'], env, null, [config?.batching, 'enhancement.batching']),
        parseBoolean
      ) ?? defaults.batching,
    maxCost:
      resolveLayered(
        layers([cli.maxCost, '--max-cost'], env, 'TALKDECK_MAX_COST', [
          config?.maxCost,
          'enhancement.maxCost',
        ]),
        nonNegative(10_000)
      ) ?? defaults.maxCost,
    costPer1kTokens:
      nonNegative(1000)(config?.costPer1kTokens, 'enhancement.costPer1kTokens') ??
      defaults.costPer1kTokens,
    cache:
      resolveLayered(
        layers([cli.cache, '--cache'], env, null, [config?.cache, 'enhancement.cache']),
        parseBoolean
      ) ?? defaults.cache,
    retries:
      resolveLayered(
        layers([cli.retries, '--retries'], env, 'TALKDECK_RETRIES', [
          config?.retries,
          'enhancement.retries',
        ]),
        parseRetriesArg
      ) ?? defaults.retries,
    retryDelayMs:
      nonNegative(600_000)(config?.retryDelayMs, 'enhancement.retryDelayMs') ??
      defaults.retryDelayMs,
    timeoutMs:
      resolveLayered(
        layers([cli.timeout, '--timeout'], env, 'TALKDECK_TIMEOUT', [
          config?.timeoutMs,
          'enhancement.timeoutMs',
        ]),
        parseDurationMs
      ) ?? defaults.timeoutMs,
    maxOutputTokens:
      parsePositiveInt(config?.maxOutputTokens, 'enhancement.maxOutputTokens', 16) ??
      defaults.maxOutputTokens,
  }
}

function resolveOutputSettings(
  cli: CliSettingsInput,
  env: Env,
  config: TalkdeckConfig['output'],
  cwd: string
): OutputSettings {
  const format =
    resolveLayered(
      layers([cli.format, '--format'], env, 'TALKDECK_FORMAT', [config?.format, 'output.format']),
      parseDeckFormat
    ) ?? 'html'
  const dir =
    resolveLayered(
      layers([cli.outputDir, '--output-dir'], env, 'TALKDECK_OUTPUT_DIR', [
        config?.dir,
        'output.dir',
      ]),
      parseOptionalString
    ) ?? DEFAULT_OUTPUT_DIR
  const fileName = parseOptionalString(cli.output, '--output') ?? defaultDeckFileName(format)
  if (path.basename(fileName) !== fileName) {
    throw new Error(`Unsupported --output: ${fileName} (use --output-dir for the directory)`)
  }

  return {
    format,
    outputDir: path.resolve(cwd, dir),
    fileName,
    includeTimestamps:
      resolveLayered(
        layers([cli.timestamps, '--timestamps'], env, null, [
          config?.includeTimestamps,
          'output.includeTimestamps',
        ]),
        parseBoolean
      ) ?? true,
    includeNavigation:
      resolveLayered(
        layers([cli.navigation, '--navigation'], env, null, [
          config?.includeNavigation,
          'output.includeNavigation',
        ]),
        parseBoolean
      ) ?? true,
    screenshotFormat:
      resolveLayered(
        layers([cli.screenshotFormat, '--screenshot-format'], env, null, [
          config?.screenshotFormat,
          'output.screenshotFormat',
        ]),
        parseScreenshotFormat
      ) ?? 'png',
    screenshotWidth:
      resolveLayered(
        layers([cli.screenshotWidth, '--screenshot-width'], env, null, [
          config?.screenshotWidth,
          'output.screenshotWidth',
        ]),
        (raw, label) => parsePositiveInt(raw, label, 16)
      ) ?? null,
    writeTranscripts:
      resolveLayered(
        layers([cli.transcripts, '--transcripts'], env, null, [
          config?.transcripts,
          'output.transcripts',
        ]),
        parseBoolean
      ) ?? true,
  }
}

function resolveLoggingSettings(
  cli: CliSettingsInput,
  env: Env,
  config: TalkdeckConfig['logging'],
  cwd: string
): LoggingSettings {
  const level =
    resolveLayered(
      layers([cli.logLevel, '--log-level'], env, 'TALKDECK_LOG_LEVEL', [
        config?.level,
        'logging.level',
      ]),
      parseLogLevel
    ) ?? DEFAULT_LOGGING.level
  const file = resolveLayered(
    layers([cli.logFile, '--log-file'], env, 'TALKDECK_LOG_FILE', [config?.file, 'logging.file']),
    parseOptionalString
  )
  const maxMb = parseNumberInRange(config?.maxMb, 'logging.maxMb', {
    min: 0,
    max: 10_000,
    exclusiveMin: true,
  })
  const maxFiles = parsePositiveInt(config?.maxFiles, 'logging.maxFiles')
  return {
    level: resolveLogLevel(
      {
        verbose: parseBoolean(cli.verbose, '--verbose') ?? false,
        quiet: parseBoolean(cli.quiet, '--quiet') ?? false,
      },
      level
    ),
    file: file ? path.resolve(cwd, file) : null,
    maxBytes: maxMb != null ? Math.floor(maxMb * 1024 * 1024) : DEFAULT_LOGGING.maxBytes,
    maxFiles: maxFiles ?? DEFAULT_LOGGING.maxFiles,
  }
}

function resolveBaseUrls(env: Env, config: TalkdeckConfig | null): LlmBaseUrls {
  const pick = (envValue: string | undefined, configValue: string | undefined) =>
    envValue?.trim() || configValue || null
  return {
    openai: pick(env.OPENAI_BASE_URL, config?.openai?.baseUrl),
    anthropic: pick(env.ANTHROPIC_BASE_URL, config?.anthropic?.baseUrl),
    google: pick(env.GOOGLE_BASE_URL ?? env.GEMINI_BASE_URL, config?.google?.baseUrl),
    xai: pick(env.XAI_BASE_URL, config?.xai?.baseUrl),
  }
}

/**
 * CLI flag > `TALKDECK_*` env > config file > built-in default, field by field.
 */
export function resolveTalkdeckSettings({
  cli,
  env,
  config,
  cwd,
}: {
  cli: CliSettingsInput
  env: Env
  config: TalkdeckConfig | null
  cwd: string
}): TalkdeckSettings {
  return {
    detection: resolveDetectionSettings({ cli, env, config: config?.detection }),
    slides: resolveSlideSettings({ cli, env, config: config?.slides }),
    enhancement: resolveEnhancementSettings(cli, env, config?.enhancement),
    output: resolveOutputSettings(cli, env, config?.output, cwd),
    media: {
      videoQuality:
        resolveLayered(
          layers([cli.videoQuality, '--video-quality'], env, 'TALKDECK_VIDEO_QUALITY', [
            config?.media?.videoQuality,
            'media.videoQuality',
          ]),
          parseVideoQuality
        ) ?? DEFAULT_VIDEO_QUALITY,
      timeoutMs:
        parseDurationMs(config?.media?.timeoutMs, 'media.timeoutMs') ?? DEFAULT_MEDIA_TIMEOUT_MS,
    },
    logging: resolveLoggingSettings(cli, env, config?.logging, cwd),
    baseUrls: resolveBaseUrls(env, config),
  }
}

/**
 * The config-file shape of resolved settings, as written by `--save-config`.
 */
export function settingsToConfig(settings: TalkdeckSettings): TalkdeckConfig {
  const { detection, slides, enhancement, output, media, logging } = settings
  const baseUrl = (value: string | null | undefined) => (value ? { baseUrl: value } : undefined)
  return {
    detection: {
      sceneChangeThreshold: detection.sceneChangeThreshold,
      histogramThreshold: detection.histogramThreshold,
      minTimeBetweenCaptures: detection.minTimeBetweenCaptures,
      skipIntroOutro: detection.skipIntroOutro,
      introOutroDuration: detection.introOutroDuration,
      ...(detection.comparisonWidth ? { comparisonWidth: detection.comparisonWidth } : {}),
    },
    slides: { ...slides },
    enhancement: {
      enabled: enhancement.enabled,
      level: enhancement.level,
      style: enhancement.style,
      ...(enhancement.promptTemplate ? { prompt: enhancement.promptTemplate } : {}),
      model: enhancement.model,
      batchTargetTokens: enhancement.batchTargetTokens,
      batching: enhancement.batching,
      maxCost: enhancement.maxCost,
      costPer1kTokens: enhancement.costPer1kTokens,
      cache: enhancement.cache,
      retries: enhancement.retries,
      retryDelayMs: enhancement.retryDelayMs,
      timeoutMs: enhancement.timeoutMs,
      maxOutputTokens: enhancement.maxOutputTokens,
    },
    output: {
      format: output.format,
      dir: output.outputDir,
      includeTimestamps: output.includeTimestamps,
      includeNavigation: output.includeNavigation,
      screenshotFormat: output.screenshotFormat,
      ...(output.screenshotWidth ? { screenshotWidth: output.screenshotWidth } : {}),
      transcripts: output.writeTranscripts,
    },
    media: { videoQuality: media.videoQuality, timeoutMs: media.timeoutMs },
    logging: {
      level: logging.level,
      ...(logging.file ? { file: logging.file } : {}),
      maxMb: logging.maxBytes / (1024 * 1024),
      maxFiles: logging.maxFiles,
    },
    openai: baseUrl(settings.baseUrls.openai),
    anthropic: baseUrl(settings.baseUrls.anthropic),
    google: baseUrl(settings.baseUrls.google),
    xai: baseUrl(settings.baseUrls.xai),
  }
}
