import type { DetectionConfig, SlidesConfig } from '../config.js'
import {
  parseBoolean,
  parseNumberInRange,
  parsePositiveInt,
  resolveLayered,
  type SettingLayer,
} from '../flags.js'
import type { DetectionSettings } from './types.js'

export type SlideSettings = {
  /** Sampling rate of the analysis frames, in frames per second. */
  frameRate: number
  analysisWidth: number
  timeLimitPerSlide: number
  minConfidence: number
  mergeThreshold: number
}

export const DEFAULT_DETECTION_SETTINGS: DetectionSettings = {
  sceneChangeThreshold: 0.3,
  histogramThreshold: 0.15,
  minTimeBetweenCaptures: 2,
  skipIntroOutro: true,
  introOutroDuration: 30,
  comparisonWidth: null,
}

export const DEFAULT_SLIDE_SETTINGS: SlideSettings = {
  frameRate: 1,
  analysisWidth: 320,
  timeLimitPerSlide: 300,
  minConfidence: 0.3,
  mergeThreshold: 1,
}

export type DetectionSettingsInput = {
  sensitivity?: unknown
  histogramThreshold?: unknown
  minTime?: unknown
  introOutro?: unknown
  introOutroDuration?: unknown
  comparisonWidth?: unknown
}

export type SlideSettingsInput = {
  frameRate?: unknown
  analysisWidth?: unknown
  timeLimit?: unknown
  minConfidence?: unknown
  mergeThreshold?: unknown
}

type Env = Record<string, string | undefined>

const layers = (
  cli: [unknown, string],
  env: Env,
  envKey: string,
  config: [unknown, string]
): SettingLayer[] => [cli, [env[envKey], envKey], config]

export function resolveDetectionSettings({
  cli,
  env,
  config,
}: {
  cli: DetectionSettingsInput
  env: Env
  config: DetectionConfig | undefined
}): DetectionSettings {
  const unit = { min: 0, max: 1 }
  const sceneChangeThreshold =
    resolveLayered(
      layers(
        [cli.sensitivity, '--sensitivity'],
        env,
        'TALKDECK_SENSITIVITY',
        [config?.sceneChangeThreshold, 'detection.sceneChangeThreshold']
      ),
      (raw, label) => parseNumberInRange(raw, label, unit)
    ) ?? DEFAULT_DETECTION_SETTINGS.sceneChangeThreshold
  const histogramThreshold =
    resolveLayered(
      layers(
        [cli.histogramThreshold, '--histogram-threshold'],
        env,
        'TALKDECK_HISTOGRAM_THRESHOLD',
        [config?.histogramThreshold, 'detection.histogramThreshold']
      ),
      (raw, label) => parseNumberInRange(raw, label, unit)
    ) ?? DEFAULT_DETECTION_SETTINGS.histogramThreshold
  const minTimeBetweenCaptures =
    resolveLayered(
      layers(
        [cli.minTime, '--min-time'],
        env,
        'TALKDECK_MIN_TIME',
        [config?.minTimeBetweenCaptures, 'detection.minTimeBetweenCaptures']
      ),
      (raw, label) => parseNumberInRange(raw, label, { min: 0, max: 86_400 })
    ) ?? DEFAULT_DETECTION_SETTINGS.minTimeBetweenCaptures
  const skipIntroOutro =
    resolveLayered(
      layers(
        [cli.introOutro, '--intro-outro'],
        env,
        'TALKDECK_SKIP_INTRO_OUTRO',
        [config?.skipIntroOutro, 'detection.skipIntroOutro']
      ),
      parseBoolean
    ) ?? DEFAULT_DETECTION_SETTINGS.skipIntroOutro
  const introOutroDuration =
    resolveLayered(
      layers(
        [cli.introOutroDuration, '--intro-outro-duration'],
        env,
        'TALKDECK_INTRO_OUTRO_DURATION',
        [config?.introOutroDuration, 'detection.introOutroDuration']
      ),
      (raw, label) => parseNumberInRange(raw, label, { min: 0, max: 86_400 })
    ) ?? DEFAULT_DETECTION_SETTINGS.introOutroDuration
  // SSIM needs at least one 7x7 window.
  const comparisonWidth =
    resolveLayered(
      layers(
        [cli.comparisonWidth, '--comparison-width'],
        env,
        'TALKDECK_COMPARISON_WIDTH',
        [config?.comparisonWidth, 'detection.comparisonWidth']
      ),
      (raw, label) => parsePositiveInt(raw, label, 7)
    ) ?? DEFAULT_DETECTION_SETTINGS.comparisonWidth

  return {
    sceneChangeThreshold,
    histogramThreshold,
    minTimeBetweenCaptures,
    skipIntroOutro,
    introOutroDuration,
    comparisonWidth,
  }
}

export function resolveSlideSettings({
  cli,
  env,
  config,
}: {
  cli: SlideSettingsInput
  env: Env
  config: SlidesConfig | undefined
}): SlideSettings {
  const frameRate =
    resolveLayered(
      layers([cli.frameRate, '--frame-rate'], env, 'TALKDECK_FRAME_RATE', [
        config?.frameRate,
        'slides.frameRate',
      ]),
      (raw, label) => parseNumberInRange(raw, label, { min: 0, max: 60, exclusiveMin: true })
    ) ?? DEFAULT_SLIDE_SETTINGS.frameRate
  const analysisWidth =
    resolveLayered(
      layers([cli.analysisWidth, '--analysis-width'], env, 'TALKDECK_ANALYSIS_WIDTH', [
        config?.analysisWidth,
        'slides.analysisWidth',
      ]),
      (raw, label) => parsePositiveInt(raw, label, 16)
    ) ?? DEFAULT_SLIDE_SETTINGS.analysisWidth
  const timeLimitPerSlide =
    resolveLayered(
      layers([cli.timeLimit, '--time-limit'], env, 'TALKDECK_TIME_LIMIT', [
        config?.timeLimitPerSlide,
        'slides.timeLimitPerSlide',
      ]),
      (raw, label) => parseNumberInRange(raw, label, { min: 0, max: 86_400, exclusiveMin: true })
    ) ?? DEFAULT_SLIDE_SETTINGS.timeLimitPerSlide
  const minConfidence =
    resolveLayered(
      layers([cli.minConfidence, '--min-confidence'], env, 'TALKDECK_MIN_CONFIDENCE', [
        config?.minConfidence,
        'slides.minConfidence',
      ]),
      (raw, label) => parseNumberInRange(raw, label, { min: 0, max: 1 })
    ) ?? DEFAULT_SLIDE_SETTINGS.minConfidence
  const mergeThreshold =
    resolveLayered(
      layers([cli.mergeThreshold, '--merge-threshold'], env, 'TALKDECK_MERGE_THRESHOLD', [
        config?.mergeThreshold,
        'slides.mergeThreshold',
      ]),
      (raw, label) => parseNumberInRange(raw, label, { min: 0, max: 3600 })
    ) ?? DEFAULT_SLIDE_SETTINGS.mergeThreshold

  return { frameRate, analysisWidth, timeLimitPerSlide, minConfidence, mergeThreshold }
}
