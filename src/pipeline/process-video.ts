import path from 'node:path'

import type { EnhancedSegment, EnhancementStats } from '../enhance/types.js'
import {
  createInsufficientInputError,
  formatErrorMessage,
  isNamedError,
  throwIfAborted,
} from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import { isRemoteInput } from '../media/yt-dlp.js'
import { formatGeneratedAt, screenshotFileName } from '../render/format.js'
import { loadDeckTemplate, renderDeckHtml } from '../render/html.js'
import { renderDeckMarkdown } from '../render/markdown.js'
import {
  ENHANCED_TRANSCRIPT_FILE,
  ORIGINAL_TRANSCRIPT_FILE,
  renderEnhancedTranscript,
  renderOriginalTranscript,
} from '../render/transcript-files.js'
import type { DeckDocument, DeckSlide } from '../render/types.js'
import type { TalkdeckSettings } from '../run/run-settings.js'
import { SceneDetector } from '../slides/detector.js'
import type { SceneChange, SlideContent, SlideWindow } from '../slides/types.js'
import {
  assignTranscriptToWindows,
  buildSlideWindows,
  filterWindowsWithTranscript,
} from '../slides/windows.js'
import type { TranscriptSegment } from '../transcript/types.js'
import type { DeckResult, PipelineDeps, VideoInput } from './types.js'

export const PICS_DIR = 'pics'
export const MANIFEST_FILE = 'slides.json'

type StageLoggers = Record<'media' | 'detect' | 'windows' | 'enhance' | 'render', AppLogger | null>

function createStageLoggers(logger: AppLogger | null): StageLoggers {
  const sub = (name: string) => logger?.getSubLogger({ name }) ?? null
  return {
    media: sub('media'),
    detect: sub('detect'),
    windows: sub('windows'),
    enhance: sub('enhance'),
    render: sub('render'),
  }
}

/**
 * Frame range to decode: the intro and outro are skipped at sampling time when the
 * video is long enough to keep something in between.
 */
export function resolveSamplingRange(
  durationSeconds: number | null,
  { skipIntroOutro, introOutroDuration }: TalkdeckSettings['detection']
): { startSeconds: number; endSeconds: number | null } {
  if (!skipIntroOutro || durationSeconds == null || durationSeconds <= introOutroDuration * 2) {
    return { startSeconds: 0, endSeconds: null }
  }
  return { startSeconds: introOutroDuration, endSeconds: durationSeconds - introOutroDuration }
}

/**
 * First change inside the window, else the window start. Window 0 opens at 0 but
 * shows the slide of the first change.
 */
export function resolveScreenshotTime(
  window: SlideWindow,
  changes: readonly SceneChange[]
): number {
  const inside = changes.find(
    (change) => change.timestamp >= window.start && change.timestamp < window.end
  )
  return inside ? inside.timestamp : window.start
}

function titleFromSource(source: string): string {
  if (isRemoteInput(source)) return source
  return path.basename(source, path.extname(source))
}

function buildSlides(
  contents: readonly SlideContent[],
  enhanced: ReadonlyMap<TranscriptSegment, EnhancedSegment> | null,
  screenshots: ReadonlyMap<number, string>
): DeckSlide[] {
  return contents.map((content) => {
    let enhancedText: string | null = null
    const keyPoints: string[] = []
    let rewritten = false
    if (enhanced) {
      const parts: string[] = []
      for (const segment of content.segments) {
        const entry = enhanced.get(segment)
        if (!entry) continue
        const text = entry.enhancedText.trim()
        if (text) parts.push(text)
        if (text !== segment.text.trim()) rewritten = true
        keyPoints.push(...entry.keyPoints.filter((point) => !keyPoints.includes(point)))
      }
      enhancedText = rewritten && parts.length > 0 ? parts.join(' ') : null
    }
    return {
      number: content.window.index + 1,
      window: content.window,
      screenshotPath: screenshots.get(content.window.index) ?? null,
      transcriptText: content.text,
      enhancedText,
      keyPoints,
    }
  })
}

async function loadTranscript(
  input: VideoInput,
  videoPath: string,
  downloadedSubtitles: readonly string[],
  deps: PipelineDeps
): Promise<{ file: string; segments: TranscriptSegment[] } | null> {
  if (input.subtitlesPath) return deps.loadSubtitles([input.subtitlesPath])
  const candidates =
    downloadedSubtitles.length > 0 ? downloadedSubtitles : await deps.findSubtitles(videoPath)
  return candidates.length > 0 ? deps.loadSubtitles(candidates) : null
}

/**
 * One video end to end: fetch, probe, sample, detect, window, enhance, capture,
 * render. Throws `InsufficientInputError` when no slide change is found.
 */
export async function processVideo({
  input,
  settings,
  deps,
  logger = null,
  signal,
}: {
  input: VideoInput
  settings: TalkdeckSettings
  deps: PipelineDeps
  logger?: AppLogger | null
  signal?: AbortSignal
}): Promise<DeckResult> {
  const log = createStageLoggers(logger)
  const warnings: string[] = []
  const warn = (stageLogger: AppLogger | null, message: string) => {
    warnings.push(message)
    stageLogger?.warn(message)
  }

  let videoPath = input.source
  let downloadedSubtitles: string[] = []
  let downloadedTitle: string | null = null
  let cleanup: (() => Promise<void>) | null = null

  if (isRemoteInput(input.source)) {
    if (!deps.download) {
      throw new Error('Remote inputs need yt-dlp (install it or set YT_DLP_PATH).')
    }
    log.media?.info(`downloading ${input.source}`)
    const downloaded = await deps.download(input.source, signal)
    videoPath = downloaded.videoPath
    downloadedSubtitles = downloaded.subtitleFiles
    downloadedTitle = downloaded.title
    cleanup = downloaded.cleanup
  }

  try {
    throwIfAborted(signal)
    const info = await deps.probe(videoPath, signal)
    const duration = info.durationSeconds
    log.media?.info(
      `video ${info.width ?? '?'}x${info.height ?? '?'}, ${duration?.toFixed(1) ?? '?'}s`
    )

    const range = resolveSamplingRange(duration, settings.detection)
    const frames = await deps.frames.sample({
      videoPath,
      info,
      frameRate: settings.slides.frameRate,
      analysisWidth: settings.slides.analysisWidth,
      startSeconds: range.startSeconds,
      endSeconds: range.endSeconds,
      signal,
    })
    log.detect?.debug(`sampled ${frames.length} frames from ${range.startSeconds}s`)

    const detector = new SceneDetector({
      settings: settings.detection,
      contentDetector: deps.contentDetector,
      logger: log.detect,
    })
    let changes = detector.detectScenes(frames, { signal })
    if (changes.length === 0) {
      log.detect?.info('no change in sampled frames, trying content-based detection')
      changes = await detector.detectScenesAdvanced(videoPath, { signal })
    }
    changes = detector.filterChangesByConfidence(changes, settings.slides.minConfidence)
    changes = detector.mergeNearbyChanges(changes, settings.slides.mergeThreshold)
    if (duration != null) changes = detector.skipIntroOutro(changes, duration)
    if (changes.length === 0) {
      throw createInsufficientInputError(`No slide changes detected in ${input.source}`)
    }
    log.detect?.info(`${changes.length} slide changes`)

    const transcript = await loadTranscript(input, videoPath, downloadedSubtitles, deps)
    const segments = transcript?.segments ?? []
    if (transcript) {
      log.windows?.info(`${segments.length} transcript segments from ${path.basename(transcript.file)}`)
    } else {
      warn(log.windows, 'No subtitles found; slides will have no transcript.')
    }

    const allWindows = buildSlideWindows(changes, settings.slides.timeLimitPerSlide)
    const windows = segments.length > 0 ? filterWindowsWithTranscript(allWindows, segments) : allWindows
    if (windows.length === 0) {
      throw createInsufficientInputError('No slide window overlaps the transcript')
    }
    const contents = assignTranscriptToWindows(windows, segments)
    log.windows?.debug(`${allWindows.length} windows, ${windows.length} with transcript`)

    let enhancedBySegment: Map<TranscriptSegment, EnhancedSegment> | null = null
    let enhancedSegments: EnhancedSegment[] | null = null
    let enhancementStats: EnhancementStats | null = null
    if (settings.enhancement.enabled && segments.length > 0) {
      if (!deps.enhancer) {
        warn(log.enhance, 'Enhancement requested but no model client is available; skipping.')
      } else {
        const outcome = await deps.enhancer.enhanceSegments(segments, { signal })
        enhancedSegments = outcome.segments
        enhancementStats = outcome.stats
        enhancedBySegment = new Map(outcome.segments.map((entry) => [entry.segment, entry]))
        // The enhancer has already logged these.
        warnings.push(...outcome.stats.errors)
        if (outcome.stats.costLimitReached) {
          warnings.push('Cost limit reached; later segments keep their original text.')
        }
      }
    }

    const { sink } = deps
    const extension = settings.output.screenshotFormat
    const screenshots = new Map<number, string>()
    await sink.ensureDir(PICS_DIR)
    for (const window of windows) {
      throwIfAborted(signal)
      const relative = `${PICS_DIR}/${screenshotFileName(window.index + 1, extension)}`
      try {
        await deps.screenshotter.capture({
          videoPath,
          timestamp: resolveScreenshotTime(window, changes),
          outputPath: path.join(sink.root, relative),
          signal,
        })
        screenshots.set(window.index, relative)
      } catch (error) {
        if (isNamedError(error, 'AbortError') || signal?.aborted) throw error
        warn(log.media, `Screenshot for slide ${window.index + 1} failed: ${formatErrorMessage(error)}`)
      }
    }

    const now = deps.now ?? (() => new Date())
    const deck: DeckDocument = {
      title: downloadedTitle ?? titleFromSource(input.source),
      source: input.source,
      generatedAt: formatGeneratedAt(now()),
      durationSeconds: duration,
      slides: buildSlides(contents, enhancedBySegment, screenshots),
    }
    const renderOptions = {
      includeTimestamps: settings.output.includeTimestamps,
      includeNavigation: settings.output.includeNavigation,
    }
    const document =
      settings.output.format === 'html'
        ? renderDeckHtml(deck, renderOptions, await loadDeckTemplate())
        : renderDeckMarkdown(deck, renderOptions)
    await sink.writeText(settings.output.fileName, document)

    if (settings.output.writeTranscripts && segments.length > 0) {
      await sink.writeText(ORIGINAL_TRANSCRIPT_FILE, renderOriginalTranscript(segments))
      if (enhancedSegments) {
        await sink.writeText(ENHANCED_TRANSCRIPT_FILE, renderEnhancedTranscript(enhancedSegments))
      }
    }

    const result: DeckResult = {
      title: deck.title,
      source: input.source,
      outputDir: sink.root,
      documentPath: path.join(sink.root, settings.output.fileName),
      durationSeconds: duration,
      changes,
      windows,
      slides: deck.slides,
      transcriptFile: transcript?.file ?? null,
      enhancement: enhancementStats,
      warnings,
    }
    await sink.writeText(MANIFEST_FILE, `${JSON.stringify(buildManifest(result, settings, deck), null, 2)}\n`)
    log.render?.info(`wrote ${deck.slides.length} slides to ${result.documentPath}`)
    return result
  } finally {
    if (cleanup) await cleanup()
  }
}

function buildManifest(result: DeckResult, settings: TalkdeckSettings, deck: DeckDocument) {
  return {
    title: result.title,
    source: result.source,
    generatedAt: deck.generatedAt,
    durationSeconds: result.durationSeconds,
    document: settings.output.fileName,
    settings: { detection: settings.detection, slides: settings.slides },
    changes: result.changes,
    windows: result.windows,
    slides: result.slides.map((slide) => ({
      number: slide.number,
      start: slide.window.start,
      end: slide.window.end,
      screenshot: slide.screenshotPath,
      enhanced: slide.enhancedText != null,
      keyPoints: slide.keyPoints.length,
    })),
    enhancement: result.enhancement,
    warnings: result.warnings,
  }
}
