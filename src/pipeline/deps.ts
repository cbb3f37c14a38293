import { EnhancementCache } from '../enhance/cache.js'
import { TranscriptEnhancer } from '../enhance/enhancer.js'
import type { GenerateTextFn } from '../llm/generate-text.js'
import type { AppLogger } from '../logging/logger.js'
import { createFfmpegContentDetector } from '../media/content-detector.js'
import type { MediaTools } from '../media/env.js'
import { sampleFrames } from '../media/frames.js'
import { probeVideo } from '../media/probe.js'
import { createFfmpegScreenshotter } from '../media/screenshot.js'
import { downloadWithYtDlp } from '../media/yt-dlp.js'
import type { TalkdeckSettings } from '../run/run-settings.js'
import { findSiblingSubtitleFiles, loadPreferredSubtitles } from '../transcript/subtitles.js'
import { createFileSink } from './sink.js'
import type { PipelineDeps } from './types.js'

/**
 * Production wiring: ffmpeg/ffprobe for media, yt-dlp for URLs, files under
 * `outputDir`. Enhancement runs only when a model client is passed in.
 */
export async function createPipelineDeps({
  tools,
  settings,
  outputDir,
  generate,
  logger = null,
}: {
  tools: MediaTools
  settings: TalkdeckSettings
  outputDir: string
  generate: GenerateTextFn | null
  logger?: AppLogger | null
}): Promise<PipelineDeps> {
  const { ffmpegPath, ffprobePath, ytDlpPath } = tools
  if (!ffmpegPath || !ffprobePath) {
    throw new Error('Missing ffmpeg/ffprobe (install them or set FFMPEG_PATH / FFPROBE_PATH).')
  }
  const timeoutMs = settings.media.timeoutMs

  let enhancer: TranscriptEnhancer | null = null
  if (generate && settings.enhancement.enabled) {
    const cache = settings.enhancement.cache
      ? EnhancementCache.forOutputDir(outputDir)
      : new EnhancementCache()
    await cache.load()
    enhancer = new TranscriptEnhancer({
      settings: settings.enhancement,
      generate,
      cache,
      logger: logger?.getSubLogger({ name: 'enhance' }) ?? null,
    })
  }

  return {
    probe: (videoPath, signal) => probeVideo({ ffprobePath, inputPath: videoPath, timeoutMs, signal }),
    frames: {
      sample: ({ videoPath, info, frameRate, analysisWidth, startSeconds, endSeconds, signal }) =>
        sampleFrames({
          ffmpegPath,
          inputPath: videoPath,
          frameRate,
          analysisWidth,
          sourceWidth: info.width ?? 0,
          sourceHeight: info.height ?? 0,
          startSeconds,
          endSeconds,
          timeoutMs,
          signal,
        }),
    },
    contentDetector: createFfmpegContentDetector({ ffmpegPath, timeoutMs }),
    screenshotter: createFfmpegScreenshotter({
      ffmpegPath,
      timeoutMs,
      width: settings.output.screenshotWidth,
      format: settings.output.screenshotFormat,
    }),
    download: ytDlpPath
      ? (url, signal) =>
          downloadWithYtDlp({
            ytDlpPath,
            url,
            quality: settings.media.videoQuality,
            timeoutMs,
            logger: logger?.getSubLogger({ name: 'media' }) ?? null,
            signal,
          })
      : null,
    findSubtitles: findSiblingSubtitleFiles,
    loadSubtitles: loadPreferredSubtitles,
    enhancer,
    sink: createFileSink(outputDir),
  }
}
