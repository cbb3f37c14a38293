import type { EnhancementOutcome } from '../enhance/enhancer.js'
import type { EnhancementStats } from '../enhance/types.js'
import type { VideoInfo } from '../media/probe.js'
import type { Screenshotter } from '../media/screenshot.js'
import type { DownloadedVideo } from '../media/yt-dlp.js'
import type { DeckSlide } from '../render/types.js'
import type { ContentSceneDetector, Frame, SceneChange, SlideWindow } from '../slides/types.js'
import type { TranscriptSegment } from '../transcript/types.js'

/** Where one video's files land; paths are relative to `root`. */
export type OutputSink = {
  root: string
  ensureDir: (relativePath: string) => Promise<void>
  writeText: (relativePath: string, content: string) => Promise<void>
}

export type FrameSource = {
  sample: (args: {
    videoPath: string
    info: VideoInfo
    frameRate: number
    analysisWidth: number
    startSeconds: number
    endSeconds: number | null
    signal?: AbortSignal
  }) => Promise<Frame[]>
}

export type SegmentEnhancer = {
  enhanceSegments: (
    segments: readonly TranscriptSegment[],
    options: { signal?: AbortSignal }
  ) => Promise<EnhancementOutcome>
}

export type PipelineDeps = {
  probe: (videoPath: string, signal?: AbortSignal) => Promise<VideoInfo>
  frames: FrameSource
  contentDetector: ContentSceneDetector | null
  screenshotter: Screenshotter
  /** Null when remote inputs cannot be fetched (no yt-dlp). */
  download: ((url: string, signal?: AbortSignal) => Promise<DownloadedVideo>) | null
  /** Candidate subtitle files for a local video. */
  findSubtitles: (videoPath: string) => Promise<string[]>
  loadSubtitles: (
    files: readonly string[]
  ) => Promise<{ file: string; segments: TranscriptSegment[] } | null>
  enhancer: SegmentEnhancer | null
  sink: OutputSink
  now?: () => Date
}

export type VideoInput = {
  /** Local path or http(s) URL. */
  source: string
  /** Explicit subtitle file; skips discovery. */
  subtitlesPath?: string | null
}

export type DeckResult = {
  title: string
  source: string
  outputDir: string
  documentPath: string
  durationSeconds: number | null
  changes: SceneChange[]
  windows: SlideWindow[]
  slides: DeckSlide[]
  transcriptFile: string | null
  enhancement: EnhancementStats | null
  warnings: string[]
}
