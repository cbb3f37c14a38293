import type { TranscriptSegment } from '../transcript/types.js'

/**
 * Interleaved 8-bit RGB pixels, `width * height * 3` bytes.
 */
export type RgbImage = {
  width: number
  height: number
  data: Uint8Array
}

export type Frame = {
  timestamp: number
  image: RgbImage
}

export type SceneChangeMethod = 'structural' | 'histogram' | 'content'

export type SceneChange = Readonly<{
  timestamp: number
  confidence: number
  method: SceneChangeMethod
}>

export type FrameDissimilarity = {
  structural: number
  histogram: number
}

export type FrameComparator = {
  compare: (previous: Frame, current: Frame) => FrameDissimilarity
}

/**
 * Finds cut timestamps directly on the video source, bypassing sampled frames.
 */
export type ContentSceneDetector = {
  detect: (
    videoPath: string,
    options: { threshold: number; signal?: AbortSignal }
  ) => Promise<number[]>
}

export type SlideWindow = {
  start: number
  end: number
  index: number
}

export type SlideContent = {
  window: SlideWindow
  segments: TranscriptSegment[]
  text: string
}

export type DetectionSettings = {
  sceneChangeThreshold: number
  histogramThreshold: number
  minTimeBetweenCaptures: number
  skipIntroOutro: boolean
  introOutroDuration: number
  /** Width the luminance plane is block-averaged to before SSIM; null compares at analysis size. */
  comparisonWidth: number | null
}
