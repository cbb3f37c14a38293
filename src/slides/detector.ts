import { formatErrorMessage, isNamedError, throwIfAborted } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import { createFrameComparator } from './similarity.js'
import type {
  ContentSceneDetector,
  DetectionSettings,
  Frame,
  FrameComparator,
  SceneChange,
  SceneChangeMethod,
} from './types.js'

// The content detector reports cuts without a score.
export const CONTENT_DETECTOR_CONFIDENCE = 0.8

export type SceneDetectorOptions = {
  settings: DetectionSettings
  comparator?: FrameComparator
  contentDetector?: ContentSceneDetector | null
  logger?: AppLogger | null
}

export function createSceneChange(
  timestamp: number,
  confidence: number,
  method: SceneChangeMethod
): SceneChange {
  return Object.freeze({ timestamp, confidence, method })
}

/**
 * Turns a sampled frame sequence into scene changes.
 *
 * The detector keeps a watermark (`lastCaptureTime`) of the last accepted change.
 * It only moves forward and survives across calls, so one instance must be used
 * per video and never shared between concurrent scans.
 */
export class SceneDetector {
  private readonly settings: DetectionSettings
  private readonly comparator: FrameComparator
  private readonly contentDetector: ContentSceneDetector | null
  private readonly logger: AppLogger | null
  private watermark = 0

  constructor({ settings, comparator, contentDetector, logger }: SceneDetectorOptions) {
    this.settings = settings
    this.comparator =
      comparator ?? createFrameComparator({ comparisonWidth: settings.comparisonWidth })
    this.contentDetector = contentDetector ?? null
    this.logger = logger ?? null
  }

  get lastCaptureTime(): number {
    return this.watermark
  }

  detectScenes(frames: readonly Frame[], { signal }: { signal?: AbortSignal } = {}): SceneChange[] {
    if (frames.length < 2) return []

    const candidates: SceneChange[] = []
    for (let i = 1; i < frames.length; i += 1) {
      throwIfAborted(signal)
      const previous = frames[i - 1]
      const current = frames[i]
      const scores = this.comparator.compare(previous, current)
      if (scores.structural > this.settings.sceneChangeThreshold) {
        candidates.push(createSceneChange(current.timestamp, scores.structural, 'structural'))
      }
      if (scores.histogram > this.settings.histogramThreshold) {
        candidates.push(createSceneChange(current.timestamp, scores.histogram, 'histogram'))
      }
    }

    // Array.prototype.sort is stable: structural before histogram at equal timestamps.
    candidates.sort((a, b) => a.timestamp - b.timestamp)
    const accepted = this.applyWatermarkGate(candidates)
    this.logger?.debug(
      `frames=${frames.length} candidates=${candidates.length} accepted=${accepted.length}`
    )
    return accepted
  }

  async detectScenesAdvanced(
    videoPath: string,
    { signal }: { signal?: AbortSignal } = {}
  ): Promise<SceneChange[]> {
    if (!this.contentDetector) {
      this.logger?.warn('content-based detection unavailable')
      return []
    }
    let timestamps: number[]
    try {
      timestamps = await this.contentDetector.detect(videoPath, {
        threshold: this.settings.sceneChangeThreshold,
        signal,
      })
    } catch (error) {
      if (isNamedError(error, 'AbortError')) throw error
      this.logger?.warn(`content-based detection failed: ${formatErrorMessage(error)}`)
      return []
    }
    const candidates = timestamps
      .filter((value) => Number.isFinite(value))
      .map((timestamp) => createSceneChange(timestamp, CONTENT_DETECTOR_CONFIDENCE, 'content'))
    return this.applyWatermarkGate(candidates)
  }

  filterChangesByConfidence(changes: readonly SceneChange[], minConfidence = 0.5): SceneChange[] {
    return changes.filter((change) => change.confidence >= minConfidence)
  }

  /**
   * Collapses changes closer than `timeThreshold` to the last kept one, keeping the
   * more confident change (the earlier one on ties). Expects timestamp order.
   */
  mergeNearbyChanges(changes: readonly SceneChange[], timeThreshold = 1.0): SceneChange[] {
    const merged: SceneChange[] = []
    for (const change of changes) {
      const last = merged[merged.length - 1]
      if (last && change.timestamp - last.timestamp <= timeThreshold) {
        if (change.confidence > last.confidence) merged[merged.length - 1] = change
        continue
      }
      merged.push(change)
    }
    return merged
  }

  skipIntroOutro(changes: readonly SceneChange[], videoDuration: number): SceneChange[] {
    if (!this.settings.skipIntroOutro) return changes.slice()
    const cutoff = this.settings.introOutroDuration
    return changes.filter(
      (change) => change.timestamp >= cutoff && change.timestamp <= videoDuration - cutoff
    )
  }

  private applyWatermarkGate(candidates: readonly SceneChange[]): SceneChange[] {
    const accepted: SceneChange[] = []
    for (const candidate of candidates) {
      if (candidate.timestamp - this.watermark >= this.settings.minTimeBetweenCaptures) {
        accepted.push(candidate)
        this.watermark = candidate.timestamp
      }
    }
    return accepted
  }
}
