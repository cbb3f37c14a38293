import { cleanTranscriptText } from '../transcript/text.js'
import type { TranscriptSegment } from '../transcript/types.js'
import type { SceneChange, SlideContent, SlideWindow } from './types.js'

/**
 * Partitions the timeline at each change. Window 0 starts at 0; the last window
 * runs `timeLimitPerSlide` past the final change. Windows longer than the limit
 * are cut into consecutive pieces no longer than the limit.
 */
export function buildSlideWindows(
  changes: readonly SceneChange[],
  timeLimitPerSlide: number
): SlideWindow[] {
  if (changes.length === 0) return []
  if (!(timeLimitPerSlide > 0)) {
    throw new Error(`timeLimitPerSlide must be positive (got ${timeLimitPerSlide})`)
  }

  const windows: SlideWindow[] = []
  const push = (start: number, end: number) => {
    if (end > start) windows.push({ start, end, index: windows.length })
  }

  for (let i = 0; i < changes.length; i += 1) {
    const start = i === 0 ? 0 : changes[i].timestamp
    const next = changes[i + 1]
    const end = next ? next.timestamp : changes[i].timestamp + timeLimitPerSlide
    let cursor = start
    while (end - cursor > timeLimitPerSlide) {
      push(cursor, cursor + timeLimitPerSlide)
      cursor += timeLimitPerSlide
    }
    push(cursor, end)
  }
  return windows
}

export function segmentOverlapsWindow(segment: TranscriptSegment, window: SlideWindow): boolean {
  return segment.start <= window.end && segment.end >= window.start
}

export function filterWindowsWithTranscript(
  windows: readonly SlideWindow[],
  segments: readonly TranscriptSegment[]
): SlideWindow[] {
  return windows
    .filter((window) => segments.some((segment) => segmentOverlapsWindow(segment, window)))
    .map((window, index) => ({ ...window, index }))
}

export function assignTranscriptToWindows(
  windows: readonly SlideWindow[],
  segments: readonly TranscriptSegment[]
): SlideContent[] {
  return windows.map((window) => {
    const overlapping = segments.filter((segment) => segmentOverlapsWindow(segment, window))
    const text = overlapping
      .map((segment) => cleanTranscriptText(segment.text))
      .filter((value) => value.length > 0)
      .join(' ')
    return { window, segments: overlapping, text }
  })
}
