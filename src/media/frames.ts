import { createInsufficientInputError } from '../errors.js'
import type { Frame } from '../slides/types.js'
import { runProcessCaptureBuffer } from './process.js'

export type FrameSamplingOptions = {
  ffmpegPath: string
  inputPath: string
  frameRate: number
  analysisWidth: number
  sourceWidth: number
  sourceHeight: number
  startSeconds?: number
  endSeconds?: number | null
  timeoutMs: number
  signal?: AbortSignal
}

/**
 * Output height for a scaled width, rounded to an even number the way `scale=W:-2` does.
 */
export function resolveAnalysisHeight(
  analysisWidth: number,
  sourceWidth: number,
  sourceHeight: number
): number {
  const scaled = (analysisWidth * sourceHeight) / sourceWidth
  return Math.max(2, Math.round(scaled / 2) * 2)
}

export function buildFrameSamplingArgs(options: FrameSamplingOptions, height: number): string[] {
  const start = Math.max(0, options.startSeconds ?? 0)
  const end = options.endSeconds ?? null
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    ...(start > 0 ? ['-ss', String(start)] : []),
    ...(end != null && end > start ? ['-t', String(end - start)] : []),
    '-i',
    options.inputPath,
    '-an',
    '-sn',
    '-vf',
    `fps=${options.frameRate},scale=${options.analysisWidth}:${height}`,
    '-pix_fmt',
    'rgb24',
    '-f',
    'rawvideo',
    '-',
  ]
}

/**
 * Cuts a raw rgb24 stream into frames stamped `start + i / frameRate`.
 * A trailing partial frame is dropped.
 */
export function splitRawFrames(
  buffer: Uint8Array,
  { width, height, frameRate, startSeconds }: {
    width: number
    height: number
    frameRate: number
    startSeconds: number
  }
): Frame[] {
  const frameBytes = width * height * 3
  const count = Math.floor(buffer.length / frameBytes)
  const frames: Frame[] = []
  for (let i = 0; i < count; i += 1) {
    const data = buffer.subarray(i * frameBytes, (i + 1) * frameBytes)
    frames.push({ timestamp: startSeconds + i / frameRate, image: { width, height, data } })
  }
  return frames
}

export async function sampleFrames(options: FrameSamplingOptions): Promise<Frame[]> {
  if (!(options.frameRate > 0)) {
    throw new Error(`frameRate must be positive (got ${options.frameRate})`)
  }
  if (!(options.sourceWidth > 0) || !(options.sourceHeight > 0)) {
    throw createInsufficientInputError('Video has no decodable video stream')
  }
  const width = Math.min(options.analysisWidth, options.sourceWidth)
  const height = resolveAnalysisHeight(width, options.sourceWidth, options.sourceHeight)
  const buffer = await runProcessCaptureBuffer({
    command: options.ffmpegPath,
    args: buildFrameSamplingArgs({ ...options, analysisWidth: width }, height),
    timeoutMs: options.timeoutMs,
    errorLabel: 'ffmpeg',
    signal: options.signal,
  })
  return splitRawFrames(buffer, {
    width,
    height,
    frameRate: options.frameRate,
    startSeconds: Math.max(0, options.startSeconds ?? 0),
  })
}
