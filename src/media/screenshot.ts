import { runProcess } from './process.js'

export type ScreenshotFormat = 'png' | 'jpg'

export type Screenshotter = {
  capture: (args: {
    videoPath: string
    timestamp: number
    outputPath: string
    signal?: AbortSignal
  }) => Promise<void>
}

export function buildScreenshotArgs({
  videoPath,
  timestamp,
  outputPath,
  width,
  format,
}: {
  videoPath: string
  timestamp: number
  outputPath: string
  width: number | null
  format: ScreenshotFormat
}): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-ss',
    Math.max(0, timestamp).toFixed(3),
    '-i',
    videoPath,
    '-frames:v',
    '1',
    ...(width ? ['-vf', `scale=${width}:-2`] : []),
    ...(format === 'jpg' ? ['-q:v', '2'] : []),
    '-y',
    outputPath,
  ]
}

export function createFfmpegScreenshotter({
  ffmpegPath,
  timeoutMs,
  width = null,
  format = 'png',
}: {
  ffmpegPath: string
  timeoutMs: number
  width?: number | null
  format?: ScreenshotFormat
}): Screenshotter {
  return {
    async capture({ videoPath, timestamp, outputPath, signal }) {
      await runProcess({
        command: ffmpegPath,
        args: buildScreenshotArgs({ videoPath, timestamp, outputPath, width, format }),
        timeoutMs,
        errorLabel: 'ffmpeg',
        signal,
      })
    },
  }
}
