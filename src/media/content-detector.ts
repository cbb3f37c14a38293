import type { ContentSceneDetector } from '../slides/types.js'
import { runProcess } from './process.js'

export function parseShowinfoTimestamp(line: string): number | null {
  if (!line.includes('showinfo')) return null
  const match = /pts_time:(\d+\.?\d*)/.exec(line)
  if (!match) return null
  const ts = Number(match[1])
  if (!Number.isFinite(ts)) return null
  return ts
}

export function buildSceneFilterArgs(inputPath: string, threshold: number): string[] {
  return [
    '-hide_banner',
    '-i',
    inputPath,
    '-vf',
    `select='gt(scene,${threshold})',showinfo`,
    '-fps_mode',
    'vfr',
    '-an',
    '-sn',
    '-f',
    'null',
    '-',
  ]
}

/**
 * Scene cuts from ffmpeg's `scene` score, read back from `showinfo` lines on stderr.
 */
export function createFfmpegContentDetector({
  ffmpegPath,
  timeoutMs,
}: {
  ffmpegPath: string
  timeoutMs: number
}): ContentSceneDetector {
  return {
    async detect(videoPath, { threshold, signal }) {
      const timestamps: number[] = []
      await runProcess({
        command: ffmpegPath,
        args: buildSceneFilterArgs(videoPath, threshold),
        timeoutMs,
        errorLabel: 'ffmpeg',
        signal,
        onStderrLine: (line) => {
          const ts = parseShowinfoTimestamp(line)
          if (ts != null) timestamps.push(ts)
        },
      })
      timestamps.sort((a, b) => a - b)
      return timestamps
    },
  }
}
