import { randomUUID } from 'node:crypto'
import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { formatErrorMessage, isNamedError } from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import { runProcess } from './process.js'

export const VIDEO_QUALITY_PRESETS = {
  '144p': 'worst[height<=144]',
  '240p': 'worst[height<=240]',
  '360p': 'worst[height<=360]',
  '480p': 'worst[height<=480]',
  '720p': 'best[height<=720]',
  '1080p': 'best[height<=1080]',
  '1440p': 'best[height<=1440]',
  '2160p': 'best[height<=2160]',
} as const

export type VideoQuality = keyof typeof VIDEO_QUALITY_PRESETS

export const VIDEO_QUALITIES = Object.keys(VIDEO_QUALITY_PRESETS)

export function isVideoQuality(value: string): value is VideoQuality {
  return Object.hasOwn(VIDEO_QUALITY_PRESETS, value)
}

export type DownloadedVideo = {
  videoPath: string
  subtitleFiles: string[]
  title: string | null
  cleanup: () => Promise<void>
}

const VIDEO_EXTENSIONS = ['.mp4', '.webm', '.mkv', '.mov']
const SUBTITLE_EXTENSIONS = ['.srt', '.vtt', '.json']

export function isRemoteInput(input: string): boolean {
  return /^https?:\/\//i.test(input.trim())
}

/**
 * Argument lists tried in order: all subtitles, manual subtitles only, video only.
 */
export function buildYtDlpAttempts({
  url,
  quality,
  outputTemplate,
}: {
  url: string
  quality: VideoQuality
  outputTemplate: string
}): string[][] {
  const base = ['--format', VIDEO_QUALITY_PRESETS[quality], '--no-playlist', '--write-info-json']
  const tail = ['--output', outputTemplate, url]
  return [
    [
      ...base,
      '--write-subs',
      '--write-auto-subs',
      '--sub-format',
      'srt',
      '--sub-langs',
      'en,en-US,en-GB',
      '--convert-subs',
      'srt',
      ...tail,
    ],
    [...base, '--write-subs', '--sub-format', 'srt', ...tail],
    [...base, ...tail],
  ]
}

async function readInfoTitle(dir: string, entries: string[]): Promise<string | null> {
  const infoFile = entries.find((entry) => entry.endsWith('.info.json'))
  if (!infoFile) return null
  const raw = await fs.readFile(path.join(dir, infoFile), 'utf8')
  const info: unknown = JSON.parse(raw)
  if (typeof info === 'object' && info !== null && 'title' in info) {
    return typeof info.title === 'string' ? info.title : null
  }
  return null
}

export async function downloadWithYtDlp({
  ytDlpPath,
  url,
  quality,
  timeoutMs,
  logger,
  signal,
}: {
  ytDlpPath: string
  url: string
  quality: VideoQuality
  timeoutMs: number
  logger?: AppLogger | null
  signal?: AbortSignal
}): Promise<DownloadedVideo> {
  const dir = await fs.mkdtemp(path.join(tmpdir(), `talkdeck-${randomUUID()}-`))
  const cleanup = async () => {
    await fs.rm(dir, { recursive: true, force: true })
  }
  const outputTemplate = path.join(dir, '%(id)s.%(ext)s')

  try {
    const attempts = buildYtDlpAttempts({ url, quality, outputTemplate })
    let lastError: unknown = null
    for (const [index, args] of attempts.entries()) {
      try {
        await runProcess({ command: ytDlpPath, args, timeoutMs, errorLabel: 'yt-dlp', signal })
        lastError = null
        if (index === attempts.length - 1) {
          logger?.warn('downloaded video without subtitles')
        }
        break
      } catch (error) {
        if (isNamedError(error, 'AbortError')) throw error
        lastError = error
        logger?.debug(`yt-dlp attempt ${index + 1} failed: ${formatErrorMessage(error)}`)
      }
    }
    if (lastError) throw lastError

    const entries = (await fs.readdir(dir)).sort()
    const videoFile = entries.find((entry) =>
      VIDEO_EXTENSIONS.includes(path.extname(entry).toLowerCase())
    )
    if (!videoFile) throw new Error('yt-dlp completed but no video file was downloaded.')
    const subtitleFiles = entries
      .filter((entry) => !entry.endsWith('.info.json'))
      .filter((entry) => SUBTITLE_EXTENSIONS.includes(path.extname(entry).toLowerCase()))
      .map((entry) => path.join(dir, entry))

    return {
      videoPath: path.join(dir, videoFile),
      subtitleFiles,
      title: await readInfoTitle(dir, entries),
      cleanup,
    }
  } catch (error) {
    await cleanup()
    throw error
  }
}
