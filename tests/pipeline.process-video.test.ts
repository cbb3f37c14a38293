import path from 'node:path'
import { describe, expect, it, vi } from 'vitest'

import { TranscriptEnhancer } from '../src/enhance/enhancer.js'
import type { GenerateTextFn } from '../src/llm/generate-text.js'
import type { DownloadedVideo } from '../src/media/yt-dlp.js'
import {
  MANIFEST_FILE,
  processVideo,
  resolveSamplingRange,
  resolveScreenshotTime,
} from '../src/pipeline/process-video.js'
import type { FrameSource, OutputSink, PipelineDeps } from '../src/pipeline/types.js'
import { resolveTalkdeckSettings } from '../src/run/run-settings.js'
import { createSceneChange } from '../src/slides/detector.js'
import type { Frame, RgbImage } from '../src/slides/types.js'
import type { TranscriptSegment } from '../src/transcript/types.js'

const solid = ([r, g, b]: [number, number, number]): RgbImage => {
  const data = new Uint8Array(4 * 4 * 3)
  for (let i = 0; i < data.length; i += 3) {
    data[i] = r
    data[i + 1] = g
    data[i + 2] = b
  }
  return { width: 4, height: 4, data }
}

const BLACK = solid([0, 0, 0])
const WHITE = solid([255, 255, 255])
const RED = solid([255, 0, 0])

// Black until 5s, white until 10s, then red.
const talkFrames: Frame[] = Array.from({ length: 13 }, (_, t) => ({
  timestamp: t,
  image: t < 5 ? BLACK : t < 10 ? WHITE : RED,
}))

const talkSegments: TranscriptSegment[] = [
  { start: 1, end: 4, text: 'Welcome to the talk' },
  { start: 11, end: 15, text: 'Here are the results' },
]

function createMemorySink(): { sink: OutputSink; files: Map<string, string> } {
  const files = new Map<string, string>()
  return {
    files,
    sink: {
      root: '/deck',
      ensureDir: async () => {},
      writeText: async (relativePath, content) => {
        files.set(relativePath, content)
      },
    },
  }
}

function createDeps(overrides: Partial<PipelineDeps> = {}) {
  const { sink, files } = createMemorySink()
  const sample = vi.fn<FrameSource['sample']>(async () => talkFrames)
  const capture = vi.fn<PipelineDeps['screenshotter']['capture']>(async () => {})
  const findSubtitles = vi.fn(async (_videoPath: string) => ['/videos/talk.srt'])
  const deps: PipelineDeps = {
    probe: async () => ({ durationSeconds: 40, width: 4, height: 4 }),
    frames: { sample },
    contentDetector: null,
    screenshotter: { capture },
    download: null,
    findSubtitles,
    loadSubtitles: async (candidates) => {
      const file = candidates[0]
      return file ? { file, segments: talkSegments } : null
    },
    enhancer: null,
    sink,
    now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
    ...overrides,
  }
  return { deps, files, sample, capture, findSubtitles }
}

const settingsFor = (cli: Record<string, unknown> = {}) =>
  resolveTalkdeckSettings({
    cli: { introOutro: false, format: 'md', ...cli },
    env: {},
    config: null,
    cwd: '/deck',
  })

describe('processVideo', () => {
  it('builds a markdown deck with screenshots, transcripts and a manifest', async () => {
    const { deps, files, sample, capture } = createDeps()
    const result = await processVideo({
      input: { source: '/videos/talk.mp4' },
      settings: settingsFor(),
      deps,
    })

    expect(result.changes.map((change) => [change.timestamp, change.method])).toEqual([
      [5, 'structural'],
      [10, 'structural'],
    ])
    expect(result.windows).toEqual([
      { start: 0, end: 10, index: 0 },
      { start: 10, end: 310, index: 1 },
    ])
    expect(result.title).toBe('talk')
    expect(result.documentPath).toBe(path.join('/deck', 'presentation.md'))
    expect(result.transcriptFile).toBe('/videos/talk.srt')
    expect(result.enhancement).toBeNull()
    expect(result.warnings).toEqual([])

    expect(sample.mock.calls[0]?.[0]).toMatchObject({
      videoPath: '/videos/talk.mp4',
      frameRate: 1,
      analysisWidth: 320,
      startSeconds: 0,
      endSeconds: null,
    })
    expect(capture.mock.calls.map((call) => [call[0].timestamp, call[0].outputPath])).toEqual([
      [5, path.join('/deck', 'pics/screenshot_001.png')],
      [10, path.join('/deck', 'pics/screenshot_002.png')],
    ])

    const markdown = files.get('presentation.md') ?? ''
    expect(markdown.startsWith('# talk\n\n*Generated on 2024-01-02 03:04:05*\n')).toBe(true)
    expect(markdown).toContain('**Video Duration:** 40.0 seconds  \n**Total Slides:** 2\n')
    expect(markdown).toContain(
      [
        '<a id="slide-1"></a>',
        '',
        '## Slide 1 · 0:00–0:10',
        '',
        '![Slide 1](pics/screenshot_001.png)',
        '',
        '**Transcript:**',
        '',
        'Welcome to the talk',
        '',
        '---',
      ].join('\n')
    )
    expect(markdown).toContain('## Slide 2 · 0:10–5:10')
    expect(files.has('original_transcript.txt')).toBe(true)
    expect(files.has('enhanced_transcript.txt')).toBe(false)

    const manifest: unknown = JSON.parse(files.get(MANIFEST_FILE) ?? 'null')
    expect(manifest).toMatchObject({
      title: 'talk',
      document: 'presentation.md',
      slides: [
        {
          number: 1,
          start: 0,
          end: 10,
          screenshot: 'pics/screenshot_001.png',
          enhanced: false,
          keyPoints: 0,
        },
        {
          number: 2,
          start: 10,
          end: 310,
          screenshot: 'pics/screenshot_002.png',
          enhanced: false,
          keyPoints: 0,
        },
      ],
    })
  })

  it('adds enhanced text when a model client is available', async () => {
    const generate = vi.fn<GenerateTextFn>(async () => ({
      text: 'Rewritten text.',
      canonicalModelId: 'openai/gpt-4o-mini',
      provider: 'openai',
      usage: { promptTokens: null, completionTokens: null, totalTokens: 100 },
    }))
    const settings = settingsFor({ enhance: true, batching: false })
    const enhancer = new TranscriptEnhancer({ settings: settings.enhancement, generate })
    const { deps, files } = createDeps({ enhancer })

    const result = await processVideo({ input: { source: '/videos/talk.mp4' }, settings, deps })

    expect(generate).toHaveBeenCalledTimes(2)
    expect(result.enhancement?.enhancedSegments).toBe(2)
    expect(result.slides.map((slide) => slide.enhancedText)).toEqual([
      'Rewritten text.',
      'Rewritten text.',
    ])
    const markdown = files.get('presentation.md') ?? ''
    expect(markdown).toContain('**Enhanced Content:** 2 slides have enhanced transcripts')
    expect(markdown).toContain('**Enhanced Transcript:**\n\nRewritten text.\n')
    expect(files.get('enhanced_transcript.txt')).toContain('Enhanced: Rewritten text.')
  })

  it('warns and skips enhancement without a model client', async () => {
    const { deps } = createDeps()
    const result = await processVideo({
      input: { source: '/videos/talk.mp4' },
      settings: settingsFor({ enhance: true }),
      deps,
    })
    expect(result.enhancement).toBeNull()
    expect(result.warnings).toEqual([
      'Enhancement requested but no model client is available; skipping.',
    ])
  })

  it('keeps every window when no subtitles are found', async () => {
    const { deps, files } = createDeps({ findSubtitles: async () => [] })
    const result = await processVideo({
      input: { source: '/videos/talk.mp4' },
      settings: settingsFor(),
      deps,
    })
    expect(result.windows).toHaveLength(2)
    expect(result.transcriptFile).toBeNull()
    expect(result.warnings).toEqual(['No subtitles found; slides will have no transcript.'])
    expect(files.get('presentation.md')).toContain('*No transcript available for this slide.*')
    expect(files.has('original_transcript.txt')).toBe(false)
  })

  it('uses an explicit subtitle file instead of discovery', async () => {
    const { deps, findSubtitles } = createDeps()
    const result = await processVideo({
      input: { source: '/videos/talk.mp4', subtitlesPath: '/subs/custom.vtt' },
      settings: settingsFor(),
      deps,
    })
    expect(findSubtitles).not.toHaveBeenCalled()
    expect(result.transcriptFile).toBe('/subs/custom.vtt')
  })

  it('drops windows without speech', async () => {
    const { deps } = createDeps({
      loadSubtitles: async () => ({
        file: '/videos/talk.srt',
        segments: [{ start: 12, end: 14, text: 'Only the second slide talks' }],
      }),
    })
    const result = await processVideo({
      input: { source: '/videos/talk.mp4' },
      settings: settingsFor(),
      deps,
    })
    expect(result.windows).toEqual([{ start: 10, end: 310, index: 0 }])
    expect(result.slides.map((slide) => [slide.number, slide.screenshotPath])).toEqual([
      [1, 'pics/screenshot_001.png'],
    ])
  })

  it('fails when no slide change is detected', async () => {
    const { deps } = createDeps({
      frames: { sample: async () => talkFrames.map((frame) => ({ ...frame, image: BLACK })) },
    })
    await expect(
      processVideo({ input: { source: '/videos/still.mp4' }, settings: settingsFor(), deps })
    ).rejects.toMatchObject({
      name: 'InsufficientInputError',
      message: 'No slide changes detected in /videos/still.mp4',
    })
  })

  it('falls back to content-based detection', async () => {
    const { deps } = createDeps({
      frames: { sample: async () => talkFrames.map((frame) => ({ ...frame, image: BLACK })) },
      contentDetector: { detect: async () => [3, 12] },
    })
    const result = await processVideo({
      input: { source: '/videos/talk.mp4' },
      settings: settingsFor(),
      deps,
    })
    expect(result.changes).toEqual([
      { timestamp: 3, confidence: 0.8, method: 'content' },
      { timestamp: 12, confidence: 0.8, method: 'content' },
    ])
  })

  it('reports failed screenshots as warnings', async () => {
    const { deps } = createDeps({
      screenshotter: {
        capture: async ({ timestamp }) => {
          if (timestamp === 5) throw new Error('disk full')
        },
      },
    })
    const result = await processVideo({
      input: { source: '/videos/talk.mp4' },
      settings: settingsFor(),
      deps,
    })
    expect(result.warnings).toEqual(['Screenshot for slide 1 failed: disk full'])
    expect(result.slides.map((slide) => slide.screenshotPath)).toEqual([
      null,
      'pics/screenshot_002.png',
    ])
  })

  it('downloads remote inputs and cleans up afterwards', async () => {
    const cleanup = vi.fn(async () => {})
    const download = vi.fn(
      async (): Promise<DownloadedVideo> => ({
        videoPath: '/tmp/dl/video.mp4',
        subtitleFiles: ['/tmp/dl/video.en.vtt'],
        title: 'Remote Talk',
        cleanup,
      })
    )
    const { deps, findSubtitles, files } = createDeps({ download })
    const result = await processVideo({
      input: { source: 'https://www.youtube.com/watch?v=abc123' },
      settings: settingsFor({ format: 'html' }),
      deps,
    })
    expect(download).toHaveBeenCalledWith('https://www.youtube.com/watch?v=abc123', undefined)
    expect(findSubtitles).not.toHaveBeenCalled()
    expect(result.title).toBe('Remote Talk')
    expect(result.transcriptFile).toBe('/tmp/dl/video.en.vtt')
    expect(cleanup).toHaveBeenCalledTimes(1)
    const html = files.get('presentation.html') ?? ''
    expect(html.startsWith('<!DOCTYPE html>')).toBe(true)
    expect(html).toContain('<title>Remote Talk</title>')
  })

  it('refuses remote inputs without a downloader', async () => {
    const { deps } = createDeps()
    await expect(
      processVideo({
        input: { source: 'https://example.com/talk.mp4' },
        settings: settingsFor(),
        deps,
      })
    ).rejects.toThrow('Remote inputs need yt-dlp (install it or set YT_DLP_PATH).')
  })
})

describe('pipeline helpers', () => {
  it('skips the intro and outro only when the video is long enough', () => {
    const detection = settingsFor({ introOutro: true }).detection
    expect(resolveSamplingRange(100, detection)).toEqual({ startSeconds: 30, endSeconds: 70 })
    expect(resolveSamplingRange(60, detection)).toEqual({ startSeconds: 0, endSeconds: null })
    expect(resolveSamplingRange(null, detection)).toEqual({ startSeconds: 0, endSeconds: null })
  })

  it('captures the first change inside a window', () => {
    const changes = [createSceneChange(5, 0.9, 'structural'), createSceneChange(12, 0.9, 'content')]
    expect(resolveScreenshotTime({ start: 0, end: 10, index: 0 }, changes)).toBe(5)
    expect(resolveScreenshotTime({ start: 20, end: 30, index: 2 }, changes)).toBe(20)
  })
})
