import { chmodSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { describe, expect, it } from 'vitest'

import { buildSceneFilterArgs, parseShowinfoTimestamp } from '../src/media/content-detector.js'
import { resolveMediaTools, resolveToolPath } from '../src/media/env.js'
import {
  buildFrameSamplingArgs,
  resolveAnalysisHeight,
  splitRawFrames,
} from '../src/media/frames.js'
import { parseProbeOutput } from '../src/media/probe.js'
import { buildScreenshotArgs } from '../src/media/screenshot.js'
import { buildYtDlpAttempts, isRemoteInput, isVideoQuality } from '../src/media/yt-dlp.js'

describe('frame sampling', () => {
  it('keeps the aspect ratio on an even height', () => {
    expect(resolveAnalysisHeight(320, 1920, 1080)).toBe(180)
    expect(resolveAnalysisHeight(320, 1000, 333)).toBe(106)
    expect(resolveAnalysisHeight(16, 4000, 10)).toBe(2)
  })

  it('seeks and limits the decode range', () => {
    const args = buildFrameSamplingArgs(
      {
        ffmpegPath: 'ffmpeg',
        inputPath: '/videos/talk.mp4',
        frameRate: 0.5,
        analysisWidth: 320,
        sourceWidth: 1920,
        sourceHeight: 1080,
        startSeconds: 30,
        endSeconds: 90,
        timeoutMs: 1000,
      },
      180
    )
    expect(args).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-ss',
      '30',
      '-t',
      '60',
      '-i',
      '/videos/talk.mp4',
      '-an',
      '-sn',
      '-vf',
      'fps=0.5,scale=320:180',
      '-pix_fmt',
      'rgb24',
      '-f',
      'rawvideo',
      '-',
    ])
  })

  it('omits the seek for a full decode', () => {
    const args = buildFrameSamplingArgs(
      {
        ffmpegPath: 'ffmpeg',
        inputPath: 'in.mp4',
        frameRate: 1,
        analysisWidth: 160,
        sourceWidth: 320,
        sourceHeight: 240,
        timeoutMs: 1000,
      },
      120
    )
    expect(args.slice(0, 5)).toEqual(['-hide_banner', '-loglevel', 'error', '-i', 'in.mp4'])
  })

  it('cuts raw RGB bytes into timestamped frames', () => {
    const buffer = new Uint8Array(2 * 12 + 5).map((_, i) => i)
    const frames = splitRawFrames(buffer, { width: 2, height: 2, frameRate: 2, startSeconds: 10 })
    expect(frames.map((frame) => frame.timestamp)).toEqual([10, 10.5])
    expect(Array.from(frames[1]?.image.data ?? [])).toEqual([
      12, 13, 14, 15, 16, 17, 18, 19, 20, 21, 22, 23,
    ])
  })
})

describe('parseProbeOutput', () => {
  it('reads the first video stream', () => {
    const info = parseProbeOutput(
      JSON.stringify({
        streams: [
          { codec_type: 'audio', duration: '100.0' },
          { codec_type: 'video', width: 1280, height: 720, duration: '65.5' },
        ],
        format: { duration: '100.0' },
      })
    )
    expect(info).toEqual({ durationSeconds: 65.5, width: 1280, height: 720 })
  })

  it('falls back to the container duration', () => {
    const info = parseProbeOutput(
      JSON.stringify({
        streams: [{ codec_type: 'video', width: 640, height: 360, duration: 'N/A' }],
        format: { duration: '12.0' },
      })
    )
    expect(info).toEqual({ durationSeconds: 12, width: 640, height: 360 })
  })

  it('returns nulls for audio-only files', () => {
    expect(parseProbeOutput('{"streams":[{"codec_type":"audio"}]}')).toEqual({
      durationSeconds: null,
      width: null,
      height: null,
    })
  })
})

describe('content detection arguments', () => {
  it('builds the scene filter', () => {
    expect(buildSceneFilterArgs('in.mp4', 0.3)).toContain("select='gt(scene,0.3)',showinfo")
  })

  it('reads pts_time from showinfo lines', () => {
    expect(
      parseShowinfoTimestamp('[Parsed_showinfo_1 @ 0x6000] n:   3 pts: 163840 pts_time:12.8 fmt:rgb24')
    ).toBe(12.8)
    expect(parseShowinfoTimestamp('frame=  10 fps=0.0 time=00:00:12.80')).toBeNull()
  })
})

describe('buildScreenshotArgs', () => {
  it('seeks, scales and sets JPEG quality', () => {
    expect(
      buildScreenshotArgs({
        videoPath: 'in.mp4',
        timestamp: 5,
        outputPath: '/deck/pics/screenshot_001.jpg',
        width: 640,
        format: 'jpg',
      })
    ).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-ss',
      '5.000',
      '-i',
      'in.mp4',
      '-frames:v',
      '1',
      '-vf',
      'scale=640:-2',
      '-q:v',
      '2',
      '-y',
      '/deck/pics/screenshot_001.jpg',
    ])
  })

  it('keeps the source size for PNG', () => {
    const args = buildScreenshotArgs({
      videoPath: 'in.mp4',
      timestamp: -1,
      outputPath: 'out.png',
      width: null,
      format: 'png',
    })
    expect(args).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-ss',
      '0.000',
      '-i',
      'in.mp4',
      '-frames:v',
      '1',
      '-y',
      'out.png',
    ])
  })
})

describe('yt-dlp helpers', () => {
  it('recognises remote inputs and quality presets', () => {
    expect(isRemoteInput(' https://www.youtube.com/watch?v=abc ')).toBe(true)
    expect(isRemoteInput('/videos/talk.mp4')).toBe(false)
    expect(isVideoQuality('720p')).toBe(true)
    expect(isVideoQuality('toString')).toBe(false)
  })

  it('tries subtitles before falling back to the bare video', () => {
    const attempts = buildYtDlpAttempts({
      url: 'https://example.com/v',
      quality: '480p',
      outputTemplate: '/tmp/x/%(id)s.%(ext)s',
    })
    expect(attempts).toHaveLength(3)
    expect(attempts[0]).toContain('--write-auto-subs')
    expect(attempts[1]).not.toContain('--write-auto-subs')
    expect(attempts[1]).toContain('--write-subs')
    expect(attempts[2]).toEqual([
      '--format',
      'worst[height<=480]',
      '--no-playlist',
      '--write-info-json',
      '--output',
      '/tmp/x/%(id)s.%(ext)s',
      'https://example.com/v',
    ])
  })
})

describe('tool lookup', () => {
  const dir = mkdtempSync(path.join(tmpdir(), 'talkdeck-bin-'))
  const ffmpeg = path.join(dir, 'ffmpeg')
  writeFileSync(ffmpeg, '#!/bin/sh\n')
  chmodSync(ffmpeg, 0o755)

  it('finds executables on PATH', () => {
    expect(resolveToolPath('ffmpeg', { PATH: dir })).toBe(ffmpeg)
    expect(resolveToolPath('ffprobe', { PATH: dir })).toBeNull()
  })

  it('prefers the explicit override', () => {
    const tools = resolveMediaTools({ PATH: '', FFPROBE_PATH: ffmpeg, YT_DLP_PATH: '/missing/yt-dlp' })
    expect(tools).toEqual({ ffmpegPath: null, ffprobePath: ffmpeg, ytDlpPath: null })
  })
})
