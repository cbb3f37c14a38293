import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import {
  detectSubtitleFormat,
  findSiblingSubtitleFiles,
  loadPreferredSubtitles,
  loadSubtitleFile,
  parseJsonSubtitles,
  parseSrt,
  parseSubtitleTimestamp,
  parseVtt,
  rankSubtitleFiles,
  selectSubtitleFile,
} from '../src/transcript/subtitles.js'

describe('parseSubtitleTimestamp', () => {
  it('reads SRT, VTT and bare-second forms', () => {
    expect(parseSubtitleTimestamp('01:02:03,500')).toBe(3723.5)
    expect(parseSubtitleTimestamp('00:01:05.250')).toBe(65.25)
    expect(parseSubtitleTimestamp('02:03.5')).toBe(123.5)
    expect(parseSubtitleTimestamp('42')).toBe(42)
  })

  it('rejects malformed values', () => {
    expect(parseSubtitleTimestamp('')).toBeNull()
    expect(parseSubtitleTimestamp('1:2:3:4')).toBeNull()
    expect(parseSubtitleTimestamp('00:aa:01')).toBeNull()
  })
})

describe('parseSrt', () => {
  it('joins multi-line cues and sorts by start', () => {
    const srt = [
      '\uFEFF2',
      '00:00:05,000 --> 00:00:07,000',
      'Second cue',
      '',
      '1',
      '00:00:01,000 --> 00:00:04,000',
      'First line',
      'continues here',
      '',
      '3',
      '00:00:08,000 --> 00:00:09,000',
      '',
    ].join('\r\n')
    expect(parseSrt(srt)).toEqual([
      { start: 1, end: 4, text: 'First line continues here' },
      { start: 5, end: 7, text: 'Second cue' },
    ])
  })
})

describe('parseVtt', () => {
  it('skips the header, notes and cue settings', () => {
    const vtt = [
      'WEBVTT',
      'Kind: captions',
      '',
      'NOTE produced by hand',
      'spanning two lines',
      '',
      'intro',
      '00:00.500 --> 00:02.000 align:start position:0%',
      'Hello there',
      '',
      '00:02.000 --> 00:03.000',
      'General greeting',
    ].join('\n')
    expect(parseVtt(vtt)).toEqual([
      { start: 0.5, end: 2, text: 'Hello there' },
      { start: 2, end: 3, text: 'General greeting' },
    ])
  })
})

describe('parseJsonSubtitles', () => {
  it('reads json3 events', () => {
    const json = JSON.stringify({
      events: [
        { tStartMs: 1500, dDurationMs: 2000, segs: [{ utf8: 'Hello ' }, { utf8: 'world' }] },
        { tStartMs: 4000, dDurationMs: 500, segs: [{ utf8: '\n' }] },
        { tStartMs: 5000 },
      ],
    })
    expect(parseJsonSubtitles(json)).toEqual([{ start: 1.5, end: 3.5, text: 'Hello world' }])
  })

  it('reads a captions array', () => {
    const json = JSON.stringify({
      captions: [
        { start: 3, end: 4, text: ' later ' },
        { start: 1, end: 2, text: 'earlier' },
        { start: 5, end: 6, text: '' },
      ],
    })
    expect(parseJsonSubtitles(json)).toEqual([
      { start: 1, end: 2, text: 'earlier' },
      { start: 3, end: 4, text: 'later' },
    ])
  })

  it('returns nothing for other shapes', () => {
    expect(parseJsonSubtitles('[1, 2]')).toEqual([])
  })
})

describe('subtitle file selection', () => {
  it('detects formats by extension', () => {
    expect(detectSubtitleFormat('/a/talk.en.SRT')).toBe('srt')
    expect(detectSubtitleFormat('talk.vtt')).toBe('vtt')
    expect(detectSubtitleFormat('talk.en.json3')).toBe('json')
    expect(detectSubtitleFormat('talk.txt')).toBeNull()
  })

  it('prefers manual captions over auto-generated ones', () => {
    const files = ['talk.en-auto.vtt', 'talk.notes.txt', 'talk.en.srt', 'talk.manual.vtt']
    expect(rankSubtitleFiles(files)).toEqual(['talk.en.srt', 'talk.manual.vtt', 'talk.en-auto.vtt'])
    expect(selectSubtitleFile(['talk.auto.vtt'])).toBe('talk.auto.vtt')
    expect(selectSubtitleFile(['talk.txt'])).toBeNull()
  })
})

describe('subtitle files on disk', () => {
  const dir = mkdtempSync(join(tmpdir(), 'talkdeck-subs-'))
  writeFileSync(join(dir, 'talk.mp4'), '')
  writeFileSync(join(dir, 'talk.en.vtt'), 'WEBVTT\n\n00:01.000 --> 00:02.000\nfrom vtt\n')
  writeFileSync(join(dir, 'talk.srt'), '1\n00:00:01,000 --> 00:00:02,000\n\n')
  writeFileSync(join(dir, 'talk.info.json'), '{}')
  writeFileSync(join(dir, 'talks.srt'), '')
  writeFileSync(join(dir, 'other.srt'), '')

  it('finds siblings that share the video base name', async () => {
    await expect(findSiblingSubtitleFiles(join(dir, 'talk.mp4'))).resolves.toEqual([
      join(dir, 'talk.en.vtt'),
      join(dir, 'talk.srt'),
    ])
  })

  it('returns nothing when the directory does not exist', async () => {
    await expect(findSiblingSubtitleFiles(join(dir, 'missing', 'talk.mp4'))).resolves.toEqual([])
  })

  it('falls through candidates that yield no segments', async () => {
    const loaded = await loadPreferredSubtitles([join(dir, 'talk.srt'), join(dir, 'talk.en.vtt')])
    expect(loaded).toEqual({
      file: join(dir, 'talk.en.vtt'),
      segments: [{ start: 1, end: 2, text: 'from vtt' }],
    })
  })

  it('rejects unsupported files', async () => {
    await expect(loadSubtitleFile(join(dir, 'talk.mp4'))).rejects.toThrow(
      `Unsupported subtitle format: ${join(dir, 'talk.mp4')}`
    )
  })
})
