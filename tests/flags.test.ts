import { describe, expect, it } from 'vitest'

import {
  parseBoolean,
  parseDeckFormat,
  parseDurationMs,
  parseEnhancementLevel,
  parseNumberInRange,
  parsePositiveInt,
  parseRetriesArg,
  parseScreenshotFormat,
  parseVideoQuality,
  resolveLayered,
} from '../src/flags.js'

describe('flag parsers', () => {
  it('treats blank values as absent', () => {
    expect(parseBoolean(undefined, '--x')).toBeNull()
    expect(parseNumberInRange('  ', '--x', { min: 0, max: 1 })).toBeNull()
    expect(parseDurationMs(null)).toBeNull()
  })

  it('parses booleans from flags and env strings', () => {
    expect(parseBoolean(true, '--enhance')).toBe(true)
    expect(parseBoolean('YES', 'TALKDECK_ENHANCE')).toBe(true)
    expect(parseBoolean('off', 'TALKDECK_ENHANCE')).toBe(false)
    expect(() => parseBoolean('maybe', 'TALKDECK_ENHANCE')).toThrow(
      'Unsupported TALKDECK_ENHANCE: maybe'
    )
  })

  it('checks numeric ranges', () => {
    expect(parseNumberInRange('0.4', '--sensitivity', { min: 0, max: 1 })).toBe(0.4)
    expect(() => parseNumberInRange('1.5', '--sensitivity', { min: 0, max: 1 })).toThrow(
      'Unsupported --sensitivity: 1.5 (range 0-1)'
    )
    expect(() =>
      parseNumberInRange(0, '--frame-rate', { min: 0, max: 60, exclusiveMin: true })
    ).toThrow('Unsupported --frame-rate: 0 (range >0-60)')
    expect(() => parseNumberInRange('abc', '--min-time', { min: 0, max: 10 })).toThrow(
      'Unsupported --min-time: abc'
    )
  })

  it('parses integers with a minimum', () => {
    expect(parsePositiveInt('320', '--analysis-width', 16)).toBe(320)
    expect(() => parsePositiveInt('8', '--analysis-width', 16)).toThrow(
      'Unsupported --analysis-width: 8 (minimum 16)'
    )
    expect(() => parsePositiveInt('2.5', '--analysis-width')).toThrow(
      'Unsupported --analysis-width: 2.5'
    )
  })

  it('parses durations with units', () => {
    expect(parseDurationMs('90')).toBe(90_000)
    expect(parseDurationMs('1.5m')).toBe(90_000)
    expect(parseDurationMs('500ms')).toBe(500)
    expect(parseDurationMs('2h')).toBe(7_200_000)
    expect(parseDurationMs(2500, 'enhancement.timeoutMs')).toBe(2500)
    expect(() => parseDurationMs('soon')).toThrow('Unsupported --timeout: soon')
    expect(() => parseDurationMs('0s')).toThrow('Unsupported --timeout: 0s')
  })

  it('bounds retries', () => {
    expect(parseRetriesArg('0')).toBe(0)
    expect(() => parseRetriesArg('6')).toThrow('Unsupported --retries: 6 (range 0-5)')
  })

  it('normalises choices', () => {
    expect(parseDeckFormat('Markdown')).toBe('md')
    expect(parseDeckFormat('html')).toBe('html')
    expect(() => parseDeckFormat('pdf')).toThrow('Unsupported --format: pdf')
    expect(parseScreenshotFormat('JPEG')).toBe('jpg')
    expect(parseEnhancementLevel('academic')).toBe('academic')
    expect(parseVideoQuality('1080p')).toBe('1080p')
    expect(() => parseVideoQuality('4k')).toThrow('Unsupported --video-quality: 4k')
  })
})

describe('resolveLayered', () => {
  const parse = (raw: unknown, label: string) => parseNumberInRange(raw, label, { min: 0, max: 1 })

  it('takes the first layer with a value', () => {
    expect(
      resolveLayered(
        [
          [undefined, '--sensitivity'],
          ['0.2', 'TALKDECK_SENSITIVITY'],
          [0.9, 'detection.sceneChangeThreshold'],
        ],
        parse
      )
    ).toBe(0.2)
  })

  it('reports an invalid value under its own label', () => {
    expect(() =>
      resolveLayered(
        [
          [undefined, '--sensitivity'],
          ['7', 'TALKDECK_SENSITIVITY'],
          [0.9, 'detection.sceneChangeThreshold'],
        ],
        parse
      )
    ).toThrow('Unsupported TALKDECK_SENSITIVITY: 7 (range 0-1)')
  })

  it('returns null when no layer has a value', () => {
    expect(resolveLayered([[undefined, '--x']], parse)).toBeNull()
  })
})
