import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import {
  loadTalkdeckConfig,
  parseTalkdeckConfig,
  resolveDefaultConfigPath,
  saveTalkdeckConfig,
} from '../src/config.js'

const tempDir = () => mkdtempSync(join(tmpdir(), 'talkdeck-config-'))

describe('config loading', () => {
  it('returns null config when the default file is missing', () => {
    const home = tempDir()
    const result = loadTalkdeckConfig({ env: { HOME: home } })
    expect(result).toEqual({ config: null, path: join(home, '.talkdeck', 'config.json') })
  })

  it('returns no path without a home directory', () => {
    expect(resolveDefaultConfigPath({})).toBeNull()
    expect(loadTalkdeckConfig({ env: {} })).toEqual({ config: null, path: null })
  })

  it('fails for a missing explicit file', () => {
    const path = join(tempDir(), 'nope.json')
    expect(() => loadTalkdeckConfig({ env: {}, configPath: path })).toThrow(
      `Cannot read config file ${path}`
    )
  })

  it('reads JSON5 and trims strings', () => {
    const path = join(tempDir(), 'config.json')
    writeFileSync(
      path,
      `{
        detection: { sceneChangeThreshold: 0.4, skipIntroOutro: false, },
        enhancement: { model: ' openai/gpt-4o-mini ', maxCost: 1.5 },
        output: { format: 'md' },
        openai: { baseUrl: 'http://localhost:8080/v1' },
      }`
    )
    const { config } = loadTalkdeckConfig({ env: {}, configPath: path })
    expect(config).toEqual({
      detection: { sceneChangeThreshold: 0.4, skipIntroOutro: false },
      enhancement: { model: 'openai/gpt-4o-mini', maxCost: 1.5 },
      output: { format: 'md' },
      openai: { baseUrl: 'http://localhost:8080/v1' },
    })
  })

  it('rejects comments', () => {
    const path = join(tempDir(), 'config.json')
    writeFileSync(path, '{\n  // note\n  "slides": {}\n}')
    expect(() => loadTalkdeckConfig({ env: {}, configPath: path })).toThrow(
      `Invalid config file ${path}: comments are not allowed (found // at 2:3).`
    )
  })

  it('allows comment-like text inside strings', () => {
    const path = join(tempDir(), 'config.json')
    writeFileSync(path, '{ "openai": { "baseUrl": "https://proxy.example/v1" } }')
    const { config } = loadTalkdeckConfig({ env: {}, configPath: path })
    expect(config?.openai?.baseUrl).toBe('https://proxy.example/v1')
  })

  it('reports invalid JSON', () => {
    const path = join(tempDir(), 'config.json')
    writeFileSync(path, '{ slides: ')
    expect(() => loadTalkdeckConfig({ env: {}, configPath: path })).toThrow(
      `Invalid JSON in config file ${path}:`
    )
  })
})

describe('parseTalkdeckConfig', () => {
  it('requires an object at the top level', () => {
    expect(() => parseTalkdeckConfig([], 'c.json')).toThrow(
      'Invalid config file c.json: expected an object at the top level'
    )
  })

  it('names the offending key and expected type', () => {
    expect(() => parseTalkdeckConfig({ slides: { frameRate: '2' } }, 'c.json')).toThrow(
      'Invalid config file c.json: "slides.frameRate" must be a number.'
    )
    expect(() => parseTalkdeckConfig({ output: { includeNavigation: 'yes' } }, 'c.json')).toThrow(
      'Invalid config file c.json: "output.includeNavigation" must be a boolean.'
    )
    expect(() => parseTalkdeckConfig({ enhancement: { model: ' ' } }, 'c.json')).toThrow(
      'Invalid config file c.json: "enhancement.model" must be a non-empty string.'
    )
    expect(() => parseTalkdeckConfig({ logging: 3 }, 'c.json')).toThrow(
      'Invalid config file c.json: "logging" must be an object.'
    )
  })

  it('drops empty sections and unknown keys', () => {
    expect(parseTalkdeckConfig({ slides: {}, media: { other: 1 }, extra: true }, 'c.json')).toEqual(
      {}
    )
  })
})

describe('saveTalkdeckConfig', () => {
  it('writes pretty JSON, creating directories', async () => {
    const path = join(tempDir(), 'nested', 'config.json')
    await saveTalkdeckConfig(path, { slides: { frameRate: 2 } })
    expect(readFileSync(path, 'utf8')).toBe('{\n  "slides": {\n    "frameRate": 2\n  }\n}\n')
  })
})
