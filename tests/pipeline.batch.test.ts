import { mkdtemp, readFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { describe, expect, it, vi } from 'vitest'

import type { SleepFn } from '../src/enhance/enhancer.js'
import {
  BATCH_RESULTS_FILE,
  parseBatchList,
  resolveBatchOutputDir,
  runBatch,
  writeBatchResults,
} from '../src/pipeline/batch.js'
import type { DeckResult } from '../src/pipeline/types.js'

const deckFor = (outputDir: string): DeckResult => ({
  title: path.basename(outputDir),
  source: outputDir,
  outputDir,
  documentPath: path.join(outputDir, 'presentation.html'),
  durationSeconds: 60,
  changes: [],
  windows: [{ start: 0, end: 300, index: 0 }],
  slides: [],
  transcriptFile: null,
  enhancement: null,
  warnings: [],
})

describe('batch list', () => {
  it('skips blank lines and comments', () => {
    expect(parseBatchList('# talks\r\n  a.mp4  \n\n#b.mp4\nhttps://example.com/v\n')).toEqual([
      'a.mp4',
      'https://example.com/v',
    ])
  })

  it('names output directories after the input', () => {
    expect(resolveBatchOutputDir('/out', 3, '/videos/My Talk (2024).mp4')).toBe(
      path.join('/out', '003-My-Talk-2024')
    )
    expect(resolveBatchOutputDir('/out', 1, 'https://www.youtube.com/watch?v=abc123')).toBe(
      path.join('/out', '001-abc123')
    )
    expect(resolveBatchOutputDir('/out', 2, 'https://example.com/talks/keynote.mp4')).toBe(
      path.join('/out', '002-keynote-mp4')
    )
    expect(resolveBatchOutputDir('/out', 12, '/videos/???.mp4')).toBe(path.join('/out', '012-video'))
  })
})

describe('runBatch', () => {
  const inputs = ['/v/a.mp4', '/v/b.mp4', '/v/c.mp4']

  it('stops after the first failure and skips the rest', async () => {
    const sleep = vi.fn<SleepFn>(async () => {})
    const processOne = vi.fn(async (input: string, outputDir: string) => {
      if (input.endsWith('b.mp4')) throw new Error('no video stream')
      return deckFor(outputDir)
    })

    const results = await runBatch({
      inputs,
      baseDir: '/out',
      processOne,
      continueOnError: false,
      delayMs: 1000,
      sleep,
    })

    expect(results).toMatchObject({ total: 3, successful: 1, failed: 1 })
    expect(results.items.map((item) => [item.index, item.status, item.error])).toEqual([
      [1, 'ok', undefined],
      [2, 'failed', 'no video stream'],
      [3, 'skipped', undefined],
    ])
    expect(results.items[0]?.documentPath).toBe(path.join('/out', '001-a', 'presentation.html'))
    expect(processOne).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep.mock.calls[0]?.[0]).toBe(1000)
  })

  it('keeps going with continueOnError and only waits between items', async () => {
    const sleep = vi.fn<SleepFn>(async () => {})
    const results = await runBatch({
      inputs,
      baseDir: '/out',
      processOne: async (input, outputDir) => {
        if (input.endsWith('b.mp4')) throw new Error('download failed')
        return deckFor(outputDir)
      },
      continueOnError: true,
      delayMs: 250,
      sleep,
    })

    expect(results.items.map((item) => item.status)).toEqual(['ok', 'failed', 'ok'])
    expect(results).toMatchObject({ total: 3, successful: 2, failed: 1 })
    expect(sleep).toHaveBeenCalledTimes(2)
  })

  it('does not sleep when no delay is set', async () => {
    const sleep = vi.fn<SleepFn>(async () => {})
    await runBatch({
      inputs,
      baseDir: '/out',
      processOne: async (_input, outputDir) => deckFor(outputDir),
      continueOnError: false,
      delayMs: 0,
      sleep,
    })
    expect(sleep).not.toHaveBeenCalled()
  })

  it('propagates cancellation', async () => {
    const controller = new AbortController()
    const processOne = vi.fn(async (_input: string, outputDir: string) => {
      controller.abort(new Error('stop'))
      return deckFor(outputDir)
    })
    await expect(
      runBatch({
        inputs,
        baseDir: '/out',
        processOne,
        continueOnError: true,
        delayMs: 0,
        sleep: async () => {},
        signal: controller.signal,
      })
    ).rejects.toMatchObject({ name: 'AbortError' })
    expect(processOne).toHaveBeenCalledTimes(1)
  })

  it('writes the results file', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'talkdeck-batch-'))
    const target = await writeBatchResults(path.join(dir, 'out'), {
      total: 1,
      successful: 0,
      failed: 1,
      items: [{ index: 1, input: 'a.mp4', outputDir: 'out/001-a', status: 'failed', error: 'boom' }],
    })
    expect(target).toBe(path.join(dir, 'out', BATCH_RESULTS_FILE))
    const parsed: unknown = JSON.parse(await readFile(target, 'utf8'))
    expect(parsed).toEqual({
      total: 1,
      successful: 0,
      failed: 1,
      items: [{ index: 1, input: 'a.mp4', outputDir: 'out/001-a', status: 'failed', error: 'boom' }],
    })
  })
})
