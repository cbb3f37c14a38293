import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { setTimeout as delay } from 'node:timers/promises'

import { type Command, CommanderError } from 'commander'

import { loadTalkdeckConfig, saveTalkdeckConfig } from './config.js'
import type { SleepFn } from './enhance/enhancer.js'
import { parseNumberInRange } from './flags.js'
import {
  createModelClient,
  type GenerateTextFn,
  missingApiKeyMessage,
  resolveApiKeysFromEnv,
} from './llm/generate-text.js'
import { type AppLogger, createTalkdeckLogger } from './logging/logger.js'
import { resolveMediaTools } from './media/env.js'
import { parseBatchList, runBatch, writeBatchResults } from './pipeline/batch.js'
import { createPipelineDeps } from './pipeline/deps.js'
import { processVideo } from './pipeline/process-video.js'
import type { DeckResult, PipelineDeps } from './pipeline/types.js'
import { buildBatchProgram, buildProgram } from './run/help.js'
import {
  type CliSettingsInput,
  resolveTalkdeckSettings,
  settingsToConfig,
  type TalkdeckSettings,
} from './run/run-settings.js'
import { resolvePackageVersion } from './version.js'

export type CreateDepsFn = (args: {
  settings: TalkdeckSettings
  outputDir: string
  generate: GenerateTextFn | null
  logger: AppLogger
}) => Promise<PipelineDeps>

type RunEnv = {
  env: Record<string, string | undefined>
  fetch: typeof fetch
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd?: string
  signal?: AbortSignal
  /** Replaces the ffmpeg/yt-dlp wiring; tests pass in-process fakes. */
  createDeps?: CreateDepsFn
  sleep?: SleepFn
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal })
}

function attachOutput(program: Command, { stdout, stderr }: Pick<RunEnv, 'stdout' | 'stderr'>) {
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  program.exitOverride()
}

// False when commander already printed help or the version.
function parseProgram(program: Command, argv: string[]): boolean {
  try {
    program.parse(argv, { from: 'user' })
    return true
  } catch (error) {
    if (
      error instanceof CommanderError &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.help')
    ) {
      return false
    }
    throw error
  }
}

function resolveModelClient({
  settings,
  env,
  fetchImpl,
  logger,
}: {
  settings: TalkdeckSettings
  env: Record<string, string | undefined>
  fetchImpl: typeof fetch
  logger: AppLogger
}): GenerateTextFn | null {
  if (!settings.enhancement.enabled) return null
  const apiKeys = resolveApiKeysFromEnv(env)
  const missing = missingApiKeyMessage(settings.enhancement.model, apiKeys)
  if (missing) {
    logger.warn(`${missing}; continuing without enhancement`)
    return null
  }
  return createModelClient({ apiKeys, baseUrls: settings.baseUrls, fetchImpl })
}

function describeResult(result: DeckResult): string {
  const enhanced = result.enhancement
    ? `, ${result.enhancement.enhancedSegments}/${result.enhancement.totalSegments} segments enhanced ($${result.enhancement.totalCost.toFixed(4)})`
    : ''
  return `${result.slides.length} slides${enhanced} → ${result.documentPath}`
}

export async function runCli(
  argv: string[],
  { env, fetch, stdout, stderr, cwd = process.cwd(), signal, createDeps, sleep = defaultSleep }: RunEnv
): Promise<void> {
  const normalizedArgv = argv.filter((arg) => arg !== '--')
  const batchMode = normalizedArgv[0]?.toLowerCase() === 'batch'

  if (normalizedArgv[0]?.toLowerCase() === 'help') {
    const program = normalizedArgv[1]?.toLowerCase() === 'batch' ? buildBatchProgram() : buildProgram()
    attachOutput(program, { stdout, stderr })
    program.outputHelp()
    return
  }

  const program = batchMode ? buildBatchProgram() : buildProgram()
  attachOutput(program, { stdout, stderr })
  if (!parseProgram(program, batchMode ? normalizedArgv.slice(1) : normalizedArgv)) return

  const opts: Record<string, unknown> = program.opts()
  if (!batchMode && opts.version === true) {
    stdout.write(`${resolvePackageVersion()}\n`)
    return
  }

  const rawInput = program.args[0]
  if (!rawInput) {
    throw new Error(
      batchMode
        ? 'Usage: talkdeck batch <list-file> [--continue-on-error] [--delay 5] [options]'
        : 'Usage: talkdeck <video-or-url> [--format md|html] [--enhance] [--output-dir dir] [options]'
    )
  }

  const configPath = typeof opts.config === 'string' ? path.resolve(cwd, opts.config) : null
  const { config } = loadTalkdeckConfig({ env, configPath })
  const cli: CliSettingsInput = opts
  const settings = resolveTalkdeckSettings({ cli, env, config, cwd })

  const { logger, flush } = createTalkdeckLogger({ settings: settings.logging, stderr })
  try {
    if (typeof opts.saveConfig === 'string') {
      const target = path.resolve(cwd, opts.saveConfig)
      await saveTalkdeckConfig(target, settingsToConfig(settings))
      logger.info(`saved settings to ${target}`)
    }

    const generate = resolveModelClient({ settings, env, fetchImpl: fetch, logger })
    const buildDeps: CreateDepsFn =
      createDeps ??
      (({ outputDir, generate: client, logger: depsLogger }) =>
        createPipelineDeps({
          tools: resolveMediaTools(env),
          settings,
          outputDir,
          generate: client,
          logger: depsLogger,
        }))

    const processOne = async (source: string, outputDir: string, subtitlesPath: string | null) => {
      const deps = await buildDeps({ settings, outputDir, generate, logger })
      return processVideo({
        input: { source, subtitlesPath },
        settings,
        deps,
        logger,
        signal,
      })
    }

    if (!batchMode) {
      const input = /^https?:\/\//i.test(rawInput) ? rawInput : path.resolve(cwd, rawInput)
      const subtitles = typeof opts.subtitles === 'string' ? path.resolve(cwd, opts.subtitles) : null
      const result = await processOne(input, settings.output.outputDir, subtitles)
      stdout.write(`${describeResult(result)}\n`)
      return
    }

    const listPath = path.resolve(cwd, rawInput)
    const inputs = parseBatchList(await readFile(listPath, 'utf8')).map((line) =>
      /^https?:\/\//i.test(line) ? line : path.resolve(path.dirname(listPath), line)
    )
    if (inputs.length === 0) throw new Error(`No inputs found in ${listPath}`)
    const delaySeconds = parseNumberInRange(opts.delay, '--delay', { min: 0, max: 3600 }) ?? 0

    const results = await runBatch({
      inputs,
      baseDir: settings.output.outputDir,
      processOne: (input, outputDir) => processOne(input, outputDir, null),
      continueOnError: opts.continueOnError === true,
      delayMs: delaySeconds * 1000,
      logger,
      sleep,
      signal,
    })
    const resultsPath = await writeBatchResults(settings.output.outputDir, results)
    stdout.write(
      `${results.successful}/${results.total} videos processed, ${results.failed} failed → ${resultsPath}\n`
    )
    if (results.failed > 0) {
      throw new Error(`${results.failed} of ${results.total} videos failed`)
    }
  } finally {
    await flush()
  }
}
