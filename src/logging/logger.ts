import { type ILogObj, Logger } from 'tslog'

import { createRingFileWriter, type RingFileWriter } from './ring-file.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type AppLogger = Logger<ILogObj>

export type LoggingSettings = {
  level: LogLevel
  /** JSON-lines sink; null disables it. */
  file: string | null
  maxBytes: number
  maxFiles: number
}

export type TalkdeckLogger = {
  logger: AppLogger
  getSubLogger: (name: string) => AppLogger
  flush: () => Promise<void>
}

export const LOG_STAGES = ['detect', 'windows', 'enhance', 'render', 'media'] as const
export type LogStage = (typeof LOG_STAGES)[number]

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

export const DEFAULT_LOGGING: LoggingSettings = {
  level: 'info',
  file: null,
  maxBytes: 10 * 1024 * 1024,
  maxFiles: 3,
}

function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return { name: val.name, message: val.message, stack: val.stack, cause: val.cause }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

function formatPrettyLine(metaMarkup: string, args: unknown[], errors: string[]): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(args.map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg))).join(' '))
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

/**
 * Pretty lines go to `stderr`; when `settings.file` is set every record is also
 * appended as JSON to a size-bounded ring of files.
 */
export function createTalkdeckLogger({
  settings = DEFAULT_LOGGING,
  stderr,
}: {
  settings?: LoggingSettings
  stderr: NodeJS.WritableStream
}): TalkdeckLogger {
  const writer: RingFileWriter | null = settings.file
    ? createRingFileWriter({
        filePath: settings.file,
        maxBytes: settings.maxBytes,
        maxFiles: settings.maxFiles,
      })
    : null

  const logger = new Logger<ILogObj>({
    name: 'talkdeck',
    type: 'pretty',
    minLevel: LOG_LEVEL_MAP[settings.level],
    hideLogPositionForProduction: true,
    prettyLogTemplate: '{{logLevelName}}\t[{{name}}]\t',
    stylePrettyLogs: false,
    overwrite: {
      transportFormatted: (metaMarkup, args, errors) => {
        stderr.write(`${formatPrettyLine(metaMarkup, args, errors)}\n`)
      },
    },
  })

  if (writer) {
    logger.attachTransport((logObj) => {
      writer.write(safeJsonStringify(logObj))
    })
  }

  return {
    logger,
    getSubLogger: (name) => logger.getSubLogger({ name }),
    flush: async () => {
      if (writer) await writer.flush()
    },
  }
}

export function resolveLogLevel(
  { verbose, quiet }: { verbose: boolean; quiet: boolean },
  fallback: LogLevel
): LogLevel {
  if (verbose) return 'debug'
  if (quiet) return 'warn'
  return fallback
}
