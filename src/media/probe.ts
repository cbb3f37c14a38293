import { runProcessCapture } from './process.js'

export type VideoInfo = {
  durationSeconds: number | null
  width: number | null
  height: number | null
}

const PROBE_TIMEOUT_MS = 30_000

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const positiveNumber = (value: unknown): number | null => {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null
}

export function parseProbeOutput(output: string): VideoInfo {
  const parsed: unknown = JSON.parse(output)
  let durationSeconds: number | null = null
  let width: number | null = null
  let height: number | null = null
  if (!isRecord(parsed)) return { durationSeconds, width, height }

  const streams = Array.isArray(parsed.streams) ? parsed.streams : []
  for (const stream of streams) {
    if (!isRecord(stream) || stream.codec_type !== 'video') continue
    if (width == null) width = positiveNumber(stream.width)
    if (height == null) height = positiveNumber(stream.height)
    const duration = positiveNumber(stream.duration)
    if (duration != null) durationSeconds = duration
  }
  if (durationSeconds == null && isRecord(parsed.format)) {
    durationSeconds = positiveNumber(parsed.format.duration)
  }
  return { durationSeconds, width, height }
}

export async function probeVideo({
  ffprobePath,
  inputPath,
  timeoutMs,
  signal,
}: {
  ffprobePath: string
  inputPath: string
  timeoutMs: number
  signal?: AbortSignal
}): Promise<VideoInfo> {
  const args = ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', inputPath]
  const output = await runProcessCapture({
    command: ffprobePath,
    args,
    timeoutMs: Math.min(timeoutMs, PROBE_TIMEOUT_MS),
    errorLabel: 'ffprobe',
    signal,
  })
  return parseProbeOutput(output)
}
