import { accessSync, constants as fsConstants } from 'node:fs'
import path from 'node:path'

export type EnvMap = Record<string, string | undefined>

function isExecutable(filePath: string): boolean {
  try {
    accessSync(filePath, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutableInPath(binary: string, env: EnvMap): string | null {
  if (!binary) return null
  if (path.isAbsolute(binary)) {
    return isExecutable(binary) ? binary : null
  }
  const pathEnv = env.PATH ?? ''
  for (const entry of pathEnv.split(path.delimiter)) {
    if (!entry) continue
    const candidate = path.join(entry, binary)
    if (isExecutable(candidate)) return candidate
  }
  return null
}

/**
 * `FFMPEG_PATH`-style overrides win over the PATH lookup.
 */
export function resolveToolPath(
  binary: string,
  env: EnvMap,
  explicitEnvKey?: string
): string | null {
  const explicit =
    explicitEnvKey && typeof env[explicitEnvKey] === 'string' ? env[explicitEnvKey]?.trim() : ''
  if (explicit) return resolveExecutableInPath(explicit, env)
  return resolveExecutableInPath(binary, env)
}

export type MediaTools = {
  ffmpegPath: string | null
  ffprobePath: string | null
  ytDlpPath: string | null
}

export function resolveMediaTools(env: EnvMap): MediaTools {
  return {
    ffmpegPath: resolveToolPath('ffmpeg', env, 'FFMPEG_PATH'),
    ffprobePath: resolveToolPath('ffprobe', env, 'FFPROBE_PATH'),
    ytDlpPath: resolveToolPath('yt-dlp', env, 'YT_DLP_PATH'),
  }
}
