/**
 * `m:ss` below an hour, `hh:mm:ss` above.
 */
export function formatTimestamp(seconds: number): string {
  const clamped = Math.max(0, Math.floor(seconds))
  const hours = Math.floor(clamped / 3600)
  const minutes = Math.floor((clamped % 3600) / 60)
  const secs = clamped % 60
  const mm = String(minutes).padStart(2, '0')
  const ss = String(secs).padStart(2, '0')
  if (hours <= 0) return `${minutes}:${ss}`
  const hh = String(hours).padStart(2, '0')
  return `${hh}:${mm}:${ss}`
}

// Always three fields: 00:01:05.
export function formatClock(seconds: number): string {
  const clamped = Math.max(0, Math.floor(seconds))
  const hh = String(Math.floor(clamped / 3600)).padStart(2, '0')
  const mm = String(Math.floor((clamped % 3600) / 60)).padStart(2, '0')
  const ss = String(clamped % 60).padStart(2, '0')
  return `${hh}:${mm}:${ss}`
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds.toFixed(1)} seconds`
  if (seconds < 3600) return `${(seconds / 60).toFixed(1)} minutes`
  return `${(seconds / 3600).toFixed(1)} hours`
}

export function formatRange(start: number, end: number): string {
  return `${formatTimestamp(start)}–${formatTimestamp(end)}`
}

export function screenshotFileName(index: number, extension: string): string {
  return `screenshot_${String(index).padStart(3, '0')}.${extension}`
}

// `2024-05-01 09:30:00`, in UTC.
export function formatGeneratedAt(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19)
}
