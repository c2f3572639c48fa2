/**
 * Duration and timestamp formatting for terminal output.
 */

const SECONDS_PER_DAY = 86_400

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/** `1d 02h 03m 04s`; the day part is dropped when zero. Negative values render as `-`. */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) return '-'

  const total = Math.round(seconds)
  const days = Math.floor(total / SECONDS_PER_DAY)
  const hours = Math.floor((total % SECONDS_PER_DAY) / 3600)
  const minutes = Math.floor((total % 3600) / 60)
  const secs = total % 60

  const clock = `${pad2(hours)}h ${pad2(minutes)}m ${pad2(secs)}s`
  return days > 0 ? `${days}d ${clock}` : clock
}

export interface FormatOptions {
  utc?: boolean
  /** Print raw seconds instead of `1d 02h ...`. */
  seconds?: boolean
}

export function formatSpan(seconds: number, options: FormatOptions = {}): string {
  if (options.seconds) return seconds < 0 ? '-' : String(seconds)
  return formatDuration(seconds)
}

/** `YYYY-MM-DD HH:mm:ss` in local time, or UTC when asked. Negative epochs render as `-`. */
export function formatEpoch(epoch: number, options: FormatOptions = {}): string {
  if (epoch < 0) return '-'
  const date = new Date(epoch * 1000)
  const parts = options.utc
    ? [date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate(), date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds()]
    : [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()]
  const [year, month, day, hours, minutes, secs] = parts.map(pad2)
  return `${year}-${month}-${day} ${hours}:${minutes}:${secs}`
}

export function formatPercent(value: number): string {
  return `${value}%`
}
