const SIZE_UNITS = ['KB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB'] as const

/**
 * Human-readable size from kilobytes, e.g. 1536 -> "1.5 MB"
 */
export function formatBytes(sizeKb: number): string {
  if (sizeKb === 0) {
    return '0 KB'
  }
  let size = sizeKb
  let unit = 0
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024
    unit++
  }
  return `${size.toFixed(1)} ${SIZE_UNITS[unit]}`
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Local time as "YYYY-MM-DD HH:mm:ss"
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

/**
 * Duration as "1 day, 2:03:04" or "2:03:04"
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000))
  const days = Math.floor(totalSeconds / 86400)
  const hours = Math.floor((totalSeconds % 86400) / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  const clock = `${hours}:${pad(minutes)}:${pad(seconds)}`
  if (days === 0) {
    return clock
  }
  return `${days} ${days === 1 ? 'day' : 'days'}, ${clock}`
}

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ENTITIES[char] ?? char)
}
