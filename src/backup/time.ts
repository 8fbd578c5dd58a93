type DateParts = {
  year: string
  month: string
  day: string
  hour: string
  minute: string
}

const formatters = new Map<string, Intl.DateTimeFormat>()

function getFormatter(timeZone: string | undefined): Intl.DateTimeFormat {
  const key = timeZone ?? ''
  const cached = formatters.get(key)
  if (cached) return cached
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  })
  formatters.set(key, formatter)
  return formatter
}

function toParts(epochMs: number, timeZone?: string): DateParts {
  const parts: DateParts = { year: '', month: '', day: '', hour: '', minute: '' }
  for (const part of getFormatter(timeZone).formatToParts(new Date(epochMs))) {
    if (
      part.type === 'year' ||
      part.type === 'month' ||
      part.type === 'day' ||
      part.type === 'hour' ||
      part.type === 'minute'
    ) {
      parts[part.type] = part.value
    }
  }
  return parts
}

/** `YYYY-MM-DD` in the given zone (process local time when omitted). */
export function formatDate(epochMs: number, timeZone?: string): string {
  const { year, month, day } = toParts(epochMs, timeZone)
  return `${year}-${month}-${day}`
}

/** `HH:MM`, 24-hour. */
export function formatTime(epochMs: number, timeZone?: string): string {
  const { hour, minute } = toParts(epochMs, timeZone)
  return `${hour}:${minute}`
}

export function formatDateTime(epochMs: number, timeZone?: string): string {
  return `${formatDate(epochMs, timeZone)} ${formatTime(epochMs, timeZone)}`
}

export function toIso(epochMs: number | null): string | null {
  if (epochMs === null || !Number.isFinite(epochMs)) return null
  return new Date(epochMs).toISOString()
}
