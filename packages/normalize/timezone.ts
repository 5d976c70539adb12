/**
 * Wall-clock time in an IANA zone <-> UTC instants, via Intl only
 */

export interface ZonedDateTimeParts {
  /** Full year, e.g. 2024 */
  year: number
  /** Month 1-12 */
  month: number
  /** Day 1-31 */
  day: number
  /** 0-23 */
  hour?: number
  /** 0-59 */
  minute?: number
  /** 0-59 */
  second?: number
}

const formatters = new Map<string, Intl.DateTimeFormat>()

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const existing = formatters.get(timeZone)
  if (existing) return existing
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  })
  formatters.set(timeZone, fmt)
  return fmt
}

/**
 * Calendar parts of an instant as seen in timeZone
 */
export function partsInTimeZone(date: Date, timeZone: string): Required<ZonedDateTimeParts> {
  const parts = getFormatter(timeZone).formatToParts(date)
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number.parseInt(parts.find(p => p.type === type)?.value ?? '', 10)
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour'),
    minute: get('minute'),
    second: get('second')
  }
}

/**
 * Convert a local date/time in timeZone into a UTC Date.
 *
 * Starts by reading the wall time as UTC, then corrects by the difference
 * between the wanted and the observed wall time (twice more for DST edges).
 */
export function dateFromZonedParts(parts: ZonedDateTimeParts, timeZone: string): Date {
  const desired = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour ?? 0,
    parts.minute ?? 0,
    parts.second ?? 0
  )

  let utcMillis = desired
  for (let i = 0; i < 3; i++) {
    const got = partsInTimeZone(new Date(utcMillis), timeZone)
    const gotMillis = Date.UTC(got.year, got.month - 1, got.day, got.hour, got.minute, got.second)
    const diff = desired - gotMillis
    if (diff === 0) break
    utcMillis += diff
  }

  return new Date(utcMillis)
}

function hasExplicitOffset(iso: string): boolean {
  return /[zZ]$/.test(iso) || /[+-]\d{2}:?\d{2}$/.test(iso)
}

/**
 * Parse an ISO 8601 timestamp. Strings with Z or an offset are taken as is;
 * strings without one ("2024-05-01T19:00") are local time in timeZone.
 * Date-only strings are local midnight.
 */
export function parseIsoInTimeZone(value: string, timeZone: string): Date | null {
  const s = value.trim()
  if (!s) return null

  if (hasExplicitOffset(s)) {
    const d = new Date(s)
    return Number.isNaN(d.getTime()) ? null : d
  }

  const m = s.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T\s](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?)?$/)
  if (!m) return null

  const parts: ZonedDateTimeParts = {
    year: Number.parseInt(m[1], 10),
    month: Number.parseInt(m[2], 10),
    day: Number.parseInt(m[3], 10),
    hour: m[4] ? Number.parseInt(m[4], 10) : 0,
    minute: m[5] ? Number.parseInt(m[5], 10) : 0,
    second: m[6] ? Number.parseInt(m[6], 10) : 0
  }
  if (!isValidParts(parts)) return null

  return dateFromZonedParts(parts, timeZone)
}

export function isValidParts(parts: ZonedDateTimeParts): boolean {
  const { year, month, day, hour = 0, minute = 0, second = 0 } = parts
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return false
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate()
  return day >= 1 && day <= daysInMonth
}
