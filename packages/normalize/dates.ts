/**
 * Source-specific date/time text parsing
 *
 * Each source declares the styles its pages use, tried in order:
 *   iso          2024-05-04T19:00:00+10:00, 2024-05-04T19:00 (local), 2024-05-04
 *   day-first    Sat 4 May 2024, 4th May 7pm, 04/05/2024
 *   month-first  Sat, May 4, 7:00 PM, May 4th 2024, 05/04/2024
 *
 * Text without an offset is wall-clock time in the city's zone. Missing
 * time means local midnight. Missing year means the current year, or the
 * next one when that would put the date more than 30 days in the past.
 */

import { dateFromZonedParts, isValidParts, parseIsoInTimeZone, partsInTimeZone } from './timezone.js'

export type DateStyle = 'iso' | 'day-first' | 'month-first'

export interface DateParseOptions {
  styles: readonly DateStyle[]
  timeZone: string
  now: Date
}

const MONTH = '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)'
const ORDINAL = '(?:st|nd|rd|th)?'

const DAY_FIRST = new RegExp(`\\b(\\d{1,2})${ORDINAL}\\s+${MONTH}\\.?(?:,?\\s+(\\d{4}))?\\b`, 'i')
const MONTH_FIRST = new RegExp(`\\b${MONTH}\\.?\\s+(\\d{1,2})${ORDINAL}(?:,?\\s+(\\d{4}))?\\b`, 'i')
const NUMERIC = /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/
const ANY_YEAR = /\b(20\d{2})\b/
const TIME_12H = /\b(\d{1,2})(?:[:.](\d{2}))?\s*(am|pm)\b/i
const TIME_24H = /\b([01]?\d|2[0-3]):([0-5]\d)\b/

const ROLLOVER_MS = 30 * 24 * 60 * 60 * 1000

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec']

function monthNumber(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1
}

interface DateParts {
  day: number
  month: number
  year: number | null
}

function matchDate(text: string, style: 'day-first' | 'month-first'): DateParts | null {
  const numeric = text.match(NUMERIC)
  if (numeric) {
    const first = Number.parseInt(numeric[1], 10)
    const second = Number.parseInt(numeric[2], 10)
    const year = Number.parseInt(numeric[3], 10)
    return style === 'day-first'
      ? { day: first, month: second, year }
      : { day: second, month: first, year }
  }

  if (style === 'day-first') {
    const m = text.match(DAY_FIRST)
    if (!m) return null
    return {
      day: Number.parseInt(m[1], 10),
      month: monthNumber(m[2]),
      year: m[3] ? Number.parseInt(m[3], 10) : null
    }
  }

  const m = text.match(MONTH_FIRST)
  if (!m) return null
  return {
    day: Number.parseInt(m[2], 10),
    month: monthNumber(m[1]),
    year: m[3] ? Number.parseInt(m[3], 10) : null
  }
}

/**
 * First clock time in the text, as 24h hour/minute
 */
export function matchTime(text: string): { hour: number; minute: number } | null {
  const twelve = text.match(TIME_12H)
  if (twelve) {
    let hour = Number.parseInt(twelve[1], 10)
    const minute = twelve[2] ? Number.parseInt(twelve[2], 10) : 0
    const meridiem = twelve[3].toLowerCase()
    if (hour < 1 || hour > 12 || minute > 59) return null
    if (meridiem === 'pm' && hour < 12) hour += 12
    if (meridiem === 'am' && hour === 12) hour = 0
    return { hour, minute }
  }

  const twentyFour = text.match(TIME_24H)
  if (twentyFour) {
    return {
      hour: Number.parseInt(twentyFour[1], 10),
      minute: Number.parseInt(twentyFour[2], 10)
    }
  }

  return null
}

function parseText(text: string, style: 'day-first' | 'month-first', options: DateParseOptions): Date | null {
  const date = matchDate(text, style)
  if (!date) return null

  const time = matchTime(text) ?? { hour: 0, minute: 0 }

  // Ranges like "Thu 2 May - Sun 5 May 2024" carry the year only once
  const yearInText = text.match(ANY_YEAR)
  const explicitYear = date.year ?? (yearInText ? Number.parseInt(yearInText[1], 10) : null)

  const build = (year: number): Date | null => {
    const parts = { year, month: date.month, day: date.day, hour: time.hour, minute: time.minute }
    return isValidParts(parts) ? dateFromZonedParts(parts, options.timeZone) : null
  }

  if (explicitYear !== null) {
    return build(explicitYear)
  }

  const currentYear = partsInTimeZone(options.now, options.timeZone).year
  const candidate = build(currentYear)
  if (candidate && candidate.getTime() < options.now.getTime() - ROLLOVER_MS) {
    return build(currentYear + 1)
  }
  return candidate
}

/**
 * Parse date/time text with the first style that yields a valid date
 */
export function parseDateText(text: string, options: DateParseOptions): Date | null {
  const trimmed = text.replace(/\s+/g, ' ').trim()
  if (!trimmed) return null

  for (const style of options.styles) {
    const parsed = style === 'iso'
      ? parseIsoInTimeZone(trimmed, options.timeZone)
      : parseText(trimmed, style, options)
    if (parsed && !Number.isNaN(parsed.getTime())) {
      return parsed
    }
  }

  return null
}
