/**
 * Listing normalization
 *
 * Maps a RawListing from any adapter onto the canonical event shape.
 * Listings without a title, a resolvable ticket URL or a parseable start
 * time are dropped with a warning; normalization never throws.
 */

import { ValidationError, describeError } from '../core/errors.js'
import type { NormalizedEvent, RawListing } from '../core/types.js'
import { parseDateText } from './dates.js'
import type { DateStyle } from './dates.js'

export const MAX_DESCRIPTION_LENGTH = 500

/** Query parameters that only track the referrer and never identify an event */
const TRACKING_PARAMS = /^(utm_[a-z]+|aff|fbclid|gclid|ref|referrer)$/i

export interface NormalizerRules {
  /** Base for relative detail/image URLs */
  baseUrl: string
  dateStyles: readonly DateStyle[]
  timeZone: string
  /** Used when the listing names no location */
  defaultLocation: string
  now?: () => Date
}

export type Normalize = (raw: RawListing) => NormalizedEvent | null

/**
 * Collapse runs of whitespace and trim
 */
export function cleanText(value: string | undefined | null): string {
  return (value ?? '').replace(/\s+/g, ' ').trim()
}

/**
 * Resolve a possibly relative URL to an absolute http(s) URL.
 * Drops the fragment and referrer-tracking parameters so one event keeps
 * one ticket URL across listing pages.
 */
export function resolveUrl(value: string | undefined, baseUrl: string): string | null {
  const trimmed = cleanText(value)
  if (!trimmed) return null

  let url: URL
  try {
    url = new URL(trimmed, baseUrl)
  } catch {
    return null
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return null

  url.hash = ''
  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PARAMS.test(key)) url.searchParams.delete(key)
  }
  return url.href
}

// Counts code points, so a surrogate pair is never split
function truncate(text: string, max: number): string {
  const chars = Array.from(text)
  return chars.length > max ? chars.slice(0, max).join('').trimEnd() : text
}

function toEvent(raw: RawListing, rules: NormalizerRules): NormalizedEvent {
  const title = cleanText(raw.title)
  if (!title) {
    throw new ValidationError('missing title', 'title')
  }

  const ticketUrl = resolveUrl(raw.url, rules.baseUrl)
  if (!ticketUrl) {
    throw new ValidationError(`unusable ticket URL "${cleanText(raw.url)}"`, 'ticketUrl')
  }

  const startTime = parseDateText(raw.dateText, {
    styles: rules.dateStyles,
    timeZone: rules.timeZone,
    now: rules.now ? rules.now() : new Date()
  })
  if (!startTime) {
    throw new ValidationError(`unparseable date "${cleanText(raw.dateText)}"`, 'startTime')
  }

  const description = cleanText(raw.description)

  return {
    title,
    startTime,
    location: cleanText(raw.locationText) || rules.defaultLocation,
    description: description ? truncate(description, MAX_DESCRIPTION_LENGTH) : null,
    ticketUrl,
    imageUrl: resolveUrl(raw.imageUrl, rules.baseUrl),
    source: raw.source
  }
}

/**
 * Normalize one listing; null when a required field is missing
 */
export function normalize(raw: RawListing, rules: NormalizerRules): NormalizedEvent | null {
  try {
    return toEvent(raw, rules)
  } catch (error) {
    console.warn(`[normalize] ${raw.source}: dropped "${cleanText(raw.title).slice(0, 60)}" - ${describeError(error)}`)
    return null
  }
}

/**
 * Bind the rules of one adapter
 */
export function createNormalizer(rules: NormalizerRules): Normalize {
  return raw => normalize(raw, rules)
}
