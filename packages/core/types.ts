/**
 * Core types for event ingestion
 */

export const EVENT_SOURCES = ['eventbrite', 'meetup', 'timeout'] as const

export type EventSource = typeof EVENT_SOURCES[number]

export function isEventSource(value: string): value is EventSource {
  return (EVENT_SOURCES as readonly string[]).includes(value)
}

/**
 * Listing as scraped from a page, before normalization.
 * Lives only for the duration of one adapter invocation.
 */
export interface RawListing {
  source: EventSource
  title: string
  dateText: string               // Raw date/time text (or ISO string)
  locationText: string
  url: string                    // Detail/ticket URL, absolute or relative
  imageUrl?: string
  description?: string
}

/**
 * Canonical event produced by the normalizer (not yet stored)
 */
export interface NormalizedEvent {
  title: string
  startTime: Date
  location: string
  description: string | null
  ticketUrl: string              // Dedup key, always absolute
  imageUrl: string | null
  source: EventSource
}

/**
 * Event row as held by the store
 */
export interface StoredEvent extends NormalizedEvent {
  id: number                     // Assigned by the store
  createdAt: Date
  updatedAt: Date
  expiresAt: Date | null         // Set once, when startTime has passed
  clickCount: number             // Owned by the read side
}

/**
 * Row handed to the store on first sight of a ticket URL
 */
export type NewEvent = Omit<StoredEvent, 'id'>

/**
 * Fields ingestion is allowed to overwrite on an existing row
 */
export const REFRESH_FIELDS = [
  'title',
  'startTime',
  'location',
  'description',
  'imageUrl',
  'source'
] as const

export type EventRefresh = Pick<NormalizedEvent, typeof REFRESH_FIELDS[number]> & {
  updatedAt: Date
}

/**
 * Captured email, written by the email-capture service.
 * Shares the store with events; ingestion never reads or writes it.
 */
export interface Email {
  id: number
  email: string
  eventId: number
  optIn: boolean
  createdAt: Date
}

export interface ReconcileSummary {
  inserted: number
  updated: number
  skipped: number
  expired: number
}

export interface AdapterSummary {
  source: EventSource
  listingsSeen: number
  dropped: number                // Listings the normalizer rejected
  inserted: number
  updated: number
  skipped: number                // Store failures on single records
  errors: number
  failed: boolean                // collect() escaped with an exception
  duration: number               // milliseconds
  error?: string
}

export interface CycleSummary {
  startedAt: Date
  finishedAt: Date
  duration: number               // milliseconds
  adapters: AdapterSummary[]
  expired: number
  totals: {
    listingsSeen: number
    inserted: number
    updated: number
    skipped: number
    errors: number
  }
  stoppedEarly: boolean
}
