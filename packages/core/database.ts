/**
 * Database operations (Supabase)
 * Can be swapped out for other databases without changing core logic
 *
 * Upserts are explicit read-modify-write: look the row up by ticket URL,
 * then either insert a full row or update only the refresh fields. id,
 * created_at and click_count are never part of an update.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { ConfigError, StoreError } from './errors.js'
import { REFRESH_FIELDS, isEventSource } from './types.js'
import type { EventRefresh, NewEvent, StoredEvent } from './types.js'

export interface Database {
  findEventByTicketUrl(ticketUrl: string): Promise<StoredEvent | null>
  insertEvent(event: NewEvent): Promise<StoredEvent>
  updateEvent(id: number, refresh: EventRefresh): Promise<StoredEvent>
  /** Set expires_at = now on every row with start_time < now and no expires_at yet */
  markExpired(now: Date): Promise<number>
}

/** Postgres unique_violation */
export const UNIQUE_VIOLATION = '23505'

/**
 * events table row
 */
export interface EventRow {
  id: number
  title: string
  start_time: string
  location: string
  description: string | null
  ticket_url: string
  image_url: string | null
  source: string
  created_at: string
  updated_at: string
  expires_at: string | null
  click_count: number
}

type NewEventRow = Omit<EventRow, 'id'>

const REFRESH_COLUMNS: Record<typeof REFRESH_FIELDS[number], keyof EventRow> = {
  title: 'title',
  startTime: 'start_time',
  location: 'location',
  description: 'description',
  imageUrl: 'image_url',
  source: 'source'
}

/**
 * Transform a new Event to database row format
 */
export function eventToRow(event: NewEvent): NewEventRow {
  return {
    title: event.title,
    start_time: event.startTime.toISOString(),
    location: event.location,
    description: event.description,
    ticket_url: event.ticketUrl,
    image_url: event.imageUrl,
    source: event.source,
    created_at: event.createdAt.toISOString(),
    updated_at: event.updatedAt.toISOString(),
    expires_at: event.expiresAt ? event.expiresAt.toISOString() : null,
    click_count: event.clickCount
  }
}

/**
 * Build the update payload from the refresh field list only
 */
export function refreshToRow(refresh: EventRefresh): Partial<EventRow> {
  const row: Partial<EventRow> = { updated_at: refresh.updatedAt.toISOString() }
  for (const field of REFRESH_FIELDS) {
    const value = refresh[field]
    Object.assign(row, { [REFRESH_COLUMNS[field]]: value instanceof Date ? value.toISOString() : value })
  }
  return row
}

/**
 * Transform database row to Event object
 */
export function rowToEvent(row: EventRow): StoredEvent {
  if (!isEventSource(row.source)) {
    throw new StoreError(`Unknown source "${row.source}" on event ${row.id}`)
  }

  return {
    id: row.id,
    title: row.title,
    startTime: new Date(row.start_time),
    location: row.location,
    description: row.description,
    ticketUrl: row.ticket_url,
    imageUrl: row.image_url,
    source: row.source,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    expiresAt: row.expires_at ? new Date(row.expires_at) : null,
    clickCount: row.click_count
  }
}

export interface SupabaseDatabaseOptions {
  /** Injected for tests */
  fetch?: typeof fetch
}

export class SupabaseDatabase implements Database {
  private client: SupabaseClient

  constructor(url: string, key: string, options: SupabaseDatabaseOptions = {}) {
    this.client = createClient(url, key, {
      auth: { persistSession: false },
      global: { fetch: options.fetch }
    })
  }

  async findEventByTicketUrl(ticketUrl: string): Promise<StoredEvent | null> {
    const { data, error } = await this.client
      .from('events')
      .select('*')
      .eq('ticket_url', ticketUrl)
      .maybeSingle<EventRow>()

    if (error) {
      throw new StoreError(`Failed to fetch event: ${error.message}`, { code: error.code })
    }

    return data ? rowToEvent(data) : null
  }

  async insertEvent(event: NewEvent): Promise<StoredEvent> {
    const { data, error } = await this.client
      .from('events')
      .insert(eventToRow(event))
      .select('*')
      .single<EventRow>()

    if (error) {
      throw new StoreError(`Failed to insert event: ${error.message}`, { code: error.code })
    }

    return rowToEvent(data)
  }

  async updateEvent(id: number, refresh: EventRefresh): Promise<StoredEvent> {
    const { data, error } = await this.client
      .from('events')
      .update(refreshToRow(refresh))
      .eq('id', id)
      .select('*')
      .single<EventRow>()

    if (error) {
      throw new StoreError(`Failed to update event ${id}: ${error.message}`, { code: error.code })
    }

    return rowToEvent(data)
  }

  async markExpired(now: Date): Promise<number> {
    const timestamp = now.toISOString()
    const { data, error } = await this.client
      .from('events')
      .update({ expires_at: timestamp })
      .lt('start_time', timestamp)
      .is('expires_at', null)
      .select('id')

    if (error) {
      throw new StoreError(`Failed to mark expired events: ${error.message}`, { code: error.code })
    }

    return (data || []).length
  }
}

export function createDatabase(env: Record<string, string | undefined> = process.env): Database {
  const url = env.SUPABASE_URL
  const key = env.SUPABASE_SERVICE_ROLE_KEY

  if (!url || !key) {
    throw new ConfigError('Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY environment variables')
  }

  return new SupabaseDatabase(url, key)
}
