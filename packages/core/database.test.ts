import { describe, it, expect, vi } from 'vitest'
import { SupabaseDatabase, UNIQUE_VIOLATION, createDatabase, eventToRow, refreshToRow, rowToEvent } from './database.js'
import type { EventRow } from './database.js'
import { ConfigError, StoreError } from './errors.js'

const row: EventRow = {
  id: 7,
  title: 'Jazz Night',
  start_time: '2024-05-10T09:00:00.000Z',
  location: 'The Basement',
  description: null,
  ticket_url: 'https://example.com/e/u1',
  image_url: null,
  source: 'timeout',
  created_at: '2024-04-20T00:00:00.000Z',
  updated_at: '2024-04-21T00:00:00.000Z',
  expires_at: null,
  click_count: 3
}

describe('row mapping', () => {
  it('round-trips an event row', () => {
    const event = rowToEvent(row)

    expect(event).toMatchObject({
      id: 7,
      ticketUrl: 'https://example.com/e/u1',
      startTime: new Date('2024-05-10T09:00:00.000Z'),
      expiresAt: null,
      clickCount: 3
    })
    const { id, ...rest } = event
    expect(id).toBe(7)
    expect(eventToRow(rest)).toEqual({ ...row, id: undefined })
  })

  it('rejects rows with an unknown source', () => {
    expect(() => rowToEvent({ ...row, source: 'facebook' })).toThrow(StoreError)
  })

  it('writes only refresh columns and updated_at', () => {
    const update = refreshToRow({
      title: 'Jazz Night (SOLD OUT)',
      startTime: new Date('2024-05-10T09:00:00.000Z'),
      location: 'The Basement',
      description: null,
      imageUrl: null,
      source: 'timeout',
      updatedAt: new Date('2024-04-22T00:00:00.000Z')
    })

    expect(update).toEqual({
      title: 'Jazz Night (SOLD OUT)',
      start_time: '2024-05-10T09:00:00.000Z',
      location: 'The Basement',
      description: null,
      image_url: null,
      source: 'timeout',
      updated_at: '2024-04-22T00:00:00.000Z'
    })
  })
})

describe('createDatabase', () => {
  it('requires Supabase credentials', () => {
    expect(() => createDatabase({})).toThrow(ConfigError)
  })

  it('builds a Supabase store', () => {
    const db = createDatabase({ SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' })

    expect(db).toBeInstanceOf(SupabaseDatabase)
  })
})

describe('SupabaseDatabase', () => {
  const SUPABASE_URL = 'http://localhost:54321'

  interface SentRequest {
    method: string
    url: URL
    body: unknown
    apikey: string | null
  }

  function createStore(reply: (request: SentRequest) => Response) {
    const sent: SentRequest[] = []
    const fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const request: SentRequest = {
        method: init?.method ?? 'GET',
        url: new URL(input instanceof Request ? input.url : String(input)),
        body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
        apikey: new Headers(init?.headers).get('apikey')
      }
      sent.push(request)
      return reply(request)
    })
    return { db: new SupabaseDatabase(SUPABASE_URL, 'test-secret', { fetch }), sent }
  }

  function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
  }

  it('looks an event up by ticket URL', async () => {
    const { db, sent } = createStore(() => json([row]))

    const event = await db.findEventByTicketUrl('https://example.com/e/u1')

    expect(event?.id).toBe(7)
    expect(sent).toHaveLength(1)
    expect(sent[0].method).toBe('GET')
    expect(sent[0].url.pathname).toBe('/rest/v1/events')
    expect(sent[0].url.searchParams.get('ticket_url')).toBe('eq.https://example.com/e/u1')
    expect(sent[0].apikey).toBe('test-secret')
  })

  it('returns null when no row matches', async () => {
    const { db } = createStore(() => json([]))

    expect(await db.findEventByTicketUrl('https://example.com/e/missing')).toBeNull()
  })

  it('inserts the full row', async () => {
    const { db, sent } = createStore(() => json(row, 201))
    const { id: _id, ...event } = rowToEvent(row)

    const stored = await db.insertEvent(event)

    expect(stored.id).toBe(7)
    expect(sent[0].method).toBe('POST')
    expect(sent[0].url.pathname).toBe('/rest/v1/events')
    expect(sent[0].body).toEqual(eventToRow(event))
  })

  it('reports a duplicate ticket URL as a unique violation', async () => {
    const { db } = createStore(() =>
      json(
        {
          code: '23505',
          details: 'Key (ticket_url)=(https://example.com/e/u1) already exists.',
          hint: null,
          message: 'duplicate key value violates unique constraint "events_ticket_url_key"'
        },
        409
      )
    )
    const { id: _id, ...event } = rowToEvent(row)

    const error = await db.insertEvent(event).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(StoreError)
    expect(error).toMatchObject({
      code: UNIQUE_VIOLATION,
      message: 'Failed to insert event: duplicate key value violates unique constraint "events_ticket_url_key"'
    })
  })

  it('updates only the refresh columns of one row', async () => {
    const { db, sent } = createStore(() => json({ ...row, title: 'Jazz Night (SOLD OUT)' }))
    const refresh = {
      title: 'Jazz Night (SOLD OUT)',
      startTime: new Date('2024-05-10T09:00:00.000Z'),
      location: 'The Basement',
      description: null,
      imageUrl: null,
      source: 'timeout' as const,
      updatedAt: new Date('2024-04-22T00:00:00.000Z')
    }

    const stored = await db.updateEvent(7, refresh)

    expect(stored.title).toBe('Jazz Night (SOLD OUT)')
    expect(sent[0].method).toBe('PATCH')
    expect(sent[0].url.searchParams.get('id')).toBe('eq.7')
    expect(sent[0].body).toEqual(refreshToRow(refresh))
    expect(Object.keys(sent[0].body ?? {})).not.toContain('click_count')
  })

  it('expires started events that are not expired yet and counts them', async () => {
    const { db, sent } = createStore(() => json([{ id: 3 }, { id: 4 }]))

    const count = await db.markExpired(new Date('2024-05-02T00:00:00.000Z'))

    expect(count).toBe(2)
    expect(sent[0].method).toBe('PATCH')
    expect(sent[0].url.searchParams.get('start_time')).toBe('lt.2024-05-02T00:00:00.000Z')
    expect(sent[0].url.searchParams.get('expires_at')).toBe('is.null')
    expect(sent[0].body).toEqual({ expires_at: '2024-05-02T00:00:00.000Z' })
  })

  it('raises driver errors as StoreError', async () => {
    const { db } = createStore(() => json({ code: '57014', details: null, hint: null, message: 'canceling statement' }, 500))

    await expect(db.markExpired(new Date('2024-05-02T00:00:00.000Z'))).rejects.toMatchObject({
      name: 'StoreError',
      code: '57014',
      message: 'Failed to mark expired events: canceling statement'
    })
  })
})
