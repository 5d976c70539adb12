import { describe, it, expect, vi, beforeEach } from 'vitest'
import { Reconciler } from './reconciler.js'
import { InMemoryDatabase } from '../core/memory-database.js'
import { UNIQUE_VIOLATION } from '../core/database.js'
import { StoreError } from '../core/errors.js'
import type { NewEvent, NormalizedEvent, StoredEvent } from '../core/types.js'

const T0 = new Date('2024-04-20T00:00:00Z')
const T1 = new Date('2024-04-20T01:00:00Z')

function event(ticketUrl: string, title: string, start = '2024-05-10T09:00:00Z'): NormalizedEvent {
  return {
    title,
    startTime: new Date(start),
    location: 'Sydney, Australia',
    description: null,
    ticketUrl,
    imageUrl: null,
    source: 'eventbrite'
  }
}

function tick(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0))
}

describe('Reconciler', () => {
  let db: InMemoryDatabase
  let reconciler: Reconciler

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    db = new InMemoryDatabase()
    reconciler = new Reconciler(db)
  })

  it('inserts unseen events with fresh bookkeeping fields', async () => {
    const summary = await reconciler.reconcile(
      [event('https://example.com/e/u1', 'Jazz Night'), event('https://example.com/e/u2', 'Trivia Night')],
      T0
    )

    expect(summary).toEqual({ inserted: 2, updated: 0, skipped: 0, expired: 0 })
    const [first] = await db.listEvents()
    expect(first).toEqual({
      ...event('https://example.com/e/u1', 'Jazz Night'),
      id: 1,
      createdAt: T0,
      updatedAt: T0,
      expiresAt: null,
      clickCount: 0
    })
  })

  it('is idempotent across cycles', async () => {
    const batch = [event('https://example.com/e/u1', 'Jazz Night'), event('https://example.com/e/u2', 'Trivia Night')]

    await reconciler.reconcile(batch, T0)
    const before = await db.listEvents()
    const summary = await reconciler.reconcile(batch, T1)
    const after = await db.listEvents()

    expect(summary).toEqual({ inserted: 0, updated: 2, skipped: 0, expired: 0 })
    expect(after).toHaveLength(2)
    expect(after.map(row => row.id)).toEqual(before.map(row => row.id))
    expect(after.map(row => row.createdAt)).toEqual([T0, T0])
    expect(after.map(row => row.updatedAt)).toEqual([T1, T1])
  })

  it('refreshes fields in place without touching id, createdAt or clickCount', async () => {
    await reconciler.reconcile([event('https://example.com/e/u1', 'Jazz Night')], T0)
    await db.incrementClickCount(1)

    await reconciler.reconcile([event('https://example.com/e/u1', 'Jazz Night (SOLD OUT)')], T1)

    const rows = await db.listEvents()
    expect(rows).toHaveLength(1)
    expect(rows[0]).toMatchObject({
      id: 1,
      title: 'Jazz Night (SOLD OUT)',
      createdAt: T0,
      updatedAt: T1,
      clickCount: 1
    })
  })

  it('keeps one row per ticket URL within a batch', async () => {
    const summary = await reconciler.reconcile(
      [event('https://example.com/e/u1', 'Jazz Night'), event('https://example.com/e/u1', 'Jazz Night (late show)')],
      T0
    )

    expect(summary).toEqual({ inserted: 1, updated: 1, skipped: 0, expired: 0 })
    expect((await db.listEvents()).map(row => row.title)).toEqual(['Jazz Night (late show)'])
  })

  describe('expiry', () => {
    const started = new Date('2024-05-03T00:00:00Z')
    const later = new Date('2024-05-04T00:00:00Z')

    it('marks started events expired and never clears the mark', async () => {
      await reconciler.reconcile([event('https://example.com/e/u2', 'Trivia Night', '2024-05-02T09:00:00Z')], T0)

      const first = await reconciler.reconcile([], started)
      expect(first.expired).toBe(1)

      const relisted = await reconciler.reconcile(
        [event('https://example.com/e/u2', 'Trivia Night', '2024-05-02T09:00:00Z')],
        later
      )
      expect(relisted).toEqual({ inserted: 0, updated: 1, skipped: 0, expired: 0 })

      const [row] = await db.listEvents()
      expect(row.expiresAt).toEqual(started)
      expect(row.updatedAt).toEqual(later)
    })

    it('leaves future events alone', async () => {
      await reconciler.reconcile([event('https://example.com/e/u1', 'Jazz Night', '2024-05-10T09:00:00Z')], started)

      const [row] = await db.listEvents()
      expect(row.expiresAt).toBeNull()
    })

    it('skips the sweep when asked to', async () => {
      await reconciler.reconcile([event('https://example.com/e/u2', 'Trivia Night', '2024-05-02T09:00:00Z')], T0)

      const summary = await reconciler.reconcile([], started, { sweep: false })

      expect(summary.expired).toBe(0)
      expect((await db.listEvents())[0].expiresAt).toBeNull()
    })
  })

  it('skips a record the store rejects and carries on', async () => {
    class FlakyDatabase extends InMemoryDatabase {
      async insertEvent(row: NewEvent): Promise<StoredEvent> {
        if (row.ticketUrl.endsWith('/bad')) {
          throw new StoreError('connection reset')
        }
        return super.insertEvent(row)
      }
    }
    const flaky = new FlakyDatabase()

    const summary = await new Reconciler(flaky).reconcile(
      [event('https://example.com/e/bad', 'Broken'), event('https://example.com/e/u1', 'Jazz Night')],
      T0
    )

    expect(summary).toEqual({ inserted: 1, updated: 0, skipped: 1, expired: 0 })
    expect(console.error).toHaveBeenCalledWith('[reconcile] Skipped https://example.com/e/bad: StoreError: connection reset')
    expect((await flaky.listEvents()).map(row => row.ticketUrl)).toEqual(['https://example.com/e/u1'])
  })

  it('turns a lost insert race into an update', async () => {
    // The first lookup misses a row another writer has just inserted
    class RacingDatabase extends InMemoryDatabase {
      private missed = false

      async findEventByTicketUrl(ticketUrl: string): Promise<StoredEvent | null> {
        if (!this.missed) {
          this.missed = true
          return null
        }
        return super.findEventByTicketUrl(ticketUrl)
      }
    }
    const racing = new RacingDatabase()
    await racing.insertEvent({
      ...event('https://example.com/e/u1', 'Jazz Night'),
      createdAt: T0,
      updatedAt: T0,
      expiresAt: null,
      clickCount: 0
    })

    const summary = await new Reconciler(racing).reconcile([event('https://example.com/e/u1', 'Jazz Night (SOLD OUT)')], T1)

    expect(summary).toEqual({ inserted: 0, updated: 1, skipped: 0, expired: 0 })
    expect((await racing.listEvents())[0].title).toBe('Jazz Night (SOLD OUT)')
  })

  it('reports a unique violation it cannot resolve as skipped', async () => {
    class ConflictDatabase extends InMemoryDatabase {
      async insertEvent(): Promise<StoredEvent> {
        throw new StoreError('duplicate key value', { code: UNIQUE_VIOLATION })
      }
    }

    const summary = await new Reconciler(new ConflictDatabase()).reconcile([event('https://example.com/e/u1', 'Jazz Night')], T0)

    expect(summary.skipped).toBe(1)
  })

  it('serializes concurrent upserts of the same ticket URL', async () => {
    class SlowDatabase extends InMemoryDatabase {
      async findEventByTicketUrl(ticketUrl: string): Promise<StoredEvent | null> {
        const found = await super.findEventByTicketUrl(ticketUrl)
        await tick()
        return found
      }
    }
    const slow = new SlowDatabase()
    const shared = new Reconciler(slow)

    const [a, b] = await Promise.all([
      shared.reconcile([event('https://example.com/e/u1', 'first')], T0, { sweep: false }),
      shared.reconcile([event('https://example.com/e/u1', 'second')], T0, { sweep: false })
    ])

    expect(a).toEqual({ inserted: 1, updated: 0, skipped: 0, expired: 0 })
    expect(b).toEqual({ inserted: 0, updated: 1, skipped: 0, expired: 0 })
    const rows = await slow.listEvents()
    expect(rows).toHaveLength(1)
    expect(rows[0].title).toBe('second')
  })
})
