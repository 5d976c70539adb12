/**
 * Reconciler
 *
 * The only writer to the events table. Each normalized event is upserted by
 * ticket URL as an explicit read-modify-write: insert a full row on first
 * sight, otherwise overwrite only REFRESH_FIELDS and updated_at. Upserts for
 * the same ticket URL are serialized through a per-key lock so adapters
 * running side by side cannot lose each other's writes.
 */

import type { Database } from '../core/database.js'
import { UNIQUE_VIOLATION } from '../core/database.js'
import { StoreError, describeError } from '../core/errors.js'
import { KeyedMutex } from '../core/lock.js'
import type { EventRefresh, NormalizedEvent, ReconcileSummary } from '../core/types.js'

type Outcome = 'inserted' | 'updated' | 'skipped'

export interface ReconcileOptions {
  /** Run the expiry sweep after the upserts (default true) */
  sweep?: boolean
}

function refreshOf(event: NormalizedEvent, now: Date): EventRefresh {
  return {
    title: event.title,
    startTime: event.startTime,
    location: event.location,
    description: event.description,
    imageUrl: event.imageUrl,
    source: event.source,
    updatedAt: now
  }
}

export class Reconciler {
  constructor(
    private readonly db: Database,
    private readonly locks: KeyedMutex = new KeyedMutex()
  ) {}

  /**
   * Upsert a batch of events; one failing record never aborts the rest
   */
  async reconcile(
    events: Iterable<NormalizedEvent>,
    now: Date,
    options: ReconcileOptions = {}
  ): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { inserted: 0, updated: 0, skipped: 0, expired: 0 }

    for (const event of events) {
      const outcome = await this.upsert(event, now)
      summary[outcome]++
    }

    if (options.sweep ?? true) {
      summary.expired = await this.sweepExpired(now)
    }

    return summary
  }

  /**
   * Upsert a single event under its ticket URL lock
   */
  async upsert(event: NormalizedEvent, now: Date): Promise<Outcome> {
    try {
      return await this.locks.runExclusive(event.ticketUrl, () => this.write(event, now))
    } catch (error) {
      console.error(`[reconcile] Skipped ${event.ticketUrl}: ${describeError(error)}`)
      return 'skipped'
    }
  }

  /**
   * Set expires_at on every started event that has none yet.
   * A failed sweep is logged and retried by the next cycle.
   */
  async sweepExpired(now: Date): Promise<number> {
    try {
      const expired = await this.db.markExpired(now)
      if (expired > 0) {
        console.log(`[reconcile] Marked ${expired} event(s) expired`)
      }
      return expired
    } catch (error) {
      console.error(`[reconcile] Expiry sweep failed: ${describeError(error)}`)
      return 0
    }
  }

  private async write(event: NormalizedEvent, now: Date): Promise<Outcome> {
    const existing = await this.db.findEventByTicketUrl(event.ticketUrl)

    if (existing) {
      await this.db.updateEvent(existing.id, refreshOf(event, now))
      return 'updated'
    }

    try {
      await this.db.insertEvent({
        ...event,
        createdAt: now,
        updatedAt: now,
        expiresAt: null,
        clickCount: 0
      })
      return 'inserted'
    } catch (error) {
      // Another writer got there first; fall back to refreshing its row
      if (error instanceof StoreError && error.code === UNIQUE_VIOLATION) {
        const winner = await this.db.findEventByTicketUrl(event.ticketUrl)
        if (winner) {
          await this.db.updateEvent(winner.id, refreshOf(event, now))
          return 'updated'
        }
      }
      throw error
    }
  }
}
