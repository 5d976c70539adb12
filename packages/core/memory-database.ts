/**
 * Process-local store with the same contract as SupabaseDatabase.
 * Backs dry runs and tests. Rows are copied in and out; returned objects
 * are detached from stored state.
 */

import type { Database } from './database.js'
import { UNIQUE_VIOLATION } from './database.js'
import { StoreError } from './errors.js'
import { REFRESH_FIELDS } from './types.js'
import type { EventRefresh, NewEvent, StoredEvent } from './types.js'

function copy(event: StoredEvent): StoredEvent {
  return {
    ...event,
    startTime: new Date(event.startTime),
    createdAt: new Date(event.createdAt),
    updatedAt: new Date(event.updatedAt),
    expiresAt: event.expiresAt ? new Date(event.expiresAt) : null
  }
}

export class InMemoryDatabase implements Database {
  private readonly rows = new Map<number, StoredEvent>()
  private readonly byTicketUrl = new Map<string, number>()
  private nextId = 1

  async findEventByTicketUrl(ticketUrl: string): Promise<StoredEvent | null> {
    const id = this.byTicketUrl.get(ticketUrl)
    const row = id === undefined ? undefined : this.rows.get(id)
    return row ? copy(row) : null
  }

  async insertEvent(event: NewEvent): Promise<StoredEvent> {
    if (this.byTicketUrl.has(event.ticketUrl)) {
      throw new StoreError(
        `duplicate key value violates unique constraint "events_ticket_url_key"`,
        { code: UNIQUE_VIOLATION }
      )
    }

    const row: StoredEvent = copy({ ...event, id: this.nextId++ })
    this.rows.set(row.id, row)
    this.byTicketUrl.set(row.ticketUrl, row.id)
    return copy(row)
  }

  async updateEvent(id: number, refresh: EventRefresh): Promise<StoredEvent> {
    const row = this.rows.get(id)
    if (!row) {
      throw new StoreError(`Failed to update event ${id}: no such row`)
    }

    const updated: StoredEvent = { ...row, updatedAt: new Date(refresh.updatedAt) }
    for (const field of REFRESH_FIELDS) {
      Object.assign(updated, { [field]: refresh[field] })
    }
    this.rows.set(id, copy(updated))
    return copy(updated)
  }

  async markExpired(now: Date): Promise<number> {
    let count = 0
    for (const row of this.rows.values()) {
      if (row.expiresAt === null && row.startTime.getTime() < now.getTime()) {
        row.expiresAt = new Date(now)
        count++
      }
    }
    return count
  }

  /** All rows ordered by id */
  async listEvents(): Promise<StoredEvent[]> {
    return [...this.rows.values()].sort((a, b) => a.id - b.id).map(copy)
  }

  /**
   * Stand-in for the read side's per-view counter, so tests can check
   * that ingestion leaves it alone
   */
  async incrementClickCount(id: number): Promise<void> {
    const row = this.rows.get(id)
    if (row) row.clickCount++
  }
}
