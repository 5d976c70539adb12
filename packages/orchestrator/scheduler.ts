/**
 * Ingestion scheduler
 *
 * Idle -> Running -> Idle. start() runs a cycle at once and then on a fixed
 * interval; a trigger that fires mid-cycle is dropped with a warning, never
 * queued. A cycle runs every adapter (in batches of `concurrency`), pipes
 * its listings through the normalizer into the reconciler, and finishes
 * with one expiry sweep. Nothing an adapter throws leaves runAdapter().
 */

import type { CrawlGate } from '../crawl/gate.js'
import type { PageFetcher } from '../crawl/http.js'
import { describeError } from '../core/errors.js'
import type { Settings } from '../core/settings.js'
import type { AdapterSummary, CycleSummary, NormalizedEvent } from '../core/types.js'
import { createNormalizer } from '../normalize/normalizer.js'
import type { SourceAdapter } from '../sources/types.js'
import type { Reconciler } from './reconciler.js'
import { printCycleSummary } from './summary.js'

export type SchedulerState = 'idle' | 'running'

export interface SchedulerOptions {
  adapters: readonly SourceAdapter[]
  reconciler: Reconciler
  gate: CrawlGate
  fetcher: PageFetcher
  settings: Readonly<Settings>
  /** Injected for tests */
  now?: () => Date
}

export class Scheduler {
  private readonly options: SchedulerOptions
  private readonly now: () => Date
  private timer: ReturnType<typeof setInterval> | null = null
  private inFlight: Promise<CycleSummary> | null = null
  private stopping = false

  constructor(options: SchedulerOptions) {
    this.options = options
    this.now = options.now ?? (() => new Date())
  }

  get state(): SchedulerState {
    return this.inFlight ? 'running' : 'idle'
  }

  /**
   * Run a cycle now, then every settings.schedule.intervalMs
   */
  start(): void {
    if (this.timer) return
    this.stopping = false

    const { intervalMs } = this.options.settings.schedule
    console.log(`[scheduler] Started, cycle every ${Math.round(intervalMs / 60000)} min`)

    this.trigger()
    this.timer = setInterval(() => this.trigger(), intervalMs)
  }

  /**
   * Cancel the timer and wait for the in-flight cycle, which stops after
   * the adapters it is currently running
   */
  async stop(): Promise<void> {
    this.stopping = true
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    if (this.inFlight) {
      console.log('[scheduler] Waiting for the current adapter(s) to finish...')
      await this.inFlight
    }
    console.log('[scheduler] Stopped')
  }

  /**
   * Run one cycle over the given adapters (all registered ones by default).
   * Resolves to null when a cycle is already running.
   */
  async runCycle(adapters: readonly SourceAdapter[] = this.options.adapters): Promise<CycleSummary | null> {
    if (this.inFlight) {
      console.warn('[scheduler] ⚠️  Previous cycle still running, skipping this trigger')
      return null
    }

    const cycle = this.executeCycle(adapters)
    this.inFlight = cycle
    try {
      return await cycle
    } finally {
      this.inFlight = null
    }
  }

  private trigger(): void {
    this.runCycle().catch(error => {
      console.error(`[scheduler] Cycle crashed: ${describeError(error)}`)
    })
  }

  private async executeCycle(adapters: readonly SourceAdapter[]): Promise<CycleSummary> {
    const { gate, reconciler, settings } = this.options
    const startedAt = this.now()
    const concurrency = Math.max(1, settings.schedule.concurrency)

    console.log(`\n🚀 Cycle started: ${adapters.length} adapter(s)`)
    gate.beginCycle()

    const results: AdapterSummary[] = []
    let stoppedEarly = false

    for (let i = 0; i < adapters.length; i += concurrency) {
      if (this.stopping) {
        stoppedEarly = true
        console.warn(`[scheduler] Shutdown requested, ${adapters.length - i} adapter(s) not run`)
        break
      }
      const batch = adapters.slice(i, i + concurrency)
      results.push(...(await Promise.all(batch.map(adapter => this.runAdapter(adapter)))))
    }

    const expired = await reconciler.sweepExpired(this.now())
    const finishedAt = this.now()

    const summary: CycleSummary = {
      startedAt,
      finishedAt,
      duration: finishedAt.getTime() - startedAt.getTime(),
      adapters: results,
      expired,
      totals: {
        listingsSeen: results.reduce((sum, r) => sum + r.listingsSeen, 0),
        inserted: results.reduce((sum, r) => sum + r.inserted, 0),
        updated: results.reduce((sum, r) => sum + r.updated, 0),
        skipped: results.reduce((sum, r) => sum + r.skipped, 0),
        errors: results.reduce((sum, r) => sum + r.errors, 0)
      },
      stoppedEarly
    }

    printCycleSummary(summary)
    return summary
  }

  /**
   * collect -> normalize -> reconcile for one adapter
   */
  async runAdapter(adapter: SourceAdapter): Promise<AdapterSummary> {
    const { fetcher, reconciler, settings } = this.options
    const started = Date.now()
    const result: AdapterSummary = {
      source: adapter.id,
      listingsSeen: 0,
      dropped: 0,
      inserted: 0,
      updated: 0,
      skipped: 0,
      errors: 0,
      failed: false,
      duration: 0
    }

    const normalize = createNormalizer({
      baseUrl: adapter.baseUrl,
      dateStyles: adapter.dateStyles,
      timeZone: settings.city.timezone,
      defaultLocation: `${settings.city.name}, ${settings.city.country}`,
      now: this.now
    })

    console.log(`[${adapter.id}] Collecting from ${adapter.name}...`)

    try {
      const events: NormalizedEvent[] = []
      const ctx = {
        fetcher,
        onError: () => {
          result.errors++
        }
      }

      for await (const raw of adapter.collect(ctx)) {
        result.listingsSeen++
        const event = normalize(raw)
        if (event) {
          events.push(event)
        } else {
          result.dropped++
        }
      }

      if (result.listingsSeen === 0) {
        console.warn(`[${adapter.id}] ⚠️  No listings found; the page layout may have changed`)
      }

      const reconciled = await reconciler.reconcile(events, this.now(), { sweep: false })
      result.inserted = reconciled.inserted
      result.updated = reconciled.updated
      result.skipped = reconciled.skipped
    } catch (error) {
      result.failed = true
      result.errors++
      result.error = describeError(error)
      console.error(`[${adapter.id}] ❌ Adapter failed:`, error)
    }

    result.duration = Date.now() - started
    return result
  }
}
