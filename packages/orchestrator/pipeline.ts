/**
 * Wires one ingestion pipeline from settings: a shared gate and fetcher,
 * the reconciler over the given store, and the enabled adapters.
 */

import type { Database } from '../core/database.js'
import type { Settings } from '../core/settings.js'
import { CrawlGate } from '../crawl/gate.js'
import { PageFetcher } from '../crawl/http.js'
import type { SourceAdapter } from '../sources/types.js'
import { Reconciler } from './reconciler.js'
import { loadEnabledAdapters } from './registry.js'
import { Scheduler } from './scheduler.js'

export interface PipelineOptions {
  db: Database
  /** Defaults to every enabled adapter on disk */
  adapters?: readonly SourceAdapter[]
  /** Injected for tests */
  fetch?: typeof fetch
}

export async function createPipeline(settings: Readonly<Settings>, options: PipelineOptions): Promise<Scheduler> {
  const { crawl } = settings

  const gate = new CrawlGate({
    userAgent: crawl.userAgent,
    requestDelayMs: crawl.requestDelayMs,
    policyTimeoutMs: crawl.timeoutMs,
    fetch: options.fetch
  })

  const fetcher = new PageFetcher({
    gate,
    userAgent: crawl.userAgent,
    timeoutMs: crawl.timeoutMs,
    fetch: options.fetch
  })

  return new Scheduler({
    adapters: options.adapters ?? (await loadEnabledAdapters(settings)),
    reconciler: new Reconciler(options.db),
    gate,
    fetcher,
    settings
  })
}
