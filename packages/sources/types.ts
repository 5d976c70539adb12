/**
 * Source adapter contract
 *
 * One adapter per external site. The orchestrator only knows this
 * interface; adding a site means adding packages/sources/<name>/adapter.ts
 * whose default export is an AdapterFactory.
 */

import type { PageFetcher } from '../crawl/http.js'
import type { Settings } from '../core/settings.js'
import type { EventSource, RawListing } from '../core/types.js'
import type { DateStyle } from '../normalize/dates.js'

export interface CollectContext {
  /** Shared, gate-aware fetcher; never call fetch() directly */
  fetcher: PageFetcher
  /** Contained failures (network, parse); counted into the adapter's errors */
  onError(error: unknown): void
}

export interface SourceAdapter {
  id: EventSource
  name: string
  /** Base for relative URLs in this source's listings */
  baseUrl: string
  /** Date formats the normalizer should try for this source, in order */
  dateStyles: readonly DateStyle[]
  /**
   * Yield listings as they are extracted. Fetch and parse failures are
   * reported through ctx.onError and end the sequence early; they are
   * never thrown.
   */
  collect(ctx: CollectContext): AsyncGenerator<RawListing, void, undefined>
}

export type AdapterFactory = (settings: Readonly<Settings>) => SourceAdapter
