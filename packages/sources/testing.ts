import { vi } from 'vitest';
import { CrawlGate } from '../crawl/gate.js';
import { PageFetcher } from '../crawl/http.js';
import type { RawListing } from '../core/types.js';
import type { CollectContext } from './types.js';

/**
 * Test helpers: a gate-backed fetcher over canned responses.
 * Unknown URLs (robots.txt included) answer 404.
 */

export type Routes = Record<string, () => Response>;

export function createTestContext(routes: Routes) {
  const fetch = vi.fn(async (input: string | URL | Request): Promise<Response> => {
    const route = routes[String(input)];
    return route ? route() : new Response('not found', { status: 404 });
  });
  const gate = new CrawlGate({
    userAgent: 'EventCatalogBot/1.0',
    requestDelayMs: 0,
    policyTimeoutMs: 1000,
    fetch,
    sleep: async () => {}
  });
  const onError = vi.fn<(error: unknown) => void>();
  const ctx: CollectContext = {
    fetcher: new PageFetcher({ gate, userAgent: 'EventCatalogBot/1.0', timeoutMs: 1000, fetch }),
    onError
  };
  return { ctx, fetch, onError };
}

export async function collectAll(listings: AsyncIterable<RawListing>): Promise<RawListing[]> {
  const out: RawListing[] = [];
  for await (const listing of listings) out.push(listing);
  return out;
}
