import type { RawListing } from '../core/types.js';
import { ParseError, describeError } from '../core/errors.js';
import type { CollectContext } from './types.js';

/**
 * Paged listing fetcher shared by the HTML sources
 *
 * Walks page URLs in order and yields listings as each page is parsed.
 * Stops at the first empty page, at a page whose layout is unrecognised,
 * or at the first fetch failure; listings already yielded stand. A page
 * disallowed by robots.txt is skipped without being requested.
 */

export interface ParsedPage {
  listings: RawListing[];
  structureFound: boolean;
}

export interface PagedCollectOptions {
  source: string;
  pageUrls: string[];
  parse(html: string, pageUrl: string): ParsedPage;
}

export async function* collectPages(
  ctx: CollectContext,
  options: PagedCollectOptions
): AsyncGenerator<RawListing, void, undefined> {
  const { source, pageUrls } = options;
  const seen = new Set<string>();
  let total = 0;

  for (let index = 0; index < pageUrls.length; index++) {
    const pageNumber = index + 1;
    const pageUrl = pageUrls[index];

    let page: ParsedPage;
    try {
      const result = await ctx.fetcher.fetch(pageUrl);
      if (result.status === 'disallowed') {
        console.log(`[${source}] Page ${pageNumber} skipped: disallowed by robots.txt`);
        continue;
      }
      page = options.parse(result.body, result.finalUrl);
    } catch (error) {
      console.error(`[${source}] Page ${pageNumber} failed: ${describeError(error)}`);
      ctx.onError(error);
      return;
    }

    if (!page.structureFound) {
      const error = new ParseError(`Expected listing markup not found on page ${pageNumber} (${pageUrl})`);
      console.error(`[${source}] ${error.message}`);
      ctx.onError(error);
      return;
    }

    if (page.listings.length === 0) {
      console.log(`[${source}] Page ${pageNumber} is empty, stopping`);
      return;
    }

    let fresh = 0;
    for (const listing of page.listings) {
      if (seen.has(listing.url)) continue;
      seen.add(listing.url);
      fresh++;
      total++;
      yield listing;
    }

    console.log(`[${source}] Page ${pageNumber}: ${fresh} listings (${total} so far)`);
  }
}
