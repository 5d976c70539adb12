import type { AdapterFactory, SourceAdapter } from '../types.js';
import { collectPages } from '../paging.js';
import { parseEventsPage } from './parser.js';

/**
 * Time Out adapter
 *
 * Purpose: Editorial event listings for the city
 * Method: HTTP + HTML tiles
 * Pages: sources.timeout.maxPages, stops at the first empty page
 */

export const BASE_URL = 'https://www.timeout.com';

export function eventsPageUrls(city: string, maxPages: number): string[] {
  const listUrl = `${BASE_URL}/${encodeURIComponent(city)}/events`;
  return Array.from({ length: maxPages }, (_, i) => (i === 0 ? listUrl : `${listUrl}?page=${i + 1}`));
}

const createTimeOutAdapter: AdapterFactory = (settings): SourceAdapter => ({
  id: 'timeout',
  name: 'Time Out',
  baseUrl: BASE_URL,
  dateStyles: ['iso', 'day-first'],

  collect(ctx) {
    return collectPages(ctx, {
      source: 'timeout',
      pageUrls: eventsPageUrls(settings.city.slug, settings.sources.timeout.maxPages),
      parse: html => parseEventsPage(html)
    });
  }
});

export default createTimeOutAdapter;
