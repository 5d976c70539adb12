import type { AdapterFactory, SourceAdapter } from '../types.js';
import { collectPages } from '../paging.js';
import { parseSearchPage } from './parser.js';

/**
 * Eventbrite adapter
 *
 * Purpose: City-wide search results
 * Method: HTTP + JSON-LD (no browser needed)
 * Pages: sources.eventbrite.maxPages, stops at the first empty page
 */

export const BASE_URL = 'https://www.eventbrite.com.au';

function slugify(value: string): string {
  return value.toLowerCase().trim().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');
}

export function searchPageUrls(country: string, city: string, maxPages: number): string[] {
  const searchUrl = `${BASE_URL}/d/${slugify(country)}--${slugify(city)}/events/`;
  return Array.from({ length: maxPages }, (_, i) => (i === 0 ? searchUrl : `${searchUrl}?page=${i + 1}`));
}

const createEventbriteAdapter: AdapterFactory = (settings): SourceAdapter => ({
  id: 'eventbrite',
  name: 'Eventbrite',
  baseUrl: BASE_URL,
  dateStyles: ['iso', 'month-first'],

  collect(ctx) {
    return collectPages(ctx, {
      source: 'eventbrite',
      pageUrls: searchPageUrls(settings.city.country, settings.city.slug, settings.sources.eventbrite.maxPages),
      parse: html => parseSearchPage(html)
    });
  }
});

export default createEventbriteAdapter;
