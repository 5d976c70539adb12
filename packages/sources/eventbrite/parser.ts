import * as cheerio from 'cheerio';
import type { RawListing } from '../../core/types.js';
import { extractJsonLdEvents } from '../json-ld.js';

/**
 * Eventbrite search page parser
 *
 * Search pages are rendered client-side, but the server HTML embeds the
 * results as a schema.org ItemList in JSON-LD. That is the primary source;
 * the event-card markup is read only when no JSON-LD events are present.
 */

const CARD_SELECTOR = '[data-testid="search-event"], .event-card, .discover-search-desktop-card';

export interface SearchPage {
  listings: RawListing[];
  /** False when neither JSON-LD, event cards nor an empty-results notice exist */
  structureFound: boolean;
}

function cardListings($: cheerio.CheerioAPI): RawListing[] {
  const listings: RawListing[] = [];
  const seen = new Set<string>();

  $(CARD_SELECTOR).each((_, el) => {
    const $card = $(el);
    const $link = $card.find('a.event-card-link[href], a[href*="/e/"]').first();
    const href = $link.attr('href') || $card.find('a[href]').first().attr('href');
    if (!href || seen.has(href)) return;
    seen.add(href);

    const title = ($card.find('h3, h2').first().text() || $link.attr('aria-label') || '').trim();

    // Cards list date then venue as plain paragraphs
    const lines = $card
      .find('p')
      .toArray()
      .map(p => $(p).text().trim())
      .filter(Boolean);
    const dateText = $card.find('time').first().attr('datetime') || lines[0] || '';
    const locationText = lines.find(line => line !== lines[0] && !/^(from|free|\$)/i.test(line)) || '';

    const $img = $card.find('img').first();
    const imageUrl = $img.attr('src') || $img.attr('data-src');

    listings.push({
      source: 'eventbrite',
      title,
      dateText,
      locationText,
      url: href,
      imageUrl: imageUrl || undefined
    });
  });

  return listings;
}

export function parseSearchPage(html: string): SearchPage {
  const $ = cheerio.load(html);
  const events = extractJsonLdEvents($);

  if (events.length > 0) {
    const listings: RawListing[] = [];
    for (const event of events) {
      if (!event.url) continue;
      listings.push({
        source: 'eventbrite',
        title: event.name,
        dateText: event.startDate ?? '',
        locationText: [event.locationName, event.address].filter(Boolean).join(', '),
        url: event.url,
        imageUrl: event.image,
        description: event.description
      });
    }
    return { listings, structureFound: true };
  }

  const cards = cardListings($);
  const hasLayout =
    cards.length > 0 ||
    $('script[type="application/ld+json"]').length > 0 ||
    $('[data-testid="search-results-empty"], .search-no-results').length > 0;
  return { listings: cards, structureFound: hasLayout };
}
