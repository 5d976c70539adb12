import * as cheerio from 'cheerio';
import type { RawListing } from '../../core/types.js';
import type { ParsedPage } from '../paging.js';

/**
 * Time Out events page parser
 *
 * Each listing is an <article> tile: heading, link to the detail page,
 * a <time> (with or without datetime), venue/address and a short summary.
 * Images are lazy-loaded, so data-src is read before src.
 */

const CARD_SELECTOR = 'article, [data-testid="tile"]';
const EMPTY_SELECTOR = '.no-results, [data-testid="no-results"]';

function imageUrl(...candidates: (string | undefined)[]): string | undefined {
  return candidates.find(src => src && !src.startsWith('data:'));
}

export function parseEventsPage(html: string): ParsedPage {
  const $ = cheerio.load(html);
  const listings: RawListing[] = [];
  const $cards = $(CARD_SELECTOR);

  $cards.each((_, el) => {
    const $card = $(el);
    const firstText = (selector: string) => $card.find(selector).first().text().replace(/\s+/g, ' ').trim();

    const href = $card
      .find('a[href]')
      .toArray()
      .map(a => $(a).attr('href') ?? '')
      .find(h => h && !h.startsWith('#') && !h.startsWith('mailto:'));
    if (!href) return;

    // Tiles in ranked lists are prefixed "1.", "2." ...
    const title = firstText('h3, h2, [data-testid="tile-title"]').replace(/^\d+\.\s*/, '');

    const $time = $card.find('time').first();
    const dateText =
      $time.attr('datetime') ||
      $time.text().trim() ||
      firstText('.date, [class*="date"]');

    const locationText = firstText('address, .venue, [class*="venue"], [class*="location"]');
    const description = firstText('[class*="summary"], [class*="description"], p');
    const $img = $card.find('img').first();

    listings.push({
      source: 'timeout',
      title,
      dateText,
      locationText,
      url: href,
      imageUrl: imageUrl($img.attr('data-src'), $img.attr('data-lazy-src'), $img.attr('src')),
      description: description || undefined
    });
  });

  return {
    listings,
    structureFound: $cards.length > 0 || $(EMPTY_SELECTOR).length > 0
  };
}
