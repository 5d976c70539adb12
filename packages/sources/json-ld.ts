import type { CheerioAPI } from 'cheerio';

/**
 * schema.org Event extraction from application/ld+json blocks.
 *
 * Listing pages usually wrap events in an ItemList (itemListElement ->
 * ListItem -> item) or a @graph; detail pages carry a bare Event. All of
 * these are walked and every Event-like object is returned.
 */

export interface JsonLdEvent {
  name: string;
  startDate?: string;
  url?: string;
  description?: string;
  image?: string;
  locationName?: string;
  address?: string;
}

const EVENT_TYPES = new Set([
  'Event',
  'MusicEvent',
  'TheaterEvent',
  'ComedyEvent',
  'DanceEvent',
  'EducationEvent',
  'ExhibitionEvent',
  'Festival',
  'FoodEvent',
  'SocialEvent',
  'SportsEvent',
  'BusinessEvent',
  'LiteraryEvent',
  'ScreeningEvent'
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function isEventType(type: unknown): boolean {
  if (typeof type === 'string') return EVENT_TYPES.has(type);
  if (Array.isArray(type)) return type.some(t => typeof t === 'string' && EVENT_TYPES.has(t));
  return false;
}

function imageOf(value: unknown): string | undefined {
  if (Array.isArray(value)) return imageOf(value[0]);
  if (isRecord(value)) return str(value.url) ?? str(value.contentUrl);
  return str(value);
}

function addressOf(value: unknown): string | undefined {
  if (!isRecord(value)) return str(value);
  const parts = [value.streetAddress, value.addressLocality, value.addressRegion]
    .map(str)
    .filter((part): part is string => part !== undefined);
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function toEvent(obj: Record<string, unknown>): JsonLdEvent | null {
  const name = str(obj.name);
  if (!name) return null;

  const location = Array.isArray(obj.location) ? obj.location[0] : obj.location;
  const place = isRecord(location) ? location : undefined;

  return {
    name,
    startDate: str(obj.startDate),
    url: str(obj.url),
    description: str(obj.description),
    image: imageOf(obj.image),
    locationName: place ? str(place.name) : str(location),
    address: place ? addressOf(place.address) : undefined
  };
}

function collectEvents(value: unknown, out: JsonLdEvent[]): void {
  if (Array.isArray(value)) {
    for (const item of value) collectEvents(item, out);
    return;
  }
  if (!isRecord(value)) return;

  if (isEventType(value['@type'])) {
    const event = toEvent(value);
    if (event) out.push(event);
    return;
  }

  if ('@graph' in value) collectEvents(value['@graph'], out);
  if ('itemListElement' in value) collectEvents(value.itemListElement, out);
  if (value['@type'] === 'ListItem' && 'item' in value) collectEvents(value.item, out);
}

/**
 * Every schema.org Event in the page's JSON-LD blocks.
 * Blocks that are not valid JSON are skipped.
 */
export function extractJsonLdEvents($: CheerioAPI): JsonLdEvent[] {
  const events: JsonLdEvent[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const text = $(el).text().trim();
    if (!text) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return;
    }
    collectEvents(parsed, events);
  });

  return events;
}
