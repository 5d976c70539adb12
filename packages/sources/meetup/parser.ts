import ical from 'node-ical';
import type { CalendarResponse } from 'node-ical';
import type { RawListing } from '../../core/types.js';
import { ParseError } from '../../core/errors.js';

/**
 * Meetup group iCal feed parser
 *
 * node-ical returns text properties either as plain strings or, when the
 * line carries parameters, as { params, val }. Both shapes are read here.
 */

const EVENT_URL = /https?:\/\/(?:www\.)?meetup\.com\/[^\s"<>]+\/events\/[^\s"<>]+/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Plain text of an iCal property value
 */
export function icalText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (value !== null && typeof value === 'object' && 'val' in value) {
    return icalText(value.val);
  }
  return undefined;
}

function startText(value: unknown): string {
  if (!(value instanceof Date) || Number.isNaN(value.getTime())) return '';

  // All-day events come back as local midnight of this process; keep only the
  // calendar date so the normalizer reads it in the city's zone.
  if ('dateOnly' in value && value.dateOnly === true) {
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  return value.toISOString();
}

export function parseGroupFeed(text: string, group: string): RawListing[] {
  if (!/BEGIN:VCALENDAR/i.test(text)) {
    throw new ParseError(`Feed for ${group} is not an iCalendar document`);
  }

  let parsed: CalendarResponse;
  try {
    parsed = ical.sync.parseICS(text);
  } catch (error) {
    throw new ParseError(`Could not parse iCal feed for ${group}`, error instanceof Error ? error : undefined);
  }

  const listings: RawListing[] = [];

  for (const component of Object.values(parsed)) {
    const fields = new Map<string, unknown>(Object.entries(component));
    if (fields.get('type') !== 'VEVENT') continue;
    if (icalText(fields.get('status'))?.toUpperCase() === 'CANCELLED') continue;

    const description = icalText(fields.get('description'));
    const url = icalText(fields.get('url')) ?? description?.match(EVENT_URL)?.[0];
    if (!url) continue;

    listings.push({
      source: 'meetup',
      title: icalText(fields.get('summary')) ?? '',
      dateText: startText(fields.get('start')),
      locationText: icalText(fields.get('location')) ?? '',
      url,
      description
    });
  }

  return listings;
}
