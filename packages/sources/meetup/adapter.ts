import type { AdapterFactory, SourceAdapter } from '../types.js';
import type { RawListing } from '../../core/types.js';
import { describeError } from '../../core/errors.js';
import { parseGroupFeed } from './parser.js';

/**
 * Meetup adapter
 *
 * Purpose: Community meetups from a configured list of groups
 * Method: Public iCal feed per group, parsed with node-ical
 * Failures: A failed group is reported and the next group is still read
 */

export const BASE_URL = 'https://www.meetup.com';

export function groupFeedUrl(group: string): string {
  return `${BASE_URL}/${encodeURIComponent(group)}/events/ical/`;
}

const createMeetupAdapter: AdapterFactory = (settings): SourceAdapter => ({
  id: 'meetup',
  name: 'Meetup',
  baseUrl: BASE_URL,
  dateStyles: ['iso'],

  async *collect(ctx): AsyncGenerator<RawListing, void, undefined> {
    const seen = new Set<string>();

    for (const group of settings.sources.meetup.groups) {
      let listings: RawListing[];
      try {
        const result = await ctx.fetcher.fetch(groupFeedUrl(group));
        if (result.status === 'disallowed') {
          console.log(`[meetup] ${group} skipped: disallowed by robots.txt`);
          continue;
        }
        listings = parseGroupFeed(result.body, group);
      } catch (error) {
        console.error(`[meetup] ${group} failed: ${describeError(error)}`);
        ctx.onError(error);
        continue;
      }

      let fresh = 0;
      for (const listing of listings) {
        if (seen.has(listing.url)) continue;
        seen.add(listing.url);
        fresh++;
        yield listing;
      }
      console.log(`[meetup] ${group}: ${fresh} events`);
    }
  }
});

export default createMeetupAdapter;
