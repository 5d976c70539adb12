/**
 * Root configuration for event ingestion
 *
 * Declarative defaults for the city being catalogued, crawling etiquette,
 * the cycle schedule and each source. Environment variables layered on top
 * of these are applied by packages/core/settings.ts at process start.
 */

export interface CityConfig {
  /** URL slug used by the sources (e.g. "sydney") */
  slug: string
  /** Display name, also used for the fallback location */
  name: string
  country: string
  /** IANA zone used to read dates that carry no offset */
  timezone: string
}

export interface CrawlConfig {
  /** Minimum delay between two requests to the same host */
  requestDelaySeconds: number
  /** Hard timeout for a single HTTP request */
  timeoutSeconds: number
  userAgent: string
}

export interface ScheduleConfig {
  intervalMinutes: number
  /** How many adapters may run side by side within one cycle */
  concurrency: number
}

export interface PagedSourceConfig {
  enabled: boolean
  maxPages: number
}

export interface MeetupConfig {
  enabled: boolean
  /** Group URL names (e.g. "sydney-tech-talks" for meetup.com/sydney-tech-talks) */
  groups: string[]
}

export interface Config {
  city: CityConfig
  crawl: CrawlConfig
  schedule: ScheduleConfig
  sources: {
    eventbrite: PagedSourceConfig
    timeout: PagedSourceConfig
    meetup: MeetupConfig
  }
}

const config: Config = {
  city: {
    slug: 'sydney',
    name: 'Sydney',
    country: 'Australia',
    timezone: 'Australia/Sydney'
  },

  crawl: {
    requestDelaySeconds: 3,
    timeoutSeconds: 30,
    userAgent: 'EventCatalogBot/1.0'
  },

  schedule: {
    intervalMinutes: 60,
    concurrency: 1
  },

  sources: {
    // Search result pages; listings come from embedded JSON-LD
    eventbrite: {
      enabled: true,
      maxPages: 3
    },

    timeout: {
      enabled: true,
      maxPages: 2
    },

    // Public iCal feeds, one request per group
    meetup: {
      enabled: true,
      groups: [
        'sydney-python',
        'sydney-js',
        'sydney-board-games'
      ]
    }
  }
}

export default config
