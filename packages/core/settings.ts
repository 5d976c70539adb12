/**
 * Runtime settings
 *
 * Merges config.ts defaults with environment overrides, validates the
 * result and freezes it. Settings are read once at process start and never
 * change afterwards; a bad value throws ConfigError, which is fatal.
 */

import defaults from '../../config.js'
import type { Config } from '../../config.js'
import { ConfigError } from './errors.js'
import { EVENT_SOURCES, isEventSource } from './types.js'
import type { EventSource } from './types.js'

export interface Settings {
  city: Config['city']
  crawl: {
    requestDelayMs: number
    timeoutMs: number
    userAgent: string
  }
  schedule: {
    intervalMs: number
    concurrency: number
  }
  sources: Config['sources']
  enabledSources: readonly EventSource[]
}

type Env = Record<string, string | undefined>

function readNumber(env: Env, name: string, fallback: number, options: { integer?: boolean } = {}): number {
  const raw = env[name]?.trim()
  if (!raw) return fallback

  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got "${raw}"`)
  }
  if (options.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${name} must be a whole number, got "${raw}"`)
  }
  return value
}

function readList(env: Env, name: string): string[] | null {
  const raw = env[name]
  if (raw === undefined) return null
  return raw.split(',').map(item => item.trim()).filter(Boolean)
}

function assertTimeZone(timezone: string): void {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone })
  } catch {
    throw new ConfigError(`Unknown time zone: ${timezone}`)
  }
}

// setTimeout and setInterval fire after 1ms when given anything larger
const MAX_TIMER_MS = 2147483647

function assertTimerRange(name: string, ms: number): void {
  if (ms > MAX_TIMER_MS) {
    throw new ConfigError(`${name} is too large: ${ms}ms exceeds the ${MAX_TIMER_MS}ms timer limit`)
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child)
    }
  }
  return Object.freeze(value)
}

/**
 * Build settings from config.ts defaults plus environment overrides
 */
export function loadSettings(env: Env = process.env, base: Config = defaults): Readonly<Settings> {
  const city = {
    slug: env.CITY?.trim() || base.city.slug,
    name: env.CITY_NAME?.trim() || base.city.name,
    country: env.CITY_COUNTRY?.trim() || base.city.country,
    timezone: env.CITY_TIMEZONE?.trim() || base.city.timezone
  }
  assertTimeZone(city.timezone)

  const requestDelaySeconds = readNumber(env, 'SCRAPER_DELAY_SECONDS', base.crawl.requestDelaySeconds)
  const timeoutSeconds = readNumber(env, 'SCRAPER_TIMEOUT_SECONDS', base.crawl.timeoutSeconds)
  const intervalMinutes = readNumber(env, 'SCRAPE_INTERVAL_MINUTES', base.schedule.intervalMinutes)
  assertTimerRange('SCRAPER_DELAY_SECONDS', requestDelaySeconds * 1000)
  assertTimerRange('SCRAPER_TIMEOUT_SECONDS', timeoutSeconds * 1000)
  assertTimerRange('SCRAPE_INTERVAL_MINUTES', intervalMinutes * 60000)
  const concurrency = readNumber(env, 'SCRAPE_CONCURRENCY', base.schedule.concurrency, { integer: true })

  const disabled = readList(env, 'DISABLED_SOURCES') ?? []
  for (const tag of disabled) {
    if (!isEventSource(tag)) {
      throw new ConfigError(`DISABLED_SOURCES contains unknown source "${tag}" (known: ${EVENT_SOURCES.join(', ')})`)
    }
  }

  const sources: Config['sources'] = {
    eventbrite: { ...base.sources.eventbrite },
    timeout: { ...base.sources.timeout },
    meetup: {
      ...base.sources.meetup,
      groups: readList(env, 'MEETUP_GROUPS') ?? [...base.sources.meetup.groups]
    }
  }

  const enabledSources = EVENT_SOURCES.filter(tag => sources[tag].enabled && !disabled.includes(tag))

  return deepFreeze({
    city,
    crawl: {
      requestDelayMs: requestDelaySeconds * 1000,
      timeoutMs: timeoutSeconds * 1000,
      userAgent: env.SCRAPER_USER_AGENT?.trim() || base.crawl.userAgent
    },
    schedule: {
      intervalMs: intervalMinutes * 60 * 1000,
      concurrency
    },
    sources,
    enabledSources
  })
}
