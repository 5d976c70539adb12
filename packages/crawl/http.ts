/**
 * Page fetcher
 *
 * Every request goes through the crawl gate: robots.txt check first, then
 * the per-host delay, then a GET with a hard timeout. Redirects are
 * followed by hand so every hop passes the same checks. A disallowed path
 * is reported as an outcome and never requested. Anything else that stops
 * the page from arriving throws NetworkError.
 */

import type { CrawlGate } from './gate.js'
import { NetworkError } from '../core/errors.js'

export type PageResult =
  | { status: 'ok'; body: string; finalUrl: string }
  | { status: 'disallowed' }

export interface PageFetcherOptions {
  gate: CrawlGate
  userAgent: string
  timeoutMs: number
  /** Injected for tests */
  fetch?: typeof fetch
}

const ACCEPT_HTML = 'text/html,application/xhtml+xml,text/calendar;q=0.9,*/*;q=0.8'
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])
const MAX_REDIRECTS = 5

export class PageFetcher {
  private readonly gate: CrawlGate
  private readonly userAgent: string
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: PageFetcherOptions) {
    this.gate = options.gate
    this.userAgent = options.userAgent
    this.timeoutMs = options.timeoutMs
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
  }

  async fetch(url: string): Promise<PageResult> {
    let target = new URL(url)

    for (let hop = 0; ; hop++) {
      if (!(await this.gate.allowed(target.host, target.pathname + target.search))) {
        return { status: 'disallowed' }
      }

      await this.gate.waitIfNeeded(target.host)

      const response = await this.request(target)
      const location = REDIRECT_STATUSES.has(response.status) ? response.headers.get('location') : null

      if (location === null) {
        if (!response.ok) {
          await response.body?.cancel()
          throw new NetworkError(`HTTP ${response.status}: ${target.href}`, {
            url: target.href,
            status: response.status
          })
        }
        const body = await response.text()
        return { status: 'ok', body, finalUrl: target.href }
      }

      await response.body?.cancel()
      if (hop >= MAX_REDIRECTS) {
        throw new NetworkError(`Too many redirects: ${url}`, { url, status: response.status })
      }
      // Each hop goes back through the gate
      target = new URL(location, target)
    }
  }

  private async request(target: URL): Promise<Response> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      return await this.fetchImpl(target.href, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: ACCEPT_HTML
        },
        signal: controller.signal,
        redirect: 'manual'
      })
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new NetworkError(`Request timed out after ${this.timeoutMs}ms: ${target.href}`, {
          url: target.href,
          cause: error
        })
      }

      throw new NetworkError(`Request failed: ${target.href}`, {
        url: target.href,
        cause: error instanceof Error ? error : undefined
      })
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
