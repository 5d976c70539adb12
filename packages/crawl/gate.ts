/**
 * Crawl gate: per-host robots.txt policy and request spacing
 *
 * One gate is shared by every adapter in the process, so two adapters that
 * hit the same host still queue behind one another. Policies are cached
 * for the current cycle only; beginCycle() drops them.
 *
 * Policy rules:
 * 1. robots.txt 2xx: parse and obey
 * 2. robots.txt 4xx: no policy, everything allowed
 * 3. robots.txt 5xx / timeout / network failure: permissive, with a warning
 * 4. Delay between requests = max(configured delay, Crawl-delay)
 */

import { ALLOW_ALL, isPathAllowed, parseRobotsTxt } from './robots.js'
import type { RobotsPolicy } from './robots.js'
import { describeError } from '../core/errors.js'

export interface GateOptions {
  userAgent: string
  /** Minimum spacing between requests to one host */
  requestDelayMs: number
  /** Timeout for the robots.txt request */
  policyTimeoutMs: number
  /** Injected for tests */
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export class CrawlGate {
  private readonly options: Required<GateOptions>
  private readonly policies = new Map<string, Promise<RobotsPolicy>>()
  private readonly crawlDelays = new Map<string, number>()
  private readonly lastSlot = new Map<string, number>()

  constructor(options: GateOptions) {
    this.options = {
      ...options,
      fetch: options.fetch ?? ((input, init) => fetch(input, init)),
      sleep: options.sleep ?? (ms => new Promise<void>(resolve => setTimeout(resolve, ms))),
      now: options.now ?? (() => Date.now())
    }
  }

  /**
   * Start a new cycle: forget every cached policy
   */
  beginCycle(): void {
    this.policies.clear()
    this.crawlDelays.clear()
  }

  /**
   * Check whether the host's robots.txt lets us request path.
   * The policy is fetched on first use per cycle; concurrent callers share it.
   */
  async allowed(host: string, path: string): Promise<boolean> {
    const policy = await this.getPolicy(host)
    return isPathAllowed(policy, path)
  }

  /**
   * Wait until the host's next request slot.
   * The slot is reserved before sleeping, so concurrent callers serialize.
   */
  async waitIfNeeded(host: string): Promise<void> {
    const now = this.options.now()
    const delay = Math.max(this.options.requestDelayMs, this.crawlDelays.get(host) ?? 0)
    const last = this.lastSlot.get(host)
    const slot = last === undefined ? now : Math.max(now, last + delay)
    this.lastSlot.set(host, slot)

    const wait = slot - now
    if (wait > 0) {
      await this.options.sleep(wait)
    }
  }

  private getPolicy(host: string): Promise<RobotsPolicy> {
    const cached = this.policies.get(host)
    if (cached) return cached

    const pending = this.fetchPolicy(host)
    this.policies.set(host, pending)
    return pending
  }

  private async fetchPolicy(host: string): Promise<RobotsPolicy> {
    const robotsUrl = `https://${host}/robots.txt`

    await this.waitIfNeeded(host)

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.options.policyTimeoutMs)

    try {
      const response = await this.options.fetch(robotsUrl, {
        headers: { 'User-Agent': this.options.userAgent },
        signal: controller.signal,
        redirect: 'follow'
      })

      if (response.status >= 400 && response.status < 500) {
        await response.body?.cancel()
        return ALLOW_ALL
      }

      if (!response.ok) {
        await response.body?.cancel()
        console.warn(`[gate] robots.txt for ${host} returned HTTP ${response.status}, proceeding without a policy`)
        return ALLOW_ALL
      }

      const policy = parseRobotsTxt(await response.text(), this.options.userAgent)
      if (policy.crawlDelaySeconds !== null) {
        this.crawlDelays.set(host, policy.crawlDelaySeconds * 1000)
      }
      return policy
    } catch (error) {
      console.warn(`[gate] Could not read robots.txt for ${host} (${describeError(error)}), proceeding without a policy`)
      return ALLOW_ALL
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
