/**
 * robots.txt parsing and matching
 *
 * Rules:
 * 1. Groups naming our agent token win over `User-agent: *`
 * 2. Longest matching pattern decides; Allow wins a tie
 * 3. `*` matches any run of characters, a trailing `$` anchors the end
 * 4. Empty `Disallow:` allows everything
 * 5. Crawl-delay is read from the selected groups
 */

interface RobotsRule {
  allow: boolean
  pattern: string
  regex: RegExp
}

export interface RobotsPolicy {
  rules: RobotsRule[]
  /** Crawl-delay in seconds (null if not specified) */
  crawlDelaySeconds: number | null
}

interface Group {
  agents: string[]
  rules: RobotsRule[]
  crawlDelaySeconds: number | null
}

export const ALLOW_ALL: RobotsPolicy = Object.freeze({
  rules: [],
  crawlDelaySeconds: null
})

/**
 * Turn a robots.txt path pattern into an anchored regex
 */
function compilePattern(pattern: string): RegExp {
  const anchored = pattern.endsWith('$')
  const body = anchored ? pattern.slice(0, -1) : pattern
  const source = body
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*')
  return new RegExp(`^${source}${anchored ? '$' : ''}`)
}

/**
 * Product token of a User-Agent string ("EventCatalogBot/1.0 (+url)" -> "eventcatalogbot")
 */
export function agentToken(userAgent: string): string {
  return userAgent.trim().split(/[\s/]/)[0].toLowerCase()
}

/**
 * Parse robots.txt content into the policy that applies to userAgent
 */
export function parseRobotsTxt(text: string, userAgent: string): RobotsPolicy {
  const token = agentToken(userAgent)
  const groups: Group[] = []
  let current: Group | null = null
  let collectingAgents = false

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (!line) continue

    const colonIndex = line.indexOf(':')
    if (colonIndex === -1) continue

    const directive = line.slice(0, colonIndex).trim().toLowerCase()
    const value = line.slice(colonIndex + 1).trim()

    if (directive === 'user-agent') {
      // Consecutive User-agent lines share one group
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [], crawlDelaySeconds: null }
        groups.push(current)
      }
      current.agents.push(value.toLowerCase())
      collectingAgents = true
      continue
    }

    collectingAgents = false
    if (!current) continue

    if (directive === 'allow' || directive === 'disallow') {
      if (!value) continue
      current.rules.push({
        allow: directive === 'allow',
        pattern: value,
        regex: compilePattern(value)
      })
    } else if (directive === 'crawl-delay') {
      const delay = parseFloat(value)
      if (!isNaN(delay) && delay > 0) {
        current.crawlDelaySeconds = delay
      }
    }
  }

  const ours = groups.filter(group => group.agents.includes(token))
  const selected = ours.length > 0 ? ours : groups.filter(group => group.agents.includes('*'))

  const delays = selected
    .map(group => group.crawlDelaySeconds)
    .filter((delay): delay is number => delay !== null)

  return {
    rules: selected.flatMap(group => group.rules),
    crawlDelaySeconds: delays.length > 0 ? Math.max(...delays) : null
  }
}

/**
 * Check a path (including any query string) against a policy
 */
export function isPathAllowed(policy: RobotsPolicy, path: string): boolean {
  // robots.txt itself is always fetchable
  if (path === '/robots.txt') return true

  let best: RobotsRule | null = null
  for (const rule of policy.rules) {
    if (!rule.regex.test(path)) continue
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
    ) {
      best = rule
    }
  }

  return best ? best.allow : true
}
