import { describe, it, expect } from 'vitest'
import { ALLOW_ALL, agentToken, isPathAllowed, parseRobotsTxt } from './robots.js'

const UA = 'EventCatalogBot/1.0'

describe('agentToken', () => {
  it('keeps the lowercased product token', () => {
    expect(agentToken('EventCatalogBot/1.0 (+https://example.com/bot)')).toBe('eventcatalogbot')
  })
})

describe('parseRobotsTxt', () => {
  it('applies the wildcard group when our agent is not named', () => {
    const policy = parseRobotsTxt('User-agent: *\nDisallow: /private\n', UA)

    expect(isPathAllowed(policy, '/private/page')).toBe(false)
    expect(isPathAllowed(policy, '/events')).toBe(true)
  })

  it('prefers a group naming our agent over the wildcard group', () => {
    const text = [
      'User-agent: *',
      'Disallow: /',
      '',
      'User-agent: EventCatalogBot',
      'Disallow: /admin',
      'Crawl-delay: 5'
    ].join('\n')
    const policy = parseRobotsTxt(text, UA)

    expect(isPathAllowed(policy, '/events')).toBe(true)
    expect(isPathAllowed(policy, '/admin/users')).toBe(false)
    expect(policy.crawlDelaySeconds).toBe(5)
  })

  it('treats consecutive User-agent lines as one group', () => {
    const policy = parseRobotsTxt('User-agent: otherbot\nUser-agent: EventCatalogBot\nDisallow: /search\n', UA)

    expect(isPathAllowed(policy, '/search?q=jazz')).toBe(false)
  })

  it('lets the longest match decide and Allow win a tie', () => {
    const policy = parseRobotsTxt(
      'User-agent: *\nDisallow: /events\nAllow: /events/public\nDisallow: /tie\nAllow: /tie\n',
      UA
    )

    expect(isPathAllowed(policy, '/events/public/1')).toBe(true)
    expect(isPathAllowed(policy, '/events/private')).toBe(false)
    expect(isPathAllowed(policy, '/tie')).toBe(true)
  })

  it('supports * wildcards and the $ anchor', () => {
    const policy = parseRobotsTxt('User-agent: *\nDisallow: /*.pdf$\nDisallow: /*?sort=\n', UA)

    expect(isPathAllowed(policy, '/files/guide.pdf')).toBe(false)
    expect(isPathAllowed(policy, '/files/guide.pdf?v=2')).toBe(true)
    expect(isPathAllowed(policy, '/events?sort=date')).toBe(false)
    expect(isPathAllowed(policy, '/events?page=2')).toBe(true)
  })

  it('ignores an empty Disallow and comments', () => {
    const policy = parseRobotsTxt('User-agent: * # everyone\nDisallow:\nDisallow: /tmp # scratch\n', UA)

    expect(isPathAllowed(policy, '/events')).toBe(true)
    expect(isPathAllowed(policy, '/tmp/a')).toBe(false)
  })

  it('always allows /robots.txt', () => {
    const policy = parseRobotsTxt('User-agent: *\nDisallow: /\n', UA)

    expect(isPathAllowed(policy, '/robots.txt')).toBe(true)
    expect(isPathAllowed(policy, '/')).toBe(false)
  })

  it('ignores invalid crawl delays', () => {
    expect(parseRobotsTxt('User-agent: *\nCrawl-delay: soon\n', UA).crawlDelaySeconds).toBeNull()
  })

  it('allows everything without rules', () => {
    expect(isPathAllowed(ALLOW_ALL, '/anything')).toBe(true)
    expect(isPathAllowed(parseRobotsTxt('', UA), '/anything')).toBe(true)
  })
})
