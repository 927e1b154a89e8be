import { describe, expect, it } from 'vitest'
import { CookieCache, cookieDomainMatches } from '../cookie-cache.js'
import { FakeClock } from './helpers.js'

const DOMAIN = 'shop.example.com'

function cache(clock = new FakeClock(), enabled = true) {
  return { clock, cookies: new CookieCache({ ttlMs: 60_000, enabled, clock }) }
}

describe('CookieCache', () => {
  it('builds a header sorted by name', () => {
    const { cookies } = cache()
    cookies.store(DOMAIN, [
      { name: 'b', value: '2' },
      { name: 'a', value: '1' },
    ])

    expect(cookies.headerFor(DOMAIN)).toBe('a=1; b=2')
  })

  it('merges with the live entry and deletes on a null value', () => {
    const { cookies } = cache()
    cookies.store(DOMAIN, [{ name: 'a', value: '1' }, { name: 'b', value: '2' }])
    cookies.store(DOMAIN, [{ name: 'c', value: '3' }, { name: 'a', value: null }])

    expect(cookies.headerFor(DOMAIN)).toBe('b=2; c=3')
  })

  it('drops a cookie once its own expiry passes', () => {
    const { clock, cookies } = cache()
    cookies.store(DOMAIN, [
      { name: 'cf_clearance', value: 'x', expiresAt: clock.now() + 1000 },
      { name: 'lang', value: 'english' },
    ])

    clock.advance(1001)

    expect(cookies.headerFor(DOMAIN)).toBe('lang=english')
  })

  it('never stores an already expired cookie', () => {
    const { clock, cookies } = cache()
    cookies.store(DOMAIN, [{ name: 'old', value: 'x', expiresAt: clock.now() - 1 }])

    expect(cookies.headerFor(DOMAIN)).toBeNull()
  })

  it('expires the whole entry after the TTL', () => {
    const { clock, cookies } = cache()
    cookies.store(DOMAIN, [{ name: 'a', value: '1' }])

    clock.advance(60_000)

    expect(cookies.headerFor(DOMAIN)).toBeNull()
  })

  it('never sends cookies scoped to another domain', () => {
    const { cookies } = cache()
    cookies.store('a.example.com', [{ name: 'x', value: '1', domain: 'b.example.com' }])
    cookies.store('a.example.com', [{ name: 'y', value: '2', domain: '.example.com' }])

    expect(cookies.headerFor('a.example.com')).toBe('y=2')
    expect(cookies.headerFor('b.example.com')).toBeNull()
  })

  it('clears a domain', () => {
    const { cookies } = cache()
    cookies.store(DOMAIN, [{ name: 'a', value: '1' }])
    cookies.clear(DOMAIN)

    expect(cookies.headerFor(DOMAIN)).toBeNull()
  })

  it('does nothing when disabled', () => {
    const { cookies } = cache(new FakeClock(), false)
    cookies.store(DOMAIN, [{ name: 'a', value: '1' }])

    expect(cookies.headerFor(DOMAIN)).toBeNull()
    expect(cookies.names(DOMAIN)).toEqual([])
  })
})

describe('cookieDomainMatches', () => {
  it('matches the domain itself and its subdomains', () => {
    expect(cookieDomainMatches('shop.example.com', 'example.com')).toBe(true)
    expect(cookieDomainMatches('shop.example.com', '.Example.com')).toBe(true)
    expect(cookieDomainMatches('example.com', 'shop.example.com')).toBe(false)
    expect(cookieDomainMatches('badexample.com', 'example.com')).toBe(false)
    expect(cookieDomainMatches('a.example.com', '')).toBe(true)
  })
})
