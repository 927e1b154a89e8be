/**
 * Per-domain Cookie Cache
 *
 * Remembers cookies handed out by storefronts (Set-Cookie on direct responses,
 * solver solutions, browser contexts) so later direct requests can skip the
 * challenge. Each domain entry lives for the configured TTL; individual cookies
 * also carry their own expiry and are dropped once it passes.
 */

import { systemClock, type Clock } from './clock.js'
import type { CookieInput } from './types.js'

export interface CookieEntry {
  name: string
  value: string
  domain: string
  /** Epoch ms; null for session cookies (bounded by the entry TTL) */
  expiresAt: number | null
}

interface DomainCookies {
  cookies: Map<string, CookieEntry>
  expiresAt: number
}

export interface CookieCacheOptions {
  ttlMs: number
  /** When false the cache never stores anything and never yields a header */
  enabled?: boolean
  clock?: Clock
}

/**
 * A cookie domain attribute applies to a request domain when it equals it or
 * is a parent of it. An empty attribute means host-only, which always applies.
 */
export function cookieDomainMatches(requestDomain: string, cookieDomain: string): boolean {
  const normalized = cookieDomain.trim().replace(/^\.+/, '').toLowerCase()
  if (!normalized) return true
  const request = requestDomain.toLowerCase()
  return request === normalized || request.endsWith(`.${normalized}`)
}

export class CookieCache {
  private readonly ttlMs: number
  private readonly enabled: boolean
  private readonly clock: Clock
  private readonly entries = new Map<string, DomainCookies>()

  constructor(options: CookieCacheOptions) {
    this.ttlMs = options.ttlMs
    this.enabled = options.enabled ?? true
    this.clock = options.clock ?? systemClock
  }

  /**
   * Cookie header for the domain, `name=value` pairs sorted by name.
   * Returns null when nothing live is cached.
   */
  headerFor(domain: string): string | null {
    if (!this.enabled) return null

    const now = this.clock.now()
    const entry = this.entries.get(domain)
    if (!entry) return null
    if (entry.expiresAt <= now) {
      this.entries.delete(domain)
      return null
    }

    for (const [name, cookie] of entry.cookies) {
      if (cookie.expiresAt !== null && cookie.expiresAt <= now) {
        entry.cookies.delete(name)
      }
    }
    if (entry.cookies.size === 0) {
      this.entries.delete(domain)
      return null
    }

    return [...entry.cookies.values()]
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(cookie => `${cookie.name}=${cookie.value}`)
      .join('; ')
  }

  /**
   * Merge cookies into the domain's entry and restart its TTL.
   * Cookies scoped to another domain are ignored; a null value or a past
   * expiry removes the cookie of that name.
   */
  store(domain: string, cookies: readonly CookieInput[]): void {
    if (!this.enabled || cookies.length === 0) return

    const now = this.clock.now()
    const existing = this.entries.get(domain)
    const merged = new Map<string, CookieEntry>(
      existing && existing.expiresAt > now ? existing.cookies : undefined
    )

    for (const cookie of cookies) {
      const name = cookie.name.trim()
      if (!name) continue

      const cookieDomain = (cookie.domain ?? '').trim().toLowerCase()
      if (cookieDomain && !cookieDomainMatches(domain, cookieDomain)) continue

      if (cookie.value === null) {
        merged.delete(name)
        continue
      }

      const expiresAt = cookie.expiresAt ?? null
      if (expiresAt !== null && expiresAt <= now) {
        merged.delete(name)
        continue
      }

      merged.set(name, { name, value: cookie.value, domain: cookieDomain || domain, expiresAt })
    }

    if (merged.size === 0) {
      this.entries.delete(domain)
      return
    }
    this.entries.set(domain, { cookies: merged, expiresAt: now + this.ttlMs })
  }

  clear(domain: string): void {
    this.entries.delete(domain)
  }

  /** Cached cookie names for a domain, including ones not yet pruned */
  names(domain: string): string[] {
    return [...(this.entries.get(domain)?.cookies.keys() ?? [])].sort()
  }
}
