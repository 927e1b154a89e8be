/**
 * Per-domain Rate Limiter
 *
 * In-process limiter enforcing two minimum spacings at once:
 * a global interval across every domain and a per-domain interval.
 * A cooldown pushes a domain's next slot out (after 429s and 5xx).
 *
 * Rate limits apply to the full host (including port), the same key
 * the breaker and cookie cache use.
 */

import { systemClock, type Clock } from './clock.js'
import { extractDomain } from '../utils/url.js'

/** Longest single sleep while waiting, so cooldowns applied mid-wait are seen */
const MAX_SLEEP_MS = 500

/** Floor for configured qps, keeps intervals finite */
const MIN_QPS = 0.01

export interface DomainRateLimiterOptions {
  globalQps: number
  perDomainQps: number
  clock?: Clock
}

interface DomainSlotState {
  lastCallAt: number
  cooldownUntil: number
}

export function intervalMsForQps(qps: number): number {
  return 1000 / Math.max(MIN_QPS, qps)
}

export class DomainRateLimiter {
  private readonly globalIntervalMs: number
  private readonly domainIntervalMs: number
  private readonly clock: Clock
  private readonly domains = new Map<string, DomainSlotState>()
  private lastGlobalCallAt = Number.NEGATIVE_INFINITY

  constructor(options: DomainRateLimiterOptions) {
    this.globalIntervalMs = intervalMsForQps(options.globalQps)
    this.domainIntervalMs = intervalMsForQps(options.perDomainQps)
    this.clock = options.clock ?? systemClock
  }

  /**
   * Wait until both intervals have elapsed and any cooldown is over,
   * then claim the slot. The check-and-stamp runs without an await in
   * between, so two callers can never claim the same slot.
   */
  async waitForSlot(url: string, signal?: AbortSignal): Promise<void> {
    const state = this.stateFor(extractDomain(url))

    while (true) {
      const waitMs = this.waitFor(state, this.clock.now())
      if (waitMs <= 0) {
        const now = this.clock.now()
        this.lastGlobalCallAt = now
        state.lastCallAt = now
        return
      }
      await this.clock.sleep(Math.min(waitMs, MAX_SLEEP_MS), signal)
    }
  }

  /**
   * Push the domain's next slot at least `seconds` into the future.
   * Never shortens an existing cooldown.
   */
  applyCooldown(url: string, seconds: number): void {
    const state = this.stateFor(extractDomain(url))
    const until = this.clock.now() + Math.max(0, seconds) * 1000
    if (until > state.cooldownUntil) {
      state.cooldownUntil = until
    }
  }

  /** Epoch ms until which the domain is cooling down (0 when never) */
  cooldownUntil(domain: string): number {
    return this.domains.get(domain)?.cooldownUntil ?? 0
  }

  private waitFor(state: DomainSlotState, now: number): number {
    return Math.max(
      state.cooldownUntil - now,
      this.lastGlobalCallAt + this.globalIntervalMs - now,
      state.lastCallAt + this.domainIntervalMs - now
    )
  }

  private stateFor(domain: string): DomainSlotState {
    let state = this.domains.get(domain)
    if (!state) {
      state = { lastCallAt: Number.NEGATIVE_INFINITY, cooldownUntil: 0 }
      this.domains.set(domain, state)
    }
    return state
  }
}
