/**
 * Per-domain Circuit Breaker
 *
 * closed -> open once consecutive failures reach the threshold.
 * open -> closed lazily, inside allow(), after the cooldown has elapsed.
 * There is no half-open probe limit: the first call after cooldown goes through
 * with a clean counter.
 */

import { systemClock, type Clock } from './clock.js'

export interface CircuitBreakerOptions {
  failureThreshold: number
  cooldownMs: number
  clock?: Clock
}

interface BreakerState {
  failures: number
  openedAt: number | null
}

export type CircuitState = 'closed' | 'open'

export class CircuitBreaker {
  private readonly failureThreshold: number
  private readonly cooldownMs: number
  private readonly clock: Clock
  private readonly states = new Map<string, BreakerState>()

  constructor(options: CircuitBreakerOptions) {
    this.failureThreshold = Math.max(1, options.failureThreshold)
    this.cooldownMs = Math.max(0, options.cooldownMs)
    this.clock = options.clock ?? systemClock
  }

  allow(domain: string): boolean {
    const state = this.states.get(domain)
    if (!state || state.failures < this.failureThreshold) {
      return true
    }
    if (state.openedAt !== null && this.clock.now() - state.openedAt > this.cooldownMs) {
      this.states.delete(domain)
      return true
    }
    return false
  }

  recordSuccess(domain: string): void {
    this.states.delete(domain)
  }

  recordFailure(domain: string): void {
    const state = this.states.get(domain) ?? { failures: 0, openedAt: null }
    state.failures += 1
    // Further failures while open do not extend the cooldown
    if (state.failures >= this.failureThreshold && state.openedAt === null) {
      state.openedAt = this.clock.now()
    }
    this.states.set(domain, state)
  }

  stateOf(domain: string): CircuitState {
    const state = this.states.get(domain)
    return state && state.failures >= this.failureThreshold ? 'open' : 'closed'
  }

  failureCount(domain: string): number {
    return this.states.get(domain)?.failures ?? 0
  }
}
