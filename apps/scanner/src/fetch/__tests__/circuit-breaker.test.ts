import { describe, expect, it } from 'vitest'
import { CircuitBreaker } from '../circuit-breaker.js'
import { FakeClock } from './helpers.js'

const DOMAIN = 'shop.example.com'

describe('CircuitBreaker', () => {
  it('opens once failures reach the threshold', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 3, cooldownMs: 1000, clock: new FakeClock() })

    breaker.recordFailure(DOMAIN)
    breaker.recordFailure(DOMAIN)
    expect(breaker.allow(DOMAIN)).toBe(true)

    breaker.recordFailure(DOMAIN)
    expect(breaker.allow(DOMAIN)).toBe(false)
    expect(breaker.stateOf(DOMAIN)).toBe('open')
  })

  it('closes lazily only after the cooldown has fully elapsed', () => {
    const clock = new FakeClock()
    const breaker = new CircuitBreaker({ failureThreshold: 3, cooldownMs: 1000, clock })
    for (let i = 0; i < 3; i++) breaker.recordFailure(DOMAIN)

    clock.advance(1000)
    expect(breaker.allow(DOMAIN)).toBe(false)

    clock.advance(1)
    expect(breaker.allow(DOMAIN)).toBe(true)
    expect(breaker.failureCount(DOMAIN)).toBe(0)
    expect(breaker.stateOf(DOMAIN)).toBe('closed')
  })

  it('does not extend the cooldown on failures while open', () => {
    const clock = new FakeClock()
    const breaker = new CircuitBreaker({ failureThreshold: 3, cooldownMs: 1000, clock })
    for (let i = 0; i < 3; i++) breaker.recordFailure(DOMAIN)

    clock.advance(600)
    breaker.recordFailure(DOMAIN)
    clock.advance(401)

    expect(breaker.allow(DOMAIN)).toBe(true)
  })

  it('resets on success', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 1000, clock: new FakeClock() })
    breaker.recordFailure(DOMAIN)
    breaker.recordSuccess(DOMAIN)
    breaker.recordFailure(DOMAIN)

    expect(breaker.allow(DOMAIN)).toBe(true)
    expect(breaker.failureCount(DOMAIN)).toBe(1)
  })

  it('keeps domains independent', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1, cooldownMs: 1000, clock: new FakeClock() })
    breaker.recordFailure(DOMAIN)

    expect(breaker.allow(DOMAIN)).toBe(false)
    expect(breaker.allow('other.example.com')).toBe(true)
  })
})
