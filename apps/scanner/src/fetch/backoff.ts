import type { RandomSource } from './clock.js'

export interface BackoffOptions {
  baseDelayMs: number
  maxDelayMs: number
  jitterMs: number
  random?: RandomSource
}

/**
 * Jittered exponential backoff.
 * delay(attempt) = min(maxDelay, baseDelay * 2^(attempt - 1)) + uniform(0, jitter)
 */
export class BackoffPolicy {
  private readonly baseDelayMs: number
  private readonly maxDelayMs: number
  private readonly jitterMs: number
  private readonly random: RandomSource

  constructor(options: BackoffOptions) {
    this.baseDelayMs = Math.max(0, options.baseDelayMs)
    this.maxDelayMs = Math.max(0, options.maxDelayMs)
    this.jitterMs = Math.max(0, options.jitterMs)
    this.random = options.random ?? Math.random
  }

  /** attempt is 1-based; values below 1 are treated as 1 */
  delayFor(attempt: number): number {
    const exponent = Math.max(0, Math.floor(attempt) - 1)
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** exponent)
    return exponential + this.random() * this.jitterMs
  }
}
