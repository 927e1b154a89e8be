import { setTimeout as delay } from 'timers/promises'

/**
 * Time source and sleeper shared by every component that waits.
 * Tests swap in a virtual clock so rate limits and backoff run instantly.
 */
export interface Clock {
  /** Epoch milliseconds */
  now(): number
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    if (ms <= 0) return
    await delay(ms, undefined, { signal })
  },
}

/** Uniform [0, 1) source, injectable for jitter tests */
export type RandomSource = () => number
