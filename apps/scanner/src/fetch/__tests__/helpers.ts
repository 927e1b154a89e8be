import { parseSettings, type RawScannerConfig, type ScannerSettings } from '../../config/settings.js'
import type { Clock } from '../clock.js'
import type { FetchResult, TierResponse } from '../types.js'

/**
 * Virtual clock: sleep() advances time instantly and records the duration.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = []

  constructor(private current = 1_700_000_000_000) {}

  now(): number {
    return this.current
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new Error('The operation was aborted')
    }
    this.sleeps.push(ms)
    this.current += Math.max(0, ms)
  }

  advance(ms: number): void {
    this.current += ms
  }

  get totalSlept(): number {
    return this.sleeps.reduce((sum, ms) => sum + ms, 0)
  }
}

export function tierResponse(overrides: Partial<FetchResult> = {}, cookies: TierResponse['cookies'] = []): TierResponse {
  const url = overrides.requestedUrl ?? 'https://shop.example.com/store'
  return {
    result: {
      ok: true,
      requestedUrl: url,
      finalUrl: url,
      statusCode: 200,
      body: '<html>ok</html>',
      headers: {},
      tier: 'direct',
      elapsedMs: 10,
      error: null,
      ...overrides,
    },
    cookies,
  }
}

/** Settings from a raw config object, ignoring the process environment */
export function testSettings(raw: RawScannerConfig = {}): ScannerSettings {
  return parseSettings(raw, {})
}
