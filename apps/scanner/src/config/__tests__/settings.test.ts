import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigurationError, loadSettings, parseSettings } from '../settings.js'

describe('parseSettings', () => {
  it('fills in defaults for an empty config', () => {
    const settings = parseSettings({}, {})

    expect(settings.http).toEqual({
      timeoutMs: 35_000,
      followRedirects: true,
      verifySsl: true,
      userAgent: 'Mozilla/5.0',
      acceptLanguage: 'en-US,en;q=0.9',
    })
    expect(settings.retry.maxAttempts).toBe(3)
    expect(settings.retry.baseDelayMs).toBe(1200)
    expect([...settings.retry.retryStatusCodes]).toEqual([408, 425, 429, 500, 502, 503, 504])
    expect(settings.rateLimit.circuitBreakerCooldownMs).toBe(180_000)
    expect(settings.solver.url).toBe('http://127.0.0.1:8191/v1')
    expect(settings.solver.sessionTtlMs).toBe(1_800_000)
    expect(settings.solver.cookieTtlMs).toBe(1_800_000)
    expect(settings.proxy).toEqual({ enabled: false, url: '' })
    expect(settings.browser).toEqual({ enabled: false, headless: true, timeoutMs: 60_000, waitUntil: 'networkidle' })
    expect(settings.scanner).toEqual({
      batchSize: 3,
      maxWorkers: 1,
      initialScanFloor: 80,
      stopTailWindow: 60,
      stopInactiveStreak: 60,
    })
  })

  it('converts seconds and keeps the cookie TTL at least a minute', () => {
    const settings = parseSettings(
      { http: { timeout_seconds: 2.5 }, flaresolverr: { cookie_ttl_seconds: 10 } },
      {}
    )

    expect(settings.http.timeoutMs).toBe(2500)
    expect(settings.solver.cookieTtlMs).toBe(60_000)
  })

  it('lowercases configured challenge markers', () => {
    const settings = parseSettings({ challenge_detection: { strong_markers: ['Bot Check'] } }, {})

    expect(settings.challengeMarkers.strongMarkers).toEqual(['bot check'])
    expect(settings.challengeMarkers.serverSignatures).toEqual(['cloudflare'])
  })

  it('enables the proxy only when a URL is configured', () => {
    expect(parseSettings({ proxy: { enabled: true } }, {}).proxy.enabled).toBe(false)
    expect(parseSettings({ proxy: { enabled: true, url: 'http://proxy.test:3128' } }, {}).proxy).toEqual({
      enabled: true,
      url: 'http://proxy.test:3128',
    })
  })

  it('applies environment overrides', () => {
    const settings = parseSettings(
      {},
      { FLARESOLVERR_URL: 'http://solver.test:8191/v1', PROXY_URL: 'http://proxy.test:3128' }
    )

    expect(settings.solver.url).toBe('http://solver.test:8191/v1')
    expect(settings.proxy).toEqual({ enabled: true, url: 'http://proxy.test:3128' })
  })

  it('raises ConfigurationError with the failing paths', () => {
    let caught: unknown
    try {
      parseSettings({ retry: { max_attempts: 0 } }, {})
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigurationError)
    if (caught instanceof ConfigurationError) {
      expect(caught.issues.map(issue => issue.path)).toEqual(['retry.max_attempts'])
    }
  })
})

describe('loadSettings', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stockprobe-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns defaults when the file does not exist', () => {
    const settings = loadSettings(join(dir, 'missing.json'), {})
    expect(settings.retry.maxAttempts).toBe(3)
  })

  it('reads a config file written with a BOM', () => {
    const path = join(dir, 'config.json')
    writeFileSync(path, '\uFEFF{"scanner": {"scan_batch_size": 8}}')

    expect(loadSettings(path, {}).scanner.batchSize).toBe(8)
  })

  it('rejects invalid JSON', () => {
    const path = join(dir, 'config.json')
    writeFileSync(path, '{ not json')

    expect(() => loadSettings(path, {})).toThrow(ConfigurationError)
  })
})
