/**
 * Headless Browser Fetcher
 *
 * Last-resort tier: loads the page in Chromium through playwright-core and
 * returns the rendered DOM. A fresh browser per call keeps no state between
 * domains; cookies it picks up are handed back to the orchestrator instead.
 */

import { chromium, type Browser, type LaunchOptions } from 'playwright-core'
import { systemClock, type Clock } from './clock.js'
import { describeError, isSuccessStatus } from './errors.js'
import type { BrowserFetchOptions, BrowserPageFetcher, CookieInput, TierResponse } from './types.js'
import type { BrowserSettings } from '../config/settings.js'
import { loggers } from '../config/logger.js'

const log = loggers.browser

/** Extra settle time after navigation for late challenge redirects */
const SETTLE_MS = 1200

export type BrowserLauncher = (options: LaunchOptions) => Promise<Browser>

export interface BrowserFetcherOptions {
  settings: BrowserSettings
  launch?: BrowserLauncher
  clock?: Clock
}

/** Browser cookie expiry is in seconds, -1 for session cookies */
export function browserCookieExpiry(expires: number | undefined): number | null {
  return typeof expires === 'number' && expires > 0 ? expires * 1000 : null
}

export class BrowserFetcher implements BrowserPageFetcher {
  private readonly settings: BrowserSettings
  private readonly launch: BrowserLauncher
  private readonly clock: Clock

  constructor(options: BrowserFetcherOptions) {
    this.settings = options.settings
    this.launch = options.launch ?? (launchOptions => chromium.launch(launchOptions))
    this.clock = options.clock ?? systemClock
  }

  get enabled(): boolean {
    return this.settings.enabled
  }

  async fetch(url: string, options: BrowserFetchOptions = {}): Promise<TierResponse> {
    const startTime = this.clock.now()
    const failed = (error: string): TierResponse => ({
      result: {
        ok: false,
        requestedUrl: url,
        finalUrl: url,
        statusCode: null,
        body: '',
        headers: {},
        tier: 'browser',
        elapsedMs: this.clock.now() - startTime,
        error: `browser:${error}`,
      },
      cookies: [],
    })

    if (!this.settings.enabled) {
      return failed('disabled')
    }

    let browser: Browser | null = null
    try {
      browser = await this.launch({
        headless: this.settings.headless,
        ...(options.proxyUrl ? { proxy: { server: options.proxyUrl } } : {}),
      })
      const page = await browser.newPage()
      const response = await page.goto(url, {
        timeout: this.settings.timeoutMs,
        waitUntil: this.settings.waitUntil,
      })
      await page.waitForTimeout(SETTLE_MS)

      const body = await page.content()
      const statusCode = response ? response.status() : null
      const headers = response ? await response.allHeaders() : {}
      const cookies: CookieInput[] = (await page.context().cookies()).map(cookie => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        expiresAt: browserCookieExpiry(cookie.expires),
      }))

      const ok = body.length > 0 && (statusCode === null || isSuccessStatus(statusCode))
      return {
        result: {
          ok,
          requestedUrl: url,
          finalUrl: page.url() || url,
          statusCode,
          body,
          headers,
          tier: 'browser',
          elapsedMs: this.clock.now() - startTime,
          error: ok ? null : statusCode !== null ? `status=${statusCode}` : 'browser:empty-body',
        },
        cookies,
      }
    } catch (error) {
      const message = describeError(error)
      log.warn('Browser fetch failed', { url, error: message })
      return failed(message)
    } finally {
      if (browser) {
        await browser.close().catch((error: unknown) => {
          log.debug('Browser close failed', { error: describeError(error) })
        })
      }
    }
  }
}
