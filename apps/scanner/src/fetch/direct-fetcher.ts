/**
 * Direct HTTP Fetcher
 *
 * One plain GET through undici. No retries here: retrying, escalation and
 * cooldowns belong to the orchestrator. Set-Cookie headers are parsed with
 * tough-cookie and handed back so the orchestrator can cache them.
 */

import { Cookie } from 'tough-cookie'
import { Agent, ProxyAgent, fetch as undiciFetch, type Dispatcher, type RequestInit, type Response } from 'undici'
import { timeoutSignal } from './abort.js'
import { systemClock, type Clock } from './clock.js'
import { describeError, isSuccessStatus } from './errors.js'
import type { CookieInput, DirectFetchOptions, FetchResult, PageFetcher, TierResponse } from './types.js'
import type { HttpSettings } from '../config/settings.js'

export type HttpGetFunction = (url: string, init: RequestInit) => Promise<Response>

export interface DirectFetcherOptions {
  http: HttpSettings
  /** Override the transport (tests) */
  fetchFn?: HttpGetFunction
  clock?: Clock
}

/**
 * Parse Set-Cookie header values into cache inputs.
 * Unparseable values are skipped.
 */
export function parseSetCookieHeaders(values: readonly string[], now: number): CookieInput[] {
  const cookies: CookieInput[] = []
  for (const value of values) {
    const cookie = Cookie.parse(value)
    if (!cookie || !cookie.key) continue

    const expiry = cookie.expiryTime(new Date(now))
    const domain = cookie.domain ?? null
    if (typeof expiry === 'number' && expiry <= now) {
      // Max-Age=0 or a past Expires: the server is deleting the cookie
      cookies.push({ name: cookie.key, value: null, domain })
      continue
    }
    cookies.push({
      name: cookie.key,
      value: cookie.value,
      domain,
      expiresAt: typeof expiry === 'number' && Number.isFinite(expiry) ? expiry : null,
    })
  }
  return cookies
}

function headersToRecord(response: Response): Record<string, string> {
  const record: Record<string, string> = {}
  response.headers.forEach((value, key) => {
    record[key.toLowerCase()] = value
  })
  return record
}

export class DirectFetcher implements PageFetcher {
  private readonly http: HttpSettings
  private readonly fetchFn: HttpGetFunction
  private readonly clock: Clock
  private readonly agent: Agent
  private readonly proxyAgents = new Map<string, ProxyAgent>()

  constructor(options: DirectFetcherOptions) {
    this.http = options.http
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, init))
    this.clock = options.clock ?? systemClock
    this.agent = new Agent({ connect: { rejectUnauthorized: this.http.verifySsl } })
  }

  async fetch(url: string, options: DirectFetchOptions = {}): Promise<TierResponse> {
    const startTime = this.clock.now()
    const headers: Record<string, string> = {
      'User-Agent': this.http.userAgent,
      'Accept-Language': this.http.acceptLanguage,
    }
    if (options.cookieHeader) {
      headers.Cookie = options.cookieHeader
    }

    const timeout = timeoutSignal(this.http.timeoutMs, options.signal)

    try {
      const response = await this.fetchFn(url, {
        method: 'GET',
        headers,
        redirect: this.http.followRedirects ? 'follow' : 'manual',
        signal: timeout.signal,
        dispatcher: this.dispatcherFor(options.proxyUrl),
      })
      const body = await response.text()
      const statusCode = response.status
      const ok = isSuccessStatus(statusCode)

      const result: FetchResult = {
        ok,
        requestedUrl: url,
        finalUrl: response.url || url,
        statusCode,
        body,
        headers: headersToRecord(response),
        tier: 'direct',
        elapsedMs: this.clock.now() - startTime,
        error: ok ? null : `status=${statusCode}`,
      }
      return { result, cookies: parseSetCookieHeaders(response.headers.getSetCookie(), this.clock.now()) }
    } catch (error) {
      const message = timeout.timedOut() ? `timeout after ${this.http.timeoutMs}ms` : describeError(error)
      return {
        result: {
          ok: false,
          requestedUrl: url,
          finalUrl: url,
          statusCode: null,
          body: '',
          headers: {},
          tier: 'direct',
          elapsedMs: this.clock.now() - startTime,
          error: `network:${message}`,
        },
        cookies: [],
      }
    } finally {
      timeout.dispose()
    }
  }

  async close(): Promise<void> {
    const agents: Dispatcher[] = [this.agent, ...this.proxyAgents.values()]
    this.proxyAgents.clear()
    await Promise.all(agents.map(agent => agent.close()))
  }

  private dispatcherFor(proxyUrl: string | null | undefined): Dispatcher {
    if (!proxyUrl) return this.agent

    let agent = this.proxyAgents.get(proxyUrl)
    if (!agent) {
      agent = new ProxyAgent({
        uri: proxyUrl,
        requestTls: { rejectUnauthorized: this.http.verifySsl },
      })
      this.proxyAgents.set(proxyUrl, agent)
    }
    return agent
  }
}
