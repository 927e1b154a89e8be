/**
 * Fetch Orchestrator
 *
 * The one entry point for fetching a storefront page:
 *
 *   normalize -> circuit check -> [rate limit -> direct -> solver -> browser] x attempts
 *
 * Each tier's response is classified into a TierVerdict. A success ends the
 * call; a retryable verdict escalates to the next permitted tier and asks for
 * another attempt; a definitive 4xx ends the call without touching the breaker's
 * failure count (the host answered, the content just is not there).
 *
 * All mutable state (rate limiter, breaker, cookie cache) lives on the instance.
 */

import { BackoffPolicy } from './backoff.js'
import { isChallengeLike, type ChallengeMarkers } from './challenge-detector.js'
import { CircuitBreaker } from './circuit-breaker.js'
import { systemClock, type Clock, type RandomSource } from './clock.js'
import { CookieCache } from './cookie-cache.js'
import { classifyStatus, describeError, isDefinitiveClientError, isSuccessStatus } from './errors.js'
import { DomainRateLimiter } from './rate-limiter.js'
import type {
  BrowserPageFetcher,
  ChallengeSolver,
  CookieInput,
  FetchResult,
  GetOptions,
  PageFetcher,
  SolverCookie,
  SolverResult,
  TierResponse,
  TierVerdict,
} from './types.js'
import type { ScannerSettings } from '../config/settings.js'
import { loggers } from '../config/logger.js'
import { extractDomain, normalizeUrl } from '../utils/url.js'

const log = loggers.fetch

/** Statuses worth handing to the solver even when the page is not challenge-like */
const ESCALATION_STATUSES = new Set([403, 429])

export interface FetchOrchestratorOptions {
  settings: ScannerSettings
  direct: PageFetcher
  solver: ChallengeSolver
  browser: BrowserPageFetcher
  clock?: Clock
  random?: RandomSource
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Classify one tier's result.
 * - no response -> retryable (network, solver or browser failure)
 * - challenge page -> retryable
 * - 2xx/3xx -> success
 * - 429 or a configured retry status -> retryable
 * - other 4xx -> fatal
 * - anything else -> fatal server-error
 */
export function classifyTierResult(
  result: FetchResult,
  retryStatusCodes: ReadonlySet<number>,
  markers: ChallengeMarkers,
  inspectHeaders = true
): TierVerdict {
  const { statusCode } = result
  if (statusCode === null) {
    return { kind: 'retryable', failure: 'network', reason: result.error ?? 'fetch-failed' }
  }

  if (isChallengeLike(statusCode, result.body, inspectHeaders ? result.headers : null, markers)) {
    return { kind: 'retryable', failure: 'challenge', reason: 'challenge-detected' }
  }

  const failure = classifyStatus(statusCode)
  if (failure === null) {
    return { kind: 'success' }
  }

  const reason = `status=${statusCode}`
  if (statusCode === 429 || retryStatusCodes.has(statusCode)) {
    return { kind: 'retryable', failure, reason }
  }
  return { kind: 'fatal', failure, reason }
}

/** Solver cookies carry expiry in seconds since epoch, -1 for session cookies */
export function solverCookiesToInputs(cookies: readonly SolverCookie[]): CookieInput[] {
  return cookies.map(cookie => ({
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain ?? null,
    expiresAt: typeof cookie.expires === 'number' && cookie.expires > 0 ? cookie.expires * 1000 : null,
  }))
}

function solverToFetchResult(url: string, solved: SolverResult, elapsedMs: number): FetchResult {
  return {
    ok: solved.ok && isSuccessStatus(solved.statusCode),
    requestedUrl: url,
    finalUrl: solved.finalUrl || url,
    statusCode: solved.statusCode,
    body: solved.body,
    headers: solved.headers,
    tier: 'challenge-solver',
    elapsedMs,
    error: solved.ok ? null : `solver:${solved.error ?? solved.message}`,
  }
}

function isNotFoundFailure(result: FetchResult): boolean {
  return result.statusCode === 404 || (result.error ?? '').includes('status=404')
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestrator
// ═══════════════════════════════════════════════════════════════════════════════

interface AttemptState {
  lastWithStatus: FetchResult | null
  lastAny: FetchResult | null
  lastError: string | null
}

export class FetchOrchestrator {
  readonly rateLimiter: DomainRateLimiter
  readonly breaker: CircuitBreaker
  readonly cookies: CookieCache

  private readonly settings: ScannerSettings
  private readonly direct: PageFetcher
  private readonly solver: ChallengeSolver
  private readonly browser: BrowserPageFetcher
  private readonly clock: Clock
  private readonly backoff: BackoffPolicy

  constructor(options: FetchOrchestratorOptions) {
    const { settings } = options
    this.settings = settings
    this.direct = options.direct
    this.solver = options.solver
    this.browser = options.browser
    this.clock = options.clock ?? systemClock

    this.rateLimiter = new DomainRateLimiter({
      globalQps: settings.rateLimit.globalQps,
      perDomainQps: settings.rateLimit.perDomainQps,
      clock: this.clock,
    })
    this.breaker = new CircuitBreaker({
      failureThreshold: settings.rateLimit.circuitBreakerFailures,
      cooldownMs: settings.rateLimit.circuitBreakerCooldownMs,
      clock: this.clock,
    })
    this.cookies = new CookieCache({
      ttlMs: settings.solver.cookieTtlMs,
      enabled: settings.solver.reuseCookies,
      clock: this.clock,
    })
    this.backoff = new BackoffPolicy({
      baseDelayMs: settings.retry.baseDelayMs,
      maxDelayMs: settings.retry.maxDelayMs,
      jitterMs: settings.retry.jitterMs,
      random: options.random,
    })
  }

  /**
   * Fetch a URL through the tier ladder. Never throws.
   */
  async get(url: string, options: GetOptions = {}): Promise<FetchResult> {
    const startTime = this.clock.now()
    const requestedUrl = normalizeUrl(url, { forceEnglish: options.forceEnglish ?? true })
    const domain = extractDomain(requestedUrl)
    const proxyUrl = options.proxyUrl || (this.settings.proxy.enabled ? this.settings.proxy.url : null) || null

    if (!this.breaker.allow(domain)) {
      log.debug('Circuit open, skipping fetch', { url: requestedUrl, domain })
      return {
        ok: false,
        requestedUrl,
        finalUrl: requestedUrl,
        statusCode: null,
        body: '',
        headers: {},
        tier: 'circuit-breaker',
        elapsedMs: 0,
        error: `circuit-open:${domain}`,
      }
    }

    const state: AttemptState = { lastWithStatus: null, lastAny: null, lastError: null }

    try {
      const success = await this.runAttempts(requestedUrl, domain, proxyUrl, options, state)
      if (success) {
        this.breaker.recordSuccess(domain)
        return success
      }
    } catch (error) {
      // Only cancellation gets here: tiers never throw
      const message = describeError(error)
      log.debug('Fetch aborted', { url: requestedUrl, error: message })
      return this.failure(requestedUrl, state, startTime, `network:${message}`)
    }

    const finalStatus = state.lastWithStatus?.statusCode ?? null
    if (isDefinitiveClientError(finalStatus)) {
      this.breaker.recordSuccess(domain)
    } else {
      this.breaker.recordFailure(domain)
    }

    const result = this.failure(requestedUrl, state, startTime, state.lastError ?? 'fetch-failed')
    if (isNotFoundFailure(result)) {
      log.debug('Fetch failed completely', { url: requestedUrl, reason: result.error })
    } else {
      log.error('Fetch failed completely', { url: requestedUrl, reason: result.error, tier: result.tier })
    }
    return result
  }

  private async runAttempts(
    url: string,
    domain: string,
    proxyUrl: string | null,
    options: GetOptions,
    state: AttemptState
  ): Promise<FetchResult | null> {
    const { retry, rateLimit, solver: solverSettings, browser: browserSettings } = this.settings
    const solverAllowed = solverSettings.enabled && (options.allowChallengeSolver ?? true)
    const browserAllowed = browserSettings.enabled && this.browser.enabled && (options.allowBrowser ?? false)

    for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
      let shouldRetry = false
      let terminal = false

      await this.rateLimiter.waitForSlot(url, options.signal)

      // Tier 1: direct
      const cookieHeader = this.cookies.headerFor(domain)
      const direct = await this.runTier('direct', url, () =>
        this.direct.fetch(url, { cookieHeader, proxyUrl, signal: options.signal })
      )
      this.cookies.store(extractDomain(direct.result.finalUrl) || domain, direct.cookies)
      const directVerdict = this.track(state, direct.result, true)
      log.debug('Direct attempt', {
        url,
        attempt,
        status: direct.result.statusCode,
        elapsedMs: direct.result.elapsedMs,
        verdict: directVerdict.kind,
      })

      if (directVerdict.kind === 'success') {
        return { ...direct.result, ok: true, error: null, requestedUrl: url }
      }

      const directStatus = direct.result.statusCode
      const challenged = directVerdict.kind === 'retryable' && directVerdict.failure === 'challenge'
      if (directStatus === 429) {
        this.rateLimiter.applyCooldown(url, rateLimit.ratelimitCooldownSeconds)
      }
      if (challenged && cookieHeader) {
        // Cached clearance no longer passes
        this.cookies.clear(domain)
      }
      if (directVerdict.kind === 'retryable') {
        shouldRetry = true
      }

      const escalate =
        directStatus === null ||
        challenged ||
        ESCALATION_STATUSES.has(directStatus) ||
        retry.retryStatusCodes.has(directStatus)

      // Tier 2: challenge solver
      if (escalate && solverAllowed) {
        const solverStart = this.clock.now()
        const solved = await this.runSolver(url, domain, proxyUrl, options.signal)
        const solverResult = solverToFetchResult(url, solved, this.clock.now() - solverStart)
        if (solved.ok) {
          this.cookies.store(domain, solverCookiesToInputs(solved.cookies))
        }
        const verdict = solved.ok
          ? this.track(state, solverResult, false)
          : this.track(state, solverResult, false, {
              kind: 'retryable',
              failure: solved.failure ?? 'network',
              reason: solverResult.error ?? 'solver:failed',
            })
        log.debug('Solver attempt', { url, attempt, ok: solved.ok, status: solved.statusCode, verdict: verdict.kind })

        if (verdict.kind === 'success') {
          return { ...solverResult, ok: true, error: null }
        }
        if (verdict.kind === 'retryable') {
          shouldRetry = true
        } else if (verdict.failure === 'client-error') {
          shouldRetry = false
          terminal = true
        }
      }

      // Tier 3: headless browser
      if (escalate && browserAllowed && !terminal) {
        const browsed = await this.runTier('browser', url, () => this.browser.fetch(url, { proxyUrl }))
        this.cookies.store(domain, browsed.cookies)
        const verdict = browsed.result.ok
          ? this.track(state, browsed.result, true, { kind: 'success' })
          : this.track(state, browsed.result, true)
        log.debug('Browser attempt', { url, attempt, ok: browsed.result.ok, status: browsed.result.statusCode })

        if (verdict.kind === 'success' && browsed.result.ok) {
          return { ...browsed.result, requestedUrl: url }
        }
        if (verdict.kind === 'retryable') {
          shouldRetry = true
        } else if (verdict.kind === 'fatal' && verdict.failure === 'client-error') {
          shouldRetry = false
          terminal = true
        }
      }

      if (directStatus !== null && retry.retryStatusCodes.has(directStatus)) {
        this.rateLimiter.applyCooldown(url, rateLimit.defaultCooldownSeconds)
      }

      if (!shouldRetry || terminal) break

      if (attempt < retry.maxAttempts) {
        await this.clock.sleep(this.backoff.delayFor(attempt), options.signal)
      }
    }

    return null
  }

  /**
   * Record a tier result and return its verdict. The most escalated tier's
   * reason wins within an attempt, since tiers run in ladder order.
   */
  private track(
    state: AttemptState,
    result: FetchResult,
    inspectHeaders: boolean,
    override?: TierVerdict
  ): TierVerdict {
    const verdict =
      override ?? classifyTierResult(result, this.settings.retry.retryStatusCodes, this.settings.challengeMarkers, inspectHeaders)
    state.lastAny = result
    if (result.statusCode !== null) {
      state.lastWithStatus = result
    }
    if (verdict.kind !== 'success') {
      state.lastError = result.statusCode === null ? result.error ?? verdict.reason : verdict.reason
    }
    return verdict
  }

  private async runTier(
    tier: 'direct' | 'browser',
    url: string,
    call: () => Promise<TierResponse>
  ): Promise<TierResponse> {
    const startTime = this.clock.now()
    try {
      return await call()
    } catch (error) {
      const message = describeError(error)
      return {
        result: {
          ok: false,
          requestedUrl: url,
          finalUrl: url,
          statusCode: null,
          body: '',
          headers: {},
          tier,
          elapsedMs: this.clock.now() - startTime,
          error: tier === 'direct' ? `network:${message}` : `browser:${message}`,
        },
        cookies: [],
      }
    }
  }

  private async runSolver(
    url: string,
    domain: string,
    proxyUrl: string | null,
    signal: AbortSignal | undefined
  ): Promise<SolverResult> {
    try {
      return await this.solver.get(url, domain, { proxyUrl, signal })
    } catch (error) {
      const message = describeError(error)
      return {
        ok: false,
        statusCode: null,
        finalUrl: url,
        body: '',
        headers: {},
        cookies: [],
        message,
        error: message,
        failure: 'network',
      }
    }
  }

  private failure(url: string, state: AttemptState, startTime: number, error: string): FetchResult {
    const last = state.lastWithStatus ?? state.lastAny
    if (!last) {
      return {
        ok: false,
        requestedUrl: url,
        finalUrl: url,
        statusCode: null,
        body: '',
        headers: {},
        tier: 'direct',
        elapsedMs: this.clock.now() - startTime,
        error,
      }
    }
    return { ...last, ok: false, requestedUrl: url, error }
  }
}
