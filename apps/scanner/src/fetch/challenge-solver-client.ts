/**
 * Challenge Solver Client
 *
 * JSON-RPC client for a FlareSolverr-compatible challenge-solving service.
 * The service drives a real browser, clears the anti-bot interstitial and
 * returns the page plus the clearance cookies.
 *
 * - One solver session per domain, reused for the configured TTL
 * - Concurrent callers for a domain share a single in-flight session creation
 * - Bounded retries with jittered exponential backoff on transient failures
 * - Client-side backpressure: never more in-flight calls than the queue threshold
 *
 * Never throws: every outcome is a SolverResult.
 */

import { z } from 'zod'
import { fetch as undiciFetch } from 'undici'
import { timeoutSignal } from './abort.js'
import { BackoffPolicy } from './backoff.js'
import { systemClock, type Clock, type RandomSource } from './clock.js'
import { classifySolverMessage, describeError, parseQueueDepth, type FetchFailureKind } from './errors.js'
import type { ChallengeSolver, SolverCookie, SolverRequestOptions, SolverResult } from './types.js'
import type { SolverSettings } from '../config/settings.js'
import { loggers } from '../config/logger.js'

const log = loggers.solver

/** Upper bound for a single RPC round trip; solves can take minutes */
export const SOLVER_RPC_TIMEOUT_MS = 240_000

const BACKPRESSURE_MIN_SLEEP_MS = 250
const BACKPRESSURE_MAX_SLEEP_MS = 1000

// ═══════════════════════════════════════════════════════════════════════════════
// Wire format
// ═══════════════════════════════════════════════════════════════════════════════

export type SolverPayload =
  | { cmd: 'sessions.create' }
  | {
      cmd: 'request.get'
      url: string
      maxTimeout: number
      session: string
      proxy?: { url: string }
    }

/**
 * Sends one RPC payload and returns the decoded JSON body.
 * Throws on transport failures and non-JSON answers.
 */
export type SolverTransport = (payload: SolverPayload, signal?: AbortSignal) => Promise<unknown>

const solverCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string().optional(),
  expires: z.number().optional(),
})

const solverResponseSchema = z.object({
  status: z.string(),
  message: z.string().default(''),
  session: z.string().optional(),
  solution: z
    .object({
      url: z.string().optional(),
      status: z.number().int().optional(),
      response: z.string().optional(),
      headers: z.record(z.unknown()).optional(),
      cookies: z.array(solverCookieSchema).optional(),
    })
    .optional(),
})

type SolverResponse = z.infer<typeof solverResponseSchema>

/**
 * Default transport: JSON POST through undici.
 * The service answers errors with a JSON body and a 500 status, so a JSON body
 * is returned whatever the status; only non-JSON answers throw.
 */
export function createHttpSolverTransport(
  endpoint: string,
  timeoutMs: number = SOLVER_RPC_TIMEOUT_MS
): SolverTransport {
  const url = endpoint.replace(/\/+$/, '')
  return async (payload, signal) => {
    const timeout = timeoutSignal(timeoutMs, signal)
    try {
      const response = await undiciFetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: timeout.signal,
      })
      const text = await response.text()
      let decoded: unknown
      try {
        decoded = JSON.parse(text)
      } catch {
        throw new Error(`HTTP ${response.status}: ${text.slice(0, 200)}`)
      }
      return decoded
    } catch (error) {
      if (timeout.timedOut()) {
        throw new Error(`solver request timed out after ${timeoutMs}ms`)
      }
      throw error
    } finally {
      timeout.dispose()
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Client
// ═══════════════════════════════════════════════════════════════════════════════

export interface ChallengeSolverClientOptions {
  settings: SolverSettings
  transport?: SolverTransport
  clock?: Clock
  random?: RandomSource
}

interface AttemptOutcome {
  result: SolverResult
  retryable: boolean
  /** Session the request went out on; null when none was obtained */
  session: string | null
}

interface CachedSession {
  id: string
  createdAt: number
}

function failedResult(url: string, message: string, failure: FetchFailureKind): SolverResult {
  return {
    ok: false,
    statusCode: null,
    finalUrl: url,
    body: '',
    headers: {},
    cookies: [],
    message,
    error: message,
    failure,
  }
}

function solvedResult(url: string, response: SolverResponse): SolverResult {
  const solution = response.solution
  const headers: Record<string, string> = {}
  for (const [key, value] of Object.entries(solution?.headers ?? {})) {
    headers[key.toLowerCase()] = String(value)
  }
  const cookies: SolverCookie[] = solution?.cookies ?? []

  return {
    ok: true,
    statusCode: solution?.status ?? null,
    finalUrl: solution?.url || url,
    body: solution?.response ?? '',
    headers,
    cookies,
    message: response.message,
    error: null,
    failure: null,
  }
}

export class ChallengeSolverClient implements ChallengeSolver {
  private readonly settings: SolverSettings
  private readonly transport: SolverTransport
  private readonly clock: Clock
  private readonly random: RandomSource
  private readonly backoff: BackoffPolicy
  private readonly sessions = new Map<string, CachedSession>()
  private readonly pendingSessions = new Map<string, Promise<string>>()
  private inFlight = 0

  constructor(options: ChallengeSolverClientOptions) {
    this.settings = options.settings
    this.transport = options.transport ?? createHttpSolverTransport(options.settings.url)
    this.clock = options.clock ?? systemClock
    this.random = options.random ?? Math.random
    this.backoff = new BackoffPolicy({
      baseDelayMs: this.settings.retryBaseDelayMs,
      maxDelayMs: this.settings.retryMaxDelayMs,
      jitterMs: this.settings.retryJitterMs,
      random: this.random,
    })
  }

  /** Calls currently waiting on the service */
  get inFlightCount(): number {
    return this.inFlight
  }

  async get(url: string, domain: string, options: SolverRequestOptions = {}): Promise<SolverResult> {
    const attempts = Math.max(1, this.settings.retryAttempts)
    let last: SolverResult = failedResult(url, 'solver-failed', 'network')

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.acquireSlot(options.signal)
      } catch (error) {
        return failedResult(url, describeError(error), 'network')
      }

      let outcome: AttemptOutcome
      try {
        outcome = await this.attempt(url, domain, options)
      } finally {
        this.inFlight -= 1
      }
      if (outcome.result.ok) {
        return outcome.result
      }
      last = outcome.result

      if (!outcome.retryable) {
        log.warn('Solver request failed', { url, domain, attempt, message: last.message })
        return last
      }

      if (outcome.result.failure === 'session' && outcome.session !== null) {
        this.evictSession(domain, outcome.session)
      }

      if (attempt >= attempts) break

      const depth = parseQueueDepth(last.message)
      const delayMs =
        depth !== null && depth > this.settings.queueDepthThreshold
          ? this.settings.queueDepthSleepMs
          : this.backoff.delayFor(attempt)

      log.debug('Retrying solver request', { url, domain, attempt, delayMs, message: last.message })
      try {
        await this.clock.sleep(delayMs, options.signal)
      } catch (error) {
        return failedResult(url, describeError(error), 'network')
      }
    }

    log.warn('Solver retries exhausted', { url, domain, attempts, message: last.message })
    return last
  }

  /**
   * Forget the cached session for a domain. With a session id, only that
   * session is dropped; a newer one created meanwhile stays cached.
   */
  evictSession(domain: string, sessionId?: string): void {
    const cached = this.sessions.get(domain)
    if (cached && (sessionId === undefined || cached.id === sessionId)) {
      this.sessions.delete(domain)
    }
  }

  /** Caller holds an in-flight slot for the duration */
  private async attempt(url: string, domain: string, options: SolverRequestOptions): Promise<AttemptOutcome> {
    let session: string | null = null
    try {
      session = await this.sessionFor(domain, options.signal)
      const payload: SolverPayload = {
        cmd: 'request.get',
        url,
        maxTimeout: this.settings.maxTimeoutMs,
        session,
        ...(options.proxyUrl ? { proxy: { url: options.proxyUrl } } : {}),
      }

      const parsed = solverResponseSchema.safeParse(await this.transport(payload, options.signal))
      if (!parsed.success) {
        return {
          result: failedResult(url, `malformed solver response: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'network'),
          retryable: false,
          session,
        }
      }

      const response = parsed.data
      if (response.status === 'ok') {
        return { result: solvedResult(url, response), retryable: false, session }
      }
      // The service reports pages without a challenge as an error but still returns them
      if (response.solution && /challenge not detected/i.test(response.message)) {
        return { result: solvedResult(url, response), retryable: false, session }
      }

      return this.classified(url, response.message || 'unknown-error', session)
    } catch (error) {
      return this.classified(url, describeError(error), session)
    }
  }

  private classified(url: string, message: string, session: string | null): AttemptOutcome {
    const failure = classifySolverMessage(message)
    return {
      result: failedResult(url, message, failure ?? 'network'),
      retryable: failure !== null,
      session,
    }
  }

  /**
   * Wait until fewer than queueDepthThreshold calls are in flight, then claim
   * a slot. The last check and the claim run without an await in between.
   */
  private async acquireSlot(signal?: AbortSignal): Promise<void> {
    while (this.inFlight >= this.settings.queueDepthThreshold) {
      const sleepMs =
        BACKPRESSURE_MIN_SLEEP_MS + this.random() * (BACKPRESSURE_MAX_SLEEP_MS - BACKPRESSURE_MIN_SLEEP_MS)
      await this.clock.sleep(sleepMs, signal)
    }
    this.inFlight += 1
  }

  private async sessionFor(domain: string, signal?: AbortSignal): Promise<string> {
    const cached = this.sessions.get(domain)
    if (cached && this.clock.now() - cached.createdAt < this.settings.sessionTtlMs) {
      return cached.id
    }

    const pending = this.pendingSessions.get(domain)
    if (pending) return pending

    const creation = this.createSession(domain, signal).finally(() => {
      this.pendingSessions.delete(domain)
    })
    this.pendingSessions.set(domain, creation)
    return creation
  }

  private async createSession(domain: string, signal?: AbortSignal): Promise<string> {
    const parsed = solverResponseSchema.safeParse(await this.transport({ cmd: 'sessions.create' }, signal))
    if (!parsed.success || !parsed.data.session) {
      const detail = parsed.success ? parsed.data.message : parsed.error.issues[0]?.message
      throw new Error(`solver session creation failed: ${detail || 'no session id'}`)
    }
    this.sessions.set(domain, { id: parsed.data.session, createdAt: this.clock.now() })
    log.debug('Created solver session', { domain })
    return parsed.data.session
  }
}
