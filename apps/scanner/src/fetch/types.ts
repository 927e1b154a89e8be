/**
 * Fetch Layer Core Types
 *
 * FetchResult is the only thing that crosses the fetch layer's public boundary.
 * Every tier and the orchestrator return one; none of them throw.
 */

import type { FetchFailureKind } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// FetchResult
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Which strategy produced a result.
 * 'circuit-breaker' marks a short-circuit: no network I/O happened.
 */
export type FetchTier = 'direct' | 'challenge-solver' | 'browser' | 'circuit-breaker'

export interface FetchResult {
  readonly ok: boolean
  /** Normalized URL the caller asked for */
  readonly requestedUrl: string
  /** URL after redirects (equals requestedUrl when unknown) */
  readonly finalUrl: string
  /** null when no HTTP response was received */
  readonly statusCode: number | null
  readonly body: string
  /** Response headers, keys lowercased */
  readonly headers: Readonly<Record<string, string>>
  readonly tier: FetchTier
  readonly elapsedMs: number
  /**
   * Machine-parseable failure reason, null on success.
   * Forms: circuit-open:<domain>, challenge-detected, status=<code>,
   * network:<message>, solver:<message>, browser:<message>, fetch-failed
   */
  readonly error: string | null
}

// ═══════════════════════════════════════════════════════════════════════════════
// Cookies
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A cookie as reported by a tier (Set-Cookie, solver solution, browser context).
 * value null deletes a cached cookie of the same name.
 */
export interface CookieInput {
  name: string
  value: string | null
  /** Cookie domain attribute; empty or missing means host-only */
  domain?: string | null
  /** Epoch ms; null or missing for session cookies */
  expiresAt?: number | null
}

/**
 * What a fetching tier hands back to the orchestrator:
 * the result plus whatever cookies it observed.
 */
export interface TierResponse {
  result: FetchResult
  cookies: CookieInput[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Tier verdicts
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Outcome of classifying one tier's response.
 * - success: usable content, stop escalating
 * - retryable: transient or challenge, escalate and/or retry
 * - fatal: definitive answer (content absent or forbidden), stop everything
 */
export type TierVerdict =
  | { kind: 'success' }
  | { kind: 'retryable'; failure: FetchFailureKind; reason: string }
  | { kind: 'fatal'; failure: FetchFailureKind; reason: string }

// ═══════════════════════════════════════════════════════════════════════════════
// Tier interfaces
// ═══════════════════════════════════════════════════════════════════════════════

export interface DirectFetchOptions {
  cookieHeader?: string | null
  proxyUrl?: string | null
  signal?: AbortSignal
}

/**
 * One plain HTTP GET attempt.
 */
export interface PageFetcher {
  fetch(url: string, options?: DirectFetchOptions): Promise<TierResponse>
}

export interface BrowserFetchOptions {
  proxyUrl?: string | null
}

/**
 * Full headless-browser fetch.
 */
export interface BrowserPageFetcher {
  readonly enabled: boolean
  fetch(url: string, options?: BrowserFetchOptions): Promise<TierResponse>
}

export interface SolverCookie {
  name: string
  value: string
  domain?: string
  /** Seconds since epoch; -1 or missing for session cookies */
  expires?: number
}

export interface SolverResult {
  ok: boolean
  statusCode: number | null
  finalUrl: string
  body: string
  headers: Record<string, string>
  cookies: SolverCookie[]
  message: string
  error: string | null
  /** Set when ok is false */
  failure: FetchFailureKind | null
}

export interface SolverRequestOptions {
  proxyUrl?: string | null
  signal?: AbortSignal
}

/**
 * Challenge-solving proxy service client.
 */
export interface ChallengeSolver {
  get(url: string, domain: string, options?: SolverRequestOptions): Promise<SolverResult>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestrator request options
// ═══════════════════════════════════════════════════════════════════════════════

export interface GetOptions {
  /** Permit escalation to the challenge solver (default: true) */
  allowChallengeSolver?: boolean
  /** Permit escalation to the headless browser (default: false) */
  allowBrowser?: boolean
  /** Egress proxy for this call; falls back to the configured default */
  proxyUrl?: string | null
  /** Append the language=english hint during normalization (default: true) */
  forceEnglish?: boolean
  signal?: AbortSignal
}
