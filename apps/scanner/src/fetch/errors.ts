/**
 * Fetch Failure Classification
 *
 * Failures are classified into kinds. None of these are thrown: they travel
 * inside FetchResult.error and TierVerdict, and the orchestrator's verdict
 * rules (classifyTierResult) decide what each kind means for escalation.
 */

/**
 * Failure kinds
 */
export type FetchFailureKind =
  | 'network' // connect, timeout, DNS
  | 'challenge' // anti-bot interstitial instead of content
  | 'rate-limited' // HTTP 429
  | 'client-error' // other 4xx: content absent or forbidden (terminal)
  | 'server-error' // 5xx, 408, 425 (transient)
  | 'circuit-open' // domain currently suspended
  | 'session' // solver session invalid or expired
  | 'queue-backpressure' // solver overloaded

export function isSuccessStatus(status: number | null | undefined): status is number {
  return typeof status === 'number' && status >= 200 && status < 400
}

/**
 * Definitive 4xx: host reachable, content legitimately absent or forbidden.
 * 429 is excluded, it is a pacing signal rather than an answer.
 */
export function isDefinitiveClientError(status: number | null | undefined): status is number {
  return typeof status === 'number' && status >= 400 && status < 500 && status !== 429
}

/**
 * Classify a non-success HTTP status. Returns null for 2xx/3xx.
 */
export function classifyStatus(status: number | null): FetchFailureKind | null {
  if (status === null) return 'network'
  if (isSuccessStatus(status)) return null
  if (status === 429) return 'rate-limited'
  if (status === 408 || status === 425 || status >= 500) return 'server-error'
  if (status >= 400 && status < 500) return 'client-error'
  return 'server-error'
}

const SESSION_INVALID_PATTERNS = [
  /session\b.*\b(not found|doesn'?t exist|does not exist|invalid|expired|destroyed)/i,
  /invalid session/i,
]

const QUEUE_DEPTH_PATTERN = /queue depth\D{0,20}(\d+)/i

const RETRIABLE_SOLVER_PATTERNS = [
  /time(d)? ?out/i,
  /\b429\b/,
  /too many requests/i,
  /connection (reset|refused|aborted|closed)/i,
  /econnreset|econnrefused|econnaborted|etimedout|epipe/i,
  /socket hang up/i,
  /queue depth/i,
  /\b50[234]\b/,
  /fetch failed/i,
]

export function isSessionInvalidMessage(message: string): boolean {
  return SESSION_INVALID_PATTERNS.some(pattern => pattern.test(message))
}

/**
 * Extract a solver-reported task queue depth, e.g.
 * "Task queue depth is 7" -> 7. Returns null when absent.
 */
export function parseQueueDepth(message: string): number | null {
  const match = QUEUE_DEPTH_PATTERN.exec(message)
  if (!match) return null
  const depth = Number.parseInt(match[1], 10)
  return Number.isFinite(depth) ? depth : null
}

export function isRetriableSolverMessage(message: string): boolean {
  return RETRIABLE_SOLVER_PATTERNS.some(pattern => pattern.test(message))
}

/**
 * Classify solver error text. Unknown text is treated as fatal (null).
 */
export function classifySolverMessage(message: string): FetchFailureKind | null {
  if (isSessionInvalidMessage(message)) return 'session'
  if (parseQueueDepth(message) !== null || /queue depth/i.test(message)) return 'queue-backpressure'
  if (/\b429\b|too many requests/i.test(message)) return 'rate-limited'
  if (isRetriableSolverMessage(message)) return 'network'
  return null
}

/**
 * Render an unknown thrown value as a short message.
 * undici wraps socket errors in `cause`, which carries the useful code.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message}: ${cause.message}`
    }
    return error.message || error.name
  }
  return String(error)
}
