/**
 * Scanner Settings
 *
 * Loads config/config.json (snake_case, every key optional), validates it with
 * zod and returns a camelCase settings struct with all defaults filled in.
 * Built once at startup and handed to each component's constructor.
 */

import { readFileSync } from 'fs'
import { resolve } from 'path'
import { z, ZodError } from 'zod'
import { DEFAULT_CHALLENGE_MARKERS, type ChallengeMarkers } from '../fetch/challenge-detector.js'

export const DEFAULT_CONFIG_PATH = 'config/config.json'

export const DEFAULT_RETRY_STATUS_CODES = [408, 425, 429, 500, 502, 503, 504] as const

export type BrowserWaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit'

export interface HttpSettings {
  timeoutMs: number
  followRedirects: boolean
  verifySsl: boolean
  userAgent: string
  acceptLanguage: string
}

export interface RetrySettings {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  jitterMs: number
  retryStatusCodes: ReadonlySet<number>
}

export interface RateLimitSettings {
  globalQps: number
  perDomainQps: number
  defaultCooldownSeconds: number
  ratelimitCooldownSeconds: number
  circuitBreakerFailures: number
  circuitBreakerCooldownMs: number
}

export interface SolverSettings {
  enabled: boolean
  url: string
  maxTimeoutMs: number
  sessionTtlMs: number
  retryAttempts: number
  retryBaseDelayMs: number
  retryMaxDelayMs: number
  retryJitterMs: number
  queueDepthThreshold: number
  queueDepthSleepMs: number
  reuseCookies: boolean
  cookieTtlMs: number
}

export interface ProxySettings {
  enabled: boolean
  url: string
}

export interface BrowserSettings {
  enabled: boolean
  headless: boolean
  timeoutMs: number
  waitUntil: BrowserWaitUntil
}

export interface ScannerDefaults {
  batchSize: number
  maxWorkers: number
  initialScanFloor: number
  stopTailWindow: number
  stopInactiveStreak: number
}

export interface ScannerSettings {
  http: HttpSettings
  retry: RetrySettings
  rateLimit: RateLimitSettings
  solver: SolverSettings
  proxy: ProxySettings
  browser: BrowserSettings
  scanner: ScannerDefaults
  challengeMarkers: ChallengeMarkers
}

const nonEmptyStrings = z.array(z.string().trim().min(1))

const rawConfigSchema = z.object({
  http: z
    .object({
      timeout_seconds: z.number().positive().default(35),
      follow_redirects: z.boolean().default(true),
      verify_ssl: z.boolean().default(true),
      user_agent: z.string().min(1).default('Mozilla/5.0'),
      accept_language: z.string().min(1).default('en-US,en;q=0.9'),
    })
    .default({}),
  retry: z
    .object({
      max_attempts: z.number().int().min(1).default(3),
      base_delay_seconds: z.number().min(0).default(1.2),
      max_delay_seconds: z.number().min(0).default(30),
      jitter_seconds: z.number().min(0).default(0.4),
      retry_status_codes: z.array(z.number().int().min(100).max(599)).optional(),
    })
    .default({}),
  rate_limit: z
    .object({
      global_qps: z.number().positive().default(4),
      per_domain_qps: z.number().positive().default(1),
      default_cooldown_seconds: z.number().min(0).default(45),
      ratelimit_cooldown_seconds: z.number().min(0).default(90),
      circuit_breaker_failures: z.number().int().min(1).default(5),
      circuit_breaker_cooldown_seconds: z.number().min(0).default(180),
    })
    .default({}),
  flaresolverr: z
    .object({
      enabled: z.boolean().default(true),
      url: z.string().url().default('http://127.0.0.1:8191/v1'),
      max_timeout_ms: z.number().int().positive().default(180000),
      session_ttl_minutes: z.number().positive().default(30),
      retry_attempts: z.number().int().min(1).default(3),
      retry_base_delay_seconds: z.number().min(0).default(2),
      retry_max_delay_seconds: z.number().min(0).default(30),
      retry_jitter_seconds: z.number().min(0).default(0.5),
      queue_depth_threshold: z.number().int().min(1).default(5),
      queue_depth_sleep_seconds: z.number().min(0).default(3),
      reuse_cookies: z.boolean().default(true),
      cookie_ttl_seconds: z.number().positive().optional(),
    })
    .default({}),
  proxy: z
    .object({
      enabled: z.boolean().default(false),
      url: z.string().trim().default(''),
    })
    .default({}),
  playwright: z
    .object({
      enabled: z.boolean().default(false),
      headless: z.boolean().default(true),
      timeout_ms: z.number().int().positive().default(60000),
      wait_until: z.enum(['load', 'domcontentloaded', 'networkidle', 'commit']).default('networkidle'),
    })
    .default({}),
  scanner: z
    .object({
      scan_batch_size: z.number().int().min(1).default(3),
      max_workers: z.number().int().min(1).default(1),
      initial_scan_floor: z.number().int().min(0).default(80),
      stop_tail_window: z.number().int().min(1).default(60),
      stop_inactive_streak: z.number().int().min(1).default(60),
    })
    .default({}),
  challenge_detection: z
    .object({
      platform_markers: nonEmptyStrings.optional(),
      strong_markers: nonEmptyStrings.optional(),
      weak_markers: nonEmptyStrings.optional(),
      signature_headers: nonEmptyStrings.optional(),
      server_signatures: nonEmptyStrings.optional(),
    })
    .default({}),
})

export type RawScannerConfig = z.input<typeof rawConfigSchema>

export class ConfigurationError extends Error {
  readonly issues: Array<{ path: string; message: string }>

  constructor(message: string, issues: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

const seconds = (value: number): number => Math.round(value * 1000)

const lower = (values: string[] | undefined, fallback: readonly string[]): readonly string[] =>
  values ? values.map(v => v.toLowerCase()) : fallback

/**
 * Validate a raw config object and fill in defaults.
 * Environment overrides: FLARESOLVERR_URL, PROXY_URL.
 */
export function parseSettings(raw: unknown, env: NodeJS.ProcessEnv = process.env): ScannerSettings {
  let cfg: z.output<typeof rawConfigSchema>
  try {
    cfg = rawConfigSchema.parse(raw ?? {})
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
      throw new ConfigurationError(
        `Invalid configuration: ${issues.map(i => `${i.path || '<root>'}: ${i.message}`).join('; ')}`,
        issues
      )
    }
    throw error
  }

  const fs = cfg.flaresolverr
  const cookieTtlSeconds = fs.cookie_ttl_seconds ?? fs.session_ttl_minutes * 60

  const envProxy = env.PROXY_URL?.trim()
  const proxy: ProxySettings = envProxy
    ? { enabled: true, url: envProxy }
    : { enabled: cfg.proxy.enabled && cfg.proxy.url.length > 0, url: cfg.proxy.url }

  const markers = cfg.challenge_detection

  return {
    http: {
      timeoutMs: seconds(cfg.http.timeout_seconds),
      followRedirects: cfg.http.follow_redirects,
      verifySsl: cfg.http.verify_ssl,
      userAgent: cfg.http.user_agent,
      acceptLanguage: cfg.http.accept_language,
    },
    retry: {
      maxAttempts: cfg.retry.max_attempts,
      baseDelayMs: seconds(cfg.retry.base_delay_seconds),
      maxDelayMs: seconds(cfg.retry.max_delay_seconds),
      jitterMs: seconds(cfg.retry.jitter_seconds),
      retryStatusCodes: new Set<number>(cfg.retry.retry_status_codes ?? DEFAULT_RETRY_STATUS_CODES),
    },
    rateLimit: {
      globalQps: cfg.rate_limit.global_qps,
      perDomainQps: cfg.rate_limit.per_domain_qps,
      defaultCooldownSeconds: cfg.rate_limit.default_cooldown_seconds,
      ratelimitCooldownSeconds: cfg.rate_limit.ratelimit_cooldown_seconds,
      circuitBreakerFailures: cfg.rate_limit.circuit_breaker_failures,
      circuitBreakerCooldownMs: seconds(cfg.rate_limit.circuit_breaker_cooldown_seconds),
    },
    solver: {
      enabled: fs.enabled,
      url: env.FLARESOLVERR_URL?.trim() || fs.url,
      maxTimeoutMs: fs.max_timeout_ms,
      sessionTtlMs: seconds(fs.session_ttl_minutes * 60),
      retryAttempts: fs.retry_attempts,
      retryBaseDelayMs: seconds(fs.retry_base_delay_seconds),
      retryMaxDelayMs: seconds(fs.retry_max_delay_seconds),
      retryJitterMs: seconds(fs.retry_jitter_seconds),
      queueDepthThreshold: fs.queue_depth_threshold,
      queueDepthSleepMs: seconds(fs.queue_depth_sleep_seconds),
      reuseCookies: fs.reuse_cookies,
      cookieTtlMs: seconds(Math.max(60, cookieTtlSeconds)),
    },
    proxy,
    browser: {
      enabled: cfg.playwright.enabled,
      headless: cfg.playwright.headless,
      timeoutMs: cfg.playwright.timeout_ms,
      waitUntil: cfg.playwright.wait_until,
    },
    scanner: {
      batchSize: cfg.scanner.scan_batch_size,
      maxWorkers: cfg.scanner.max_workers,
      initialScanFloor: cfg.scanner.initial_scan_floor,
      stopTailWindow: cfg.scanner.stop_tail_window,
      stopInactiveStreak: cfg.scanner.stop_inactive_streak,
    },
    challengeMarkers: {
      platformMarkers: lower(markers.platform_markers, DEFAULT_CHALLENGE_MARKERS.platformMarkers),
      strongMarkers: lower(markers.strong_markers, DEFAULT_CHALLENGE_MARKERS.strongMarkers),
      weakMarkers: lower(markers.weak_markers, DEFAULT_CHALLENGE_MARKERS.weakMarkers),
      signatureHeaders: lower(markers.signature_headers, DEFAULT_CHALLENGE_MARKERS.signatureHeaders),
      serverSignatures: lower(markers.server_signatures, DEFAULT_CHALLENGE_MARKERS.serverSignatures),
    },
  }
}

/**
 * Read and validate the config file. A missing file yields pure defaults;
 * unreadable JSON or invalid values raise ConfigurationError.
 */
export function loadSettings(
  configPath: string = process.env.STOCKPROBE_CONFIG || DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): ScannerSettings {
  const fullPath = resolve(configPath)
  let text: string
  try {
    text = readFileSync(fullPath, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return parseSettings({}, env)
    }
    throw new ConfigurationError(`Cannot read config file ${fullPath}: ${String(error)}`)
  }

  let raw: unknown
  try {
    // Strip a UTF-8 BOM, which some editors write
    raw = JSON.parse(text.replace(/^\uFEFF/, ''))
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${fullPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  return parseSettings(raw, env)
}
