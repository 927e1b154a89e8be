/**
 * URL Normalization Utilities
 *
 * Rules:
 * 1. Default scheme https when none is given
 * 2. Lowercase host
 * 3. Collapse repeated slashes, remove trailing slash (except root path)
 * 4. Lowercase query keys, drop volatile keys (session ids, utm_*)
 * 5. Optionally force the English language hint (language=english)
 * 6. Sort query parameters by key (for consistent cache and merge keys)
 * 7. Remove fragment identifiers (#...)
 *
 * HostBill pseudo-routes (`index.php?/cart/...`) keep their route segment
 * verbatim; encoding it would break the route.
 */

export const VOLATILE_QUERY_KEYS = new Set([
  'sid',
  'session',
  'phpsessid',
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
])

export const LANGUAGE_QUERY_KEYS = new Set(['language', 'lang', 'locale'])

export interface NormalizeUrlOptions {
  /** Resolve relative URLs against this base */
  baseUrl?: string
  /** Replace any language hint with language=english */
  forceEnglish?: boolean
}

function normalizeQueryKey(key: string): string {
  let normalized = key.trim().toLowerCase().replace(/^&+/, '')
  while (normalized.startsWith('amp;')) {
    normalized = normalized.slice(4)
  }
  return normalized
}

function normalizedQueryPairs(raw: string, forceEnglish: boolean): Array<[string, string]> {
  let pairs: Array<[string, string]> = []
  for (const [key, value] of new URLSearchParams(raw)) {
    const normalizedKey = normalizeQueryKey(key)
    if (!normalizedKey || VOLATILE_QUERY_KEYS.has(normalizedKey)) {
      continue
    }
    pairs.push([normalizedKey, value])
  }

  if (forceEnglish) {
    pairs = pairs.filter(([key]) => !LANGUAGE_QUERY_KEYS.has(key))
    pairs.push(['language', 'english'])
  }

  // Array#sort is stable, so repeated keys keep their relative order
  return pairs.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
}

function encodePairs(pairs: Array<[string, string]>): string {
  return new URLSearchParams(pairs).toString()
}

function hostbillPseudoRouteQuery(rawQuery: string, forceEnglish: boolean): string | null {
  if (!rawQuery.startsWith('/') || !rawQuery.toLowerCase().includes('/cart/')) {
    return null
  }

  const ampIndex = rawQuery.indexOf('&')
  const routePart = ampIndex === -1 ? rawQuery : rawQuery.slice(0, ampIndex)
  const remainder = ampIndex === -1 ? '' : rawQuery.slice(ampIndex + 1)
  const pairs = normalizedQueryPairs(remainder, forceEnglish)

  return pairs.length === 0 ? routePart : `${routePart}&${encodePairs(pairs)}`
}

/**
 * Normalize a storefront URL.
 * Invalid input is returned trimmed rather than throwing.
 */
export function normalizeUrl(url: string, options: NormalizeUrlOptions = {}): string {
  const forceEnglish = options.forceEnglish ?? false
  const trimmed = url.trim()

  let parsed: URL
  try {
    if (options.baseUrl) {
      parsed = new URL(trimmed, options.baseUrl)
    } else {
      parsed = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`)
    }
  } catch {
    return trimmed
  }

  const origin = `${parsed.protocol}//${parsed.host.toLowerCase()}`
  let path = parsed.pathname.replace(/\/{2,}/g, '/') || '/'
  if (path !== '/' && path.endsWith('/')) {
    path = path.slice(0, -1)
  }

  const rawQuery = parsed.search.startsWith('?') ? parsed.search.slice(1) : parsed.search

  const pseudoQuery = hostbillPseudoRouteQuery(rawQuery, forceEnglish)
  if (pseudoQuery !== null) {
    return `${origin}${path}?${pseudoQuery}`
  }

  // HostBill path-style cart routes already carry their parameters in the path;
  // appending ?language=english would corrupt the route.
  if (forceEnglish && !rawQuery && path.toLowerCase().includes('/cart/&')) {
    return `${origin}${path}`
  }

  const query = encodePairs(normalizedQueryPairs(rawQuery, forceEnglish))
  return query ? `${origin}${path}?${query}` : `${origin}${path}`
}

/**
 * Domain key used for rate limiting, breaker state and cookie scoping:
 * the lowercased host including any port. Empty string when unparseable.
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).host.toLowerCase()
  } catch {
    return ''
  }
}

export function isSameDomain(url: string, baseUrl: string): boolean {
  return extractDomain(url) === extractDomain(baseUrl)
}

/**
 * Validate that a URL is valid and has a supported protocol.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}
