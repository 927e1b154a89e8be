/**
 * Challenge Page Detector
 *
 * Decides whether a response is an anti-bot interstitial rather than real
 * content. Table-driven: new markers are added through ChallengeMarkers
 * (or config challenge_detection.*), not code.
 *
 * Rules, in order:
 * 1. Body contains a platform marker -> challenge
 * 2. Status 403/429/503 with a strong or weak phrase, or a signature
 *    header / server value -> challenge
 * 3. Status 200 with a strong phrase -> challenge (some challenges return 200)
 * 4. Otherwise -> not a challenge
 *
 * Weak phrases ("enable JavaScript and cookies") never decide on their own;
 * plenty of legitimate storefronts carry them in a noscript footer.
 */

export interface ChallengeMarkers {
  /** Decisive regardless of status */
  readonly platformMarkers: readonly string[]
  readonly strongMarkers: readonly string[]
  /** Only counted together with a blocking status */
  readonly weakMarkers: readonly string[]
  /** Header names whose presence identifies challenge infrastructure */
  readonly signatureHeaders: readonly string[]
  /** Substrings of the Server header identifying challenge infrastructure */
  readonly serverSignatures: readonly string[]
}

export const DEFAULT_CHALLENGE_MARKERS: ChallengeMarkers = {
  platformMarkers: ['challenge-platform', 'cdn-cgi/challenge-platform'],
  strongMarkers: [
    'just a moment',
    'attention required',
    'cf-chl',
    '__cf_chl',
    'cf browser verification',
    'cf-browser-verification',
    'checking your browser before accessing',
    'please stand by, while we are checking your browser',
    'ddos protection by cloudflare',
  ],
  weakMarkers: [
    'enable javascript and cookies to continue',
    'to work with the site requires support for javascript and cookies',
  ],
  signatureHeaders: ['cf-ray'],
  serverSignatures: ['cloudflare'],
}

const BLOCKING_STATUSES = new Set([403, 429, 503])

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some(needle => haystack.includes(needle))
}

function lowerHeaders(headers: Readonly<Record<string, string>> | null | undefined): Map<string, string> {
  const map = new Map<string, string>()
  if (!headers) return map
  for (const [key, value] of Object.entries(headers)) {
    map.set(key.toLowerCase(), String(value).toLowerCase())
  }
  return map
}

export function hasChallengeInfrastructureHeaders(
  headers: Readonly<Record<string, string>> | null | undefined,
  markers: ChallengeMarkers = DEFAULT_CHALLENGE_MARKERS
): boolean {
  const map = lowerHeaders(headers)
  if (markers.signatureHeaders.some(name => Boolean(map.get(name)))) {
    return true
  }
  const server = map.get('server') ?? ''
  return containsAny(server, markers.serverSignatures)
}

export function isChallengeLike(
  status: number | null,
  body: string,
  headers?: Readonly<Record<string, string>> | null,
  markers: ChallengeMarkers = DEFAULT_CHALLENGE_MARKERS
): boolean {
  const lower = body.toLowerCase()

  if (containsAny(lower, markers.platformMarkers)) {
    return true
  }

  const hasStrong = containsAny(lower, markers.strongMarkers)

  if (status !== null && BLOCKING_STATUSES.has(status)) {
    if (hasStrong || containsAny(lower, markers.weakMarkers)) {
      return true
    }
    if (hasChallengeInfrastructureHeaders(headers, markers)) {
      return true
    }
  }

  return status === 200 && hasStrong
}
