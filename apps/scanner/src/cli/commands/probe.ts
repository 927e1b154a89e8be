import { isChallengeLike, type ChallengeMarkers } from '../../fetch/challenge-detector.js'
import type { PageGetter } from '../../scan/fetch-probe.js'
import { isValidUrl } from '../../utils/url.js'

export interface ProbeCommandArgs {
  url: string
  allowBrowser: boolean
  allowChallengeSolver: boolean
  forceEnglish: boolean
  proxyUrl?: string
  /** Print the response body after the summary */
  showBody: boolean
}

export interface ProbeCommandDeps {
  fetcher: PageGetter
  markers?: ChallengeMarkers
  out?: (line: string) => void
}

/**
 * Fetch one URL through the tier ladder and report what happened.
 * Exit code 0 when the fetch succeeded, 1 when it failed, 2 on bad input.
 */
export async function runProbeCommand(args: ProbeCommandArgs, deps: ProbeCommandDeps): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line))

  if (!args.url) {
    console.error('Missing --url <url>')
    return 2
  }
  if (!isValidUrl(args.url)) {
    console.error(`Not an http(s) URL: ${args.url}`)
    return 2
  }

  const result = await deps.fetcher.get(args.url, {
    allowBrowser: args.allowBrowser,
    allowChallengeSolver: args.allowChallengeSolver,
    forceEnglish: args.forceEnglish,
    proxyUrl: args.proxyUrl || null,
  })

  out(`requested=${result.requestedUrl}`)
  out(`tier=${result.tier} status=${result.statusCode ?? '-'} final=${result.finalUrl}`)
  out(`elapsed_ms=${result.elapsedMs}`)

  if (!result.ok) {
    out(`error=${result.error ?? 'fetch-failed'}`)
    return 1
  }

  const challenge = isChallengeLike(result.statusCode, result.body, result.headers, deps.markers)
  out(`bytes=${result.body.length} challenge=${challenge}`)
  if (args.showBody) {
    out(result.body)
  }
  return 0
}
