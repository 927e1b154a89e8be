import { createFetchProbe, expandUrlTemplate, type PageGetter } from '../../scan/fetch-probe.js'
import type { ScanRunner } from '../../scan/scan-runner.js'
import { isValidUrl } from '../../utils/url.js'

export interface ScanCommandArgs {
  site: string
  /** URL with an {id} placeholder */
  urlTemplate: string
  /** Body text that marks a page as a discovery (case-insensitive) */
  marker: string
  /** Body text that rules a page out even when the marker is present */
  absentMarker?: string
  hardMax?: number
  learnedHigh?: number
  startId?: number
  initialFloor?: number
  tailWindow?: number
  inactiveStreakLimit?: number
  batchSize?: number
  maxWorkers?: number
  allowBrowser: boolean
}

export interface ScanCommandDeps {
  fetcher: PageGetter
  runner: ScanRunner
  out?: (line: string) => void
}

const DEFAULT_HARD_MAX = 2000

/**
 * Body-marker discovery rule used by the scan command.
 */
export function matchesMarkers(body: string, marker: string, absentMarker?: string): boolean {
  const lower = body.toLowerCase()
  if (!lower.includes(marker.toLowerCase())) return false
  return !absentMarker || !lower.includes(absentMarker.toLowerCase())
}

/**
 * Run an adaptive id scan over a URL template and print discoveries.
 */
export async function runScanCommand(args: ScanCommandArgs, deps: ScanCommandDeps): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line))

  if (!args.site) {
    console.error('Missing --site <key>')
    return 2
  }
  if (!args.urlTemplate.includes('{id}') || !isValidUrl(expandUrlTemplate(args.urlTemplate, 0))) {
    console.error('--url-template must be an http(s) URL containing {id}')
    return 2
  }
  if (!args.marker) {
    console.error('Missing --marker <text>')
    return 2
  }

  const probe = createFetchProbe({
    fetcher: deps.fetcher,
    urlFor: id => expandUrlTemplate(args.urlTemplate, id),
    detect: result => (matchesMarkers(result.body, args.marker, args.absentMarker) ? result.finalUrl : null),
    getOptions: { allowBrowser: args.allowBrowser },
  })

  const summary = await deps.runner.run({
    siteKey: args.site,
    probe,
    hardMax: args.hardMax ?? DEFAULT_HARD_MAX,
    learnedHigh: args.learnedHigh,
    startId: args.startId,
    initialFloor: args.initialFloor,
    tailWindow: args.tailWindow,
    inactiveStreakLimit: args.inactiveStreakLimit,
    batchSize: args.batchSize,
    maxWorkers: args.maxWorkers,
  })

  for (const discovery of summary.discoveries) {
    out(`discovered id=${discovery.id} url=${discovery.item}`)
  }
  out(
    `probed=${summary.probed} discovered=${summary.discoveries.length} ` +
      `highwater=${summary.highwaterMark} stop=${summary.stopReason}`
  )
  return 0
}
