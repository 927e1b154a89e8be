import type { FetchResult, GetOptions } from '../fetch/types.js'
import type { ProbeOutcome, ScanProbe } from './types.js'

/** Anything that fetches like FetchOrchestrator.get */
export interface PageGetter {
  get(url: string, options?: GetOptions): Promise<FetchResult>
}

export interface FetchProbeOptions<T> {
  fetcher: PageGetter
  /** URL to fetch for an id */
  urlFor: (id: number) => string
  /**
   * Decide whether a successful page is a discovery.
   * Return the extracted item, or null for a miss.
   */
  detect: (result: FetchResult, id: number) => T | null
  getOptions?: Omit<GetOptions, 'signal'>
}

/**
 * Build a scan probe that fetches one URL per id and runs the caller's
 * detection rule on successful pages. Failed fetches are misses.
 */
export function createFetchProbe<T>(options: FetchProbeOptions<T>): ScanProbe<T> {
  const { fetcher, urlFor, detect, getOptions } = options
  return async (id, signal): Promise<ProbeOutcome<T>> => {
    const result = await fetcher.get(urlFor(id), { ...getOptions, signal })
    if (!result.ok) {
      return { discovered: false }
    }
    const item = detect(result, id)
    return item === null ? { discovered: false } : { discovered: true, item }
  }
}

/**
 * Expand `{id}` placeholders in a URL template.
 */
export function expandUrlTemplate(template: string, id: number): string {
  return template.split('{id}').join(String(id))
}
