/**
 * Scan Types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Probes
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Outcome of probing one id. `item` is whatever the caller extracted for a
 * discovery (a product record, a URL); absent on a miss.
 */
export type ProbeOutcome<T> = { discovered: true; item: T } | { discovered: false }

/**
 * Check one id. Rejections are logged and counted as misses.
 */
export type ScanProbe<T> = (id: number, signal?: AbortSignal) => Promise<ProbeOutcome<T>>

// ═══════════════════════════════════════════════════════════════════════════════
// Runs
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScanRunOptions<T> {
  /** One active scan per key, e.g. `${site}:pid` */
  siteKey: string
  probe: ScanProbe<T>
  hardMax: number
  /** Previous highwater mark for this key (default 0) */
  learnedHigh?: number
  /** Defaults to resumeStartId(learnedHigh, tailWindow) */
  startId?: number
  initialFloor?: number
  tailWindow?: number
  inactiveStreakLimit?: number
  batchSize?: number
  maxWorkers?: number
  signal?: AbortSignal
}

export interface ScanDiscovery<T> {
  id: number
  item: T
}

export interface ScanSummary<T> {
  siteKey: string
  /** Discoveries in ascending id order */
  discoveries: ScanDiscovery<T>[]
  /** New highwater mark to persist */
  highwaterMark: number
  highestNewId: number
  lastProcessedId: number
  currentMax: number
  probed: number
  batches: number
  /** inactive-streak=..., hard-max-or-exhausted, or aborted */
  stopReason: string
}
