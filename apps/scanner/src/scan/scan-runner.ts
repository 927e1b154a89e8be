/**
 * Scan Runner
 *
 * Drives an AdaptiveScanController: pulls batches, probes each batch through a
 * bounded worker pool, then applies mark() in ascending id order so the
 * controller's state does not depend on network completion order.
 */

import pLimit from 'p-limit'
import { AdaptiveScanController, resumeStartId } from './scan-controller.js'
import type { ProbeOutcome, ScanDiscovery, ScanProbe, ScanRunOptions, ScanSummary } from './types.js'
import type { ScannerDefaults } from '../config/settings.js'
import { loggers } from '../config/logger.js'
import { describeError } from '../fetch/errors.js'

const log = loggers.scan

/** Log progress on the first batch and then every N batches */
const PROGRESS_EVERY_BATCHES = 10

/** Largest allowed worker pool */
const MAX_WORKERS = 16

export const STOP_EXHAUSTED = 'hard-max-or-exhausted'
export const STOP_ABORTED = 'aborted'

export class ScanAlreadyRunningError extends Error {
  constructor(readonly siteKey: string) {
    super(`A scan is already running for ${siteKey}`)
    this.name = 'ScanAlreadyRunningError'
  }
}

export class ScanRunner {
  private readonly defaults: ScannerDefaults
  private readonly active = new Set<string>()

  constructor(defaults: ScannerDefaults) {
    this.defaults = defaults
  }

  isRunning(siteKey: string): boolean {
    return this.active.has(siteKey)
  }

  async run<T>(options: ScanRunOptions<T>): Promise<ScanSummary<T>> {
    const { siteKey } = options
    if (this.active.has(siteKey)) {
      throw new ScanAlreadyRunningError(siteKey)
    }
    this.active.add(siteKey)
    try {
      return await this.scan(options)
    } finally {
      this.active.delete(siteKey)
    }
  }

  private async scan<T>(options: ScanRunOptions<T>): Promise<ScanSummary<T>> {
    const { siteKey, probe, signal } = options
    const tailWindow = options.tailWindow ?? this.defaults.stopTailWindow
    const learnedHigh = options.learnedHigh ?? 0

    const controller = new AdaptiveScanController({
      hardMax: options.hardMax,
      initialFloor: options.initialFloor ?? this.defaults.initialScanFloor,
      tailWindow,
      learnedHigh,
      inactiveStreakLimit: options.inactiveStreakLimit ?? this.defaults.stopInactiveStreak,
      startId: options.startId ?? resumeStartId(learnedHigh, tailWindow),
    })
    const batchSize = Math.max(1, options.batchSize ?? this.defaults.batchSize)
    const workers = Math.min(MAX_WORKERS, Math.max(1, options.maxWorkers ?? this.defaults.maxWorkers))
    const limit = pLimit(workers)

    log.info('Starting scan', {
      siteKey,
      startId: controller.startId,
      currentMax: controller.currentMax,
      hardMax: controller.hardMax,
      learnedHigh,
      workers,
    })

    const discoveries: ScanDiscovery<T>[] = []
    let probed = 0
    let batches = 0
    let aborted = false

    while (true) {
      if (signal?.aborted) {
        aborted = true
        break
      }

      const ids = controller.nextBatch(batchSize)
      if (ids.length === 0) break
      batches += 1

      const outcomes = await Promise.all(ids.map(id => limit(() => this.probeSafely(probe, id, siteKey, signal))))
      probed += ids.length

      // ids come back from nextBatch ascending; Promise.all keeps that order
      ids.forEach((id, index) => {
        const outcome = outcomes[index]
        if (outcome !== undefined && outcome.discovered) {
          discoveries.push({ id, item: outcome.item })
          controller.mark(id, true)
        } else {
          controller.mark(id, false)
        }
      })

      if (batches === 1 || batches % PROGRESS_EVERY_BATCHES === 0) {
        log.info('Scan progress', {
          siteKey,
          batches,
          cursor: controller.cursor,
          currentMax: controller.currentMax,
          highestNewId: controller.highestNewId,
          inactiveStreak: controller.inactiveStreak,
          discovered: discoveries.length,
        })
      }
    }

    const stopReason = controller.stopReason || (aborted ? STOP_ABORTED : STOP_EXHAUSTED)
    const summary: ScanSummary<T> = {
      siteKey,
      discoveries,
      highwaterMark: controller.highwaterMark,
      highestNewId: controller.highestNewId,
      lastProcessedId: controller.lastProcessedId,
      currentMax: controller.currentMax,
      probed,
      batches,
      stopReason,
    }

    log.info('Scan finished', {
      siteKey,
      probed,
      batches,
      discovered: discoveries.length,
      highwaterMark: summary.highwaterMark,
      stopReason,
    })
    return summary
  }

  private async probeSafely<T>(
    probe: ScanProbe<T>,
    id: number,
    siteKey: string,
    signal: AbortSignal | undefined
  ): Promise<ProbeOutcome<T>> {
    try {
      return await probe(id, signal)
    } catch (error) {
      log.warn('Probe failed, counting as miss', { siteKey, id, error: describeError(error) })
      return { discovered: false }
    }
  }
}
