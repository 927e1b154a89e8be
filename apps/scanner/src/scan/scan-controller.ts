/**
 * Adaptive Scan Controller
 *
 * Widening-horizon search over a numeric ID space (product ids, category ids).
 * The horizon starts at max(initialFloor, learnedHigh + tailWindow), grows
 * whenever a discovery lands near the edge, and the scan stops on a long enough
 * run of misses past the known frontier rather than on a fixed range.
 *
 * Not safe for concurrent mutation: one driver per site, mark() in ascending id order.
 */

export interface ScanControllerOptions {
  /** Absolute ceiling for ids */
  hardMax: number
  /** Always scan at least this far on a cold start */
  initialFloor: number
  /** How far past the highest discovery to keep looking */
  tailWindow: number
  /** Highwater mark from the previous run (0 when unknown) */
  learnedHigh?: number
  /** Consecutive misses that end the scan */
  inactiveStreakLimit?: number
  /** First id to probe, see resumeStartId() */
  startId?: number
}

export const DEFAULT_INACTIVE_STREAK_LIMIT = 60

const clampInt = (value: number, min: number): number => Math.max(min, Math.trunc(value))

/**
 * Where a resumed scan starts: a tail window below the last highwater mark,
 * or 0 on a cold start.
 */
export function resumeStartId(learnedHigh: number, tailWindow: number): number {
  return learnedHigh > 0 ? Math.max(0, learnedHigh - tailWindow) : 0
}

export class AdaptiveScanController {
  readonly hardMax: number
  readonly initialFloor: number
  readonly tailWindow: number
  readonly learnedHigh: number
  readonly inactiveStreakLimit: number
  readonly startId: number

  private _currentMax: number
  private _cursor: number
  private _highestNewId = -1
  private _lastProcessedId = -1
  private _inactiveStreak = 0
  private _stopReason = ''

  constructor(options: ScanControllerOptions) {
    this.hardMax = clampInt(options.hardMax, 0)
    this.initialFloor = clampInt(options.initialFloor, 0)
    this.tailWindow = clampInt(options.tailWindow, 1)
    this.learnedHigh = clampInt(options.learnedHigh ?? 0, 0)
    this.inactiveStreakLimit = clampInt(options.inactiveStreakLimit ?? DEFAULT_INACTIVE_STREAK_LIMIT, 1)
    this.startId = clampInt(options.startId ?? 0, 0)

    this._currentMax = Math.min(this.hardMax, Math.max(this.initialFloor, this.learnedHigh + this.tailWindow))
    this._cursor = this.startId
  }

  get currentMax(): number {
    return this._currentMax
  }

  get cursor(): number {
    return this._cursor
  }

  get highestNewId(): number {
    return this._highestNewId
  }

  get lastProcessedId(): number {
    return this._lastProcessedId
  }

  get inactiveStreak(): number {
    return this._inactiveStreak
  }

  /** Empty until the inactive-streak rule fires */
  get stopReason(): string {
    return this._stopReason
  }

  get stopped(): boolean {
    return this._stopReason !== ''
  }

  /** True once the cursor has passed the horizon */
  get exhausted(): boolean {
    return this._cursor > this._currentMax
  }

  /** Highwater mark to persist for the next run */
  get highwaterMark(): number {
    return Math.max(this.learnedHigh, this._highestNewId)
  }

  /**
   * Next contiguous run of ids, at most `size` long. Empty when stopped or
   * when the cursor has passed the current horizon.
   */
  nextBatch(size: number): number[] {
    if (this.stopped || this.exhausted) {
      return []
    }
    const start = this._cursor
    const end = Math.min(this._currentMax, start + clampInt(size, 1) - 1)
    this._cursor = end + 1

    const ids: number[] = []
    for (let id = start; id <= end; id++) {
      ids.push(id)
    }
    return ids
  }

  /**
   * Record the outcome for one id. Returns true when the scan should stop.
   */
  mark(id: number, isNewDiscovery: boolean): boolean {
    this._lastProcessedId = Math.max(this._lastProcessedId, id)

    if (isNewDiscovery) {
      this._inactiveStreak = 0
      if (id > this._highestNewId) {
        this._highestNewId = id
      }
      const target = Math.min(this.hardMax, this._highestNewId + this.tailWindow)
      if (target > this._currentMax) {
        this._currentMax = target
      }
    } else {
      this._inactiveStreak += 1
    }

    // Ids still in flight when the rule fired are recorded but keep the first reason
    if (this.stopped) {
      return true
    }
    if (
      id >= this.initialFloor &&
      this._inactiveStreak >= this.inactiveStreakLimit &&
      (this._highestNewId < 0 || id >= this._highestNewId)
    ) {
      this._stopReason =
        `inactive-streak=${this._inactiveStreak} floor=${this.initialFloor} ` +
        `highest-new=${this._highestNewId}`
      return true
    }
    return false
  }
}
