/**
 * Fetch Layer
 *
 * Wires the default tiers (undici direct fetcher, solver RPC client,
 * playwright-core browser) into a FetchOrchestrator from settings.
 */

import { BrowserFetcher } from './browser-fetcher.js'
import { ChallengeSolverClient } from './challenge-solver-client.js'
import { DirectFetcher } from './direct-fetcher.js'
import { FetchOrchestrator } from './orchestrator.js'
import type { ScannerSettings } from '../config/settings.js'

export { FetchOrchestrator, classifyTierResult } from './orchestrator.js'
export { isChallengeLike, DEFAULT_CHALLENGE_MARKERS } from './challenge-detector.js'
export type { ChallengeMarkers } from './challenge-detector.js'
export type { FetchResult, FetchTier, GetOptions, TierVerdict } from './types.js'
export type { FetchFailureKind } from './errors.js'

export interface FetchLayer {
  orchestrator: FetchOrchestrator
  /** Release pooled connections */
  close(): Promise<void>
}

export function createFetchLayer(settings: ScannerSettings): FetchLayer {
  const direct = new DirectFetcher({ http: settings.http })
  const orchestrator = new FetchOrchestrator({
    settings,
    direct,
    solver: new ChallengeSolverClient({ settings: settings.solver }),
    browser: new BrowserFetcher({ settings: settings.browser }),
  })
  return {
    orchestrator,
    close: () => direct.close(),
  }
}
