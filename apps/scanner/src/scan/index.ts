export { AdaptiveScanController, resumeStartId, DEFAULT_INACTIVE_STREAK_LIMIT } from './scan-controller.js'
export type { ScanControllerOptions } from './scan-controller.js'
export { ScanRunner, ScanAlreadyRunningError, STOP_ABORTED, STOP_EXHAUSTED } from './scan-runner.js'
export { createFetchProbe, expandUrlTemplate } from './fetch-probe.js'
export type { FetchProbeOptions, PageGetter } from './fetch-probe.js'
export type { ProbeOutcome, ScanDiscovery, ScanProbe, ScanRunOptions, ScanSummary } from './types.js'
