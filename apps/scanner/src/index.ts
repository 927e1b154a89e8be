/**
 * @stockprobe/scanner
 *
 * Library entry: the fetch layer, the adaptive scanner and settings loading.
 * The CLI lives in src/cli.
 */

export * from './fetch/index.js'
export * from './scan/index.js'
export { ConfigurationError, loadSettings, parseSettings } from './config/settings.js'
export type { RawScannerConfig, ScannerSettings, ScannerDefaults } from './config/settings.js'
export { normalizeUrl, extractDomain, isSameDomain, isValidUrl } from './utils/url.js'
