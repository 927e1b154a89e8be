/**
 * Scanner Logger Configuration
 *
 * Pre-configured loggers for scanner components
 */

import { createLogger } from '@stockprobe/logger'

// Root logger for the scanner service
export const logger = createLogger('scanner')

export const loggers = {
  fetch: logger.child('fetch'),
  solver: logger.child('solver'),
  browser: logger.child('browser'),
  scan: logger.child('scan'),
  cli: logger.child('cli'),
}
