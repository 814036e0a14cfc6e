/**
 * Collector Logger Configuration
 *
 * Pre-configured loggers for collector components
 */

import { createLogger } from '@macro-ingest/logger'

// Root logger for the collector
export const logger = createLogger('collector')

// Pre-configured child loggers for common components
export const loggers = {
  orchestrator: logger.child('orchestrator'),
  fetch: logger.child('fetch'),
  dedupe: logger.child('dedupe'),
  watermark: logger.child('watermark'),
  export: logger.child('export'),
  redis: logger.child('redis'),
  adapters: logger.child('adapters'),
  cli: logger.child('cli'),
}
