/**
 * Collector Logger Configuration
 *
 * Pre-configured loggers for collector components
 */

import { createLogger } from '@shelfwatch/logger'

// Root logger for the collector
export const logger = createLogger('collector')

export const loggers = {
  pipeline: logger.child('pipeline'),
  classifier: logger.child('classifier'),
  extractor: logger.child('extractor'),
  fetcher: logger.child('fetcher'),
  exporter: logger.child('exporter'),
  metrics: logger.child('metrics'),
  cli: logger.child('cli'),
}
