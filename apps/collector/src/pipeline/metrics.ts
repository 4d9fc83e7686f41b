/**
 * Collector Metrics
 *
 * Structured log events only. Alert thresholds are data-quality targets:
 * seed URL success, price coverage, duplicate share and extraction failures.
 */

import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../config/logger.js'
import type { ProductRecord, RunStats } from './types.js'

const MIN_SEED_SUCCESS_RATE = 0.95
const MIN_PRICE_EXTRACTION_RATE = 0.9
const MAX_DUPLICATE_RATE = 0.05
const MAX_EXTRACTION_FAILURE_RATE = 0.5

const MIN_SEEDS_FOR_ALERT = 5
const MIN_PRODUCTS_FOR_ALERT = 10
const MIN_RECORDS_FOR_ALERT = 20
const MIN_PAGES_FOR_ALERT = 10

export interface RunRates {
  seedSuccessRate: number | null
  priceExtractionRate: number | null
  duplicateRate: number | null
  extractionFailureRate: number | null
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator > 0 ? Math.round((numerator / denominator) * 10_000) / 10_000 : null
}

export function computeRates(stats: RunStats, products: readonly ProductRecord[]): RunRates {
  const finalTotal = stats.finalRecords.products + stats.finalRecords.promotions
  const collapsed = stats.duplicatesCollapsed.products + stats.duplicatesCollapsed.promotions
  return {
    seedSuccessRate: ratio(stats.seedUrlsAttempted - stats.fetchFailures, stats.seedUrlsAttempted),
    priceExtractionRate: ratio(products.filter((p) => p.price !== undefined).length, products.length),
    duplicateRate: ratio(collapsed, finalTotal + collapsed),
    extractionFailureRate: ratio(stats.extractionFailures, stats.pagesExtracted),
  }
}

/**
 * Emit the run summary and any data-quality alerts.
 *
 * @returns The names of the alerts raised
 */
export function recordRunCompleted(
  runId: string,
  stats: RunStats,
  products: readonly ProductRecord[],
  log: ILogger = loggers.metrics
): string[] {
  const rates = computeRates(stats, products)
  const alerts: string[] = []
  const { failures: _failures, rejections: _rejections, ...counters } = stats

  log.info('PIPELINE_RUN_COMPLETED', {
    event_name: 'PIPELINE_RUN_COMPLETED',
    runId,
    ...counters,
    ...rates,
  })

  if (
    stats.seedUrlsAttempted >= MIN_SEEDS_FOR_ALERT &&
    rates.seedSuccessRate !== null &&
    rates.seedSuccessRate < MIN_SEED_SUCCESS_RATE
  ) {
    alerts.push('PIPELINE_ALERT_LOW_SEED_SUCCESS_RATE')
    log.warn('PIPELINE_ALERT_LOW_SEED_SUCCESS_RATE', {
      event_name: 'PIPELINE_ALERT_LOW_SEED_SUCCESS_RATE',
      runId,
      seedSuccessRate: rates.seedSuccessRate,
      seedUrlsAttempted: stats.seedUrlsAttempted,
      threshold: MIN_SEED_SUCCESS_RATE,
    })
  }

  if (
    products.length >= MIN_PRODUCTS_FOR_ALERT &&
    rates.priceExtractionRate !== null &&
    rates.priceExtractionRate < MIN_PRICE_EXTRACTION_RATE
  ) {
    alerts.push('PIPELINE_ALERT_LOW_PRICE_EXTRACTION_RATE')
    log.warn('PIPELINE_ALERT_LOW_PRICE_EXTRACTION_RATE', {
      event_name: 'PIPELINE_ALERT_LOW_PRICE_EXTRACTION_RATE',
      runId,
      priceExtractionRate: rates.priceExtractionRate,
      products: products.length,
      threshold: MIN_PRICE_EXTRACTION_RATE,
    })
  }

  const collapsed = stats.duplicatesCollapsed.products + stats.duplicatesCollapsed.promotions
  const seen = stats.finalRecords.products + stats.finalRecords.promotions + collapsed
  if (seen >= MIN_RECORDS_FOR_ALERT && rates.duplicateRate !== null && rates.duplicateRate > MAX_DUPLICATE_RATE) {
    alerts.push('PIPELINE_ALERT_HIGH_DUPLICATE_RATE')
    log.warn('PIPELINE_ALERT_HIGH_DUPLICATE_RATE', {
      event_name: 'PIPELINE_ALERT_HIGH_DUPLICATE_RATE',
      runId,
      duplicateRate: rates.duplicateRate,
      recordsSeen: seen,
      threshold: MAX_DUPLICATE_RATE,
    })
  }

  if (
    stats.pagesExtracted >= MIN_PAGES_FOR_ALERT &&
    rates.extractionFailureRate !== null &&
    rates.extractionFailureRate > MAX_EXTRACTION_FAILURE_RATE
  ) {
    alerts.push('PIPELINE_ALERT_HIGH_EXTRACTION_FAILURE_RATE')
    log.warn('PIPELINE_ALERT_HIGH_EXTRACTION_FAILURE_RATE', {
      event_name: 'PIPELINE_ALERT_HIGH_EXTRACTION_FAILURE_RATE',
      runId,
      extractionFailureRate: rates.extractionFailureRate,
      pagesExtracted: stats.pagesExtracted,
      threshold: MAX_EXTRACTION_FAILURE_RATE,
    })
  }

  if (stats.deadlineExceeded) {
    alerts.push('PIPELINE_ALERT_DEADLINE_EXCEEDED')
    log.warn('PIPELINE_ALERT_DEADLINE_EXCEEDED', {
      event_name: 'PIPELINE_ALERT_DEADLINE_EXCEEDED',
      runId,
      pagesAbandoned: stats.pagesAbandoned,
      durationMs: stats.durationMs,
    })
  }

  return alerts
}
