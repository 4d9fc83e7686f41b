/**
 * Shelfwatch Collector
 *
 * Competitive-intelligence pipeline: classify competitor pages, extract
 * product and promotion candidates, normalize and deduplicate them.
 */

// Core types
export * from './pipeline/types.js'
export * from './pipeline/errors.js'

// Orchestration
export { CompetitorPipeline } from './pipeline/orchestrator.js'
export { ConcurrencyLimiter, ExtractionRateLimiter } from './pipeline/concurrency.js'
export { retryWithBackoff, backoffDelay } from './pipeline/retry.js'
export type { RetryOutcome, RetryOptions } from './pipeline/retry.js'
export { RunStatsCollector, createEmptyStats } from './pipeline/stats.js'
export { computeRates, recordRunCompleted } from './pipeline/metrics.js'
export type { RunRates } from './pipeline/metrics.js'

// Stages
export { PageClassifier } from './pipeline/classify/page-classifier.js'
export { scorePage, decideLabel } from './pipeline/classify/heuristics.js'
export { FieldExtractor, isProductDetailUrl } from './pipeline/extract/field-extractor.js'
export type { ExtractOutcome } from './pipeline/extract/field-extractor.js'
export {
  normalize,
  normalizeProduct,
  normalizePromotion,
  candidateFromRecord,
  mapPromoType,
  promotionStatus,
} from './pipeline/process/normalizer.js'
export { dedupe, dedupeProducts, dedupePromotions, productKey, promotionKey } from './pipeline/process/dedupe.js'

// Adapters
export { FirecrawlFetcher } from './pipeline/fetch/firecrawl-fetcher.js'
export { AnthropicExtractionService, parseJsonReply } from './pipeline/extract/anthropic-service.js'
export { CsvRecordStore } from './pipeline/process/writer.js'

// Configuration
export { loadSettings, pipelineOptionsFromSettings } from './config/settings.js'
export type { Settings } from './config/settings.js'
export { loadCompetitors, parseCompetitors, selectCompetitors } from './config/competitors.js'
