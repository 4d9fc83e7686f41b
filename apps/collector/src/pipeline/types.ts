/**
 * Collector Pipeline Core Types
 *
 * Data model for the classify → extract → normalize → dedupe pipeline,
 * plus the contracts of its external collaborators (fetcher, extraction
 * service, record store).
 */

import type { ILogger } from '@shelfwatch/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export interface CrawlSettings {
  /** Maximum crawl depth below each seed URL (1..5) */
  readonly depth: number

  /** Maximum pages returned per seed URL (1..1000) */
  readonly limit: number
}

/**
 * A monitored competitor. Immutable, loaded once per run.
 */
export interface Competitor {
  /** Stable slug, e.g. "west-elm" */
  readonly id: string

  /** Display name, e.g. "West Elm" */
  readonly name: string

  /** Seed URLs for new-product pages */
  readonly newProductUrls: readonly string[]

  /** Seed URLs for promotion pages */
  readonly promotionUrls: readonly string[]

  readonly crawl: CrawlSettings

  /** Pages whose URL contains any of these substrings are skipped */
  readonly excludePatterns: readonly string[]

  readonly enabled: boolean

  readonly tags: readonly string[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pages and Labels
// ═══════════════════════════════════════════════════════════════════════════════

/** Which configured URL list a page was crawled from. */
export type SeedKind = 'product' | 'promotion'

/**
 * Raw page content as returned by the fetcher.
 * Consumed once by classification and extraction, never retained.
 */
export interface RawPage {
  url: string
  competitorId: string
  html: string
  markdown: string
  fetchedAt: Date
  seedKind?: SeedKind
}

export type PageLabel = 'product' | 'promotion' | 'other'

export const PAGE_LABELS: readonly PageLabel[] = ['product', 'promotion', 'other']

/**
 * Coarse certainty of the heuristic decision.
 * Ambiguous decisions are escalated to the extraction service.
 */
export type ConfidenceTier = 'decisive' | 'ambiguous'

export type LabelScores = Record<PageLabel, number>

export interface Classification {
  label: PageLabel
  tier: ConfidenceTier
  scores: LabelScores
  /** True when the extraction service was asked for the label */
  escalated: boolean
  /** True when escalation failed and the label defaulted to 'other' */
  fallback: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate Records (pre-normalization)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A field value exactly as reported by the extraction service.
 * Booleans are accepted here and rejected by the normalizer.
 */
export type RawValue = string | number | boolean | null

export interface RawProductFields {
  product_name?: RawValue
  brand?: RawValue
  category?: RawValue
  price?: RawValue
  original_price?: RawValue
  launch_date?: RawValue
  product_url?: RawValue
  image_url?: RawValue
  sku?: RawValue
}

export interface RawPromotionFields {
  promo_title?: RawValue
  promo_type?: RawValue
  promo_code?: RawValue
  discount_value?: RawValue
  start_date?: RawValue
  end_date?: RawValue
  applicable_products?: RawValue
  promo_url?: RawValue
  image_url?: RawValue
  description?: RawValue
}

interface CandidateBase {
  competitorId: string
  competitorName: string
  /** Page the candidate was extracted from; null when no page context exists */
  sourceUrl: string | null
  /** Extraction confidence in [0, 1] */
  confidence: number
  /** Set when confidence is below the configured threshold */
  needsVerification: boolean
}

export interface ProductCandidate extends CandidateBase {
  kind: 'product'
  fields: RawProductFields
}

export interface PromotionCandidate extends CandidateBase {
  kind: 'promotion'
  fields: RawPromotionFields
}

export type CandidateRecord = ProductCandidate | PromotionCandidate

// ═══════════════════════════════════════════════════════════════════════════════
// Final Records
// ═══════════════════════════════════════════════════════════════════════════════

export type PromoType = 'percent-off' | 'amount-off' | 'bogo' | 'free-shipping' | 'other'

export type PromotionStatus = 'active' | 'upcoming' | 'expired' | 'unknown'

interface RecordMetadata {
  readonly sourceUrl: string | null
  readonly confidence: number
  readonly needsVerification: boolean
  /** ISO 8601 timestamp, assigned once when the record is accepted */
  readonly collectedAt: string
}

export interface ProductRecord extends RecordMetadata {
  readonly competitor: string
  readonly productName: string
  readonly brand?: string
  readonly category?: string
  /** Non-negative decimal rounded to cents */
  readonly price?: number
  readonly originalPrice?: number
  /** YYYY-MM-DD */
  readonly launchDate?: string
  /** Absolute canonical URL; part of the uniqueness key */
  readonly productUrl: string
  readonly imageUrl?: string
  readonly sku?: string
}

export interface PromotionRecord extends RecordMetadata {
  readonly competitor: string
  readonly promoTitle: string
  readonly promoType: PromoType
  readonly promoCode?: string
  /** Percentage for percent-off, currency amount otherwise */
  readonly discountValue?: number
  /** YYYY-MM-DD */
  readonly startDate?: string
  /** YYYY-MM-DD, never before startDate */
  readonly endDate?: string
  readonly applicableProducts?: string
  /** Absolute canonical URL; part of the uniqueness key */
  readonly promoUrl: string
  readonly imageUrl?: string
  readonly description?: string
  /** Derived from the dates relative to the collection day */
  readonly status: PromotionStatus
}

export type FinalRecord = ProductRecord | PromotionRecord

// ═══════════════════════════════════════════════════════════════════════════════
// Normalization Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reasons a candidate is dropped by the normalizer.
 */
export type RejectionReason = 'missing-required-field' | 'invalid-url' | 'malformed-schema'

/**
 * Optional values that were present but could not be kept.
 * Each one is counted in the run stats.
 */
export type NormalizeWarningKind =
  | 'unparseable-price'
  | 'unparseable-date'
  | 'invalid-image-url'
  | 'inverted-date-range'
  | 'implausible-discount'

export interface NormalizeWarning {
  kind: NormalizeWarningKind
  field: string
}

export type NormalizeResult<R extends FinalRecord = FinalRecord> =
  | { status: 'accepted'; record: R; warnings: NormalizeWarning[] }
  | { status: 'rejected'; reason: RejectionReason; field: string; detail: string }

// ═══════════════════════════════════════════════════════════════════════════════
// External Collaborators
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Crawling transport. Rejects with FetchError when a seed URL is unreachable.
 */
export interface PageFetcher {
  fetch(url: string, maxDepth: number, pageLimit: number): Promise<RawPage[]>

  /** Rejects when the fetcher cannot be reached at all */
  healthCheck(): Promise<void>
}

/** Prompt schemas understood by the extraction service. */
export type PromptSchemaId = 'product' | 'promotion' | 'page-label'

/**
 * Language-understanding service.
 *
 * `infer` resolves with the parsed JSON payload; conformance to the schema
 * is checked by the caller. Rejects with ExtractionServiceError on transport
 * failure or output that is not JSON.
 */
export interface ExtractionService {
  infer(schema: PromptSchemaId, content: string): Promise<unknown>

  /** Rejects when the service cannot be reached at all */
  healthCheck(): Promise<void>
}

export interface RecordBatch {
  products: readonly ProductRecord[]
  promotions: readonly PromotionRecord[]
  stats: RunStats
}

/**
 * Persistence/export collaborator. Receives validated, deduplicated,
 * ordered sequences only.
 */
export interface RecordStore {
  save(batch: RecordBatch): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Stats
// ═══════════════════════════════════════════════════════════════════════════════

export type FailureStage = 'fetch' | 'classify' | 'extract' | 'normalize'

export interface PageFailure {
  competitorId: string
  url: string
  stage: FailureStage
  code: string
  message: string
}

export interface RejectedCandidate {
  competitorId: string
  sourceUrl: string | null
  kind: CandidateRecord['kind']
  reason: RejectionReason
  field: string
  detail: string
}

export interface RunStats {
  startedAt: string
  finishedAt: string | null
  durationMs: number

  seedUrlsAttempted: number
  pagesFetched: number
  fetchFailures: number
  duplicatePagesSkipped: number
  pagesExcluded: number
  pagesByLabel: Record<PageLabel, number>
  classificationEscalations: number
  classificationFallbacks: number

  /** Pages whose extraction reached an outcome, success or failure */
  pagesExtracted: number
  candidatesExtracted: number
  lowConfidenceCandidates: number
  extractionFailures: number
  detailPageExtrasDiscarded: number

  candidatesRejected: Record<RejectionReason, number>
  normalizeWarnings: Record<NormalizeWarningKind, number>

  duplicatesCollapsed: { products: number; promotions: number }
  finalRecords: { products: number; promotions: number }

  pageFailures: number
  pagesAbandoned: number
  deadlineExceeded: boolean

  failures: PageFailure[]
  rejections: RejectedCandidate[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline Options
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  /** Additional attempts after the first one */
  maxRetries: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  backoffMultiplier: 2,
}

export interface RateLimitConfig {
  /** Maximum extraction calls in flight at once */
  maxInFlight: number

  /** Minimum delay between the starts of two calls, in ms */
  minSpacingMs: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxInFlight: 2,
  minSpacingMs: 1000,
}

export interface PipelineOptions {
  /** Candidates below this confidence are flagged for verification */
  confidenceThreshold: number
  retryPolicy: RetryPolicy
  rateLimit: RateLimitConfig
  competitorConcurrency: number
  pageConcurrency: number
  /** Characters of page content sent for extraction */
  maxContentChars: number
  /** Characters of visible text sent for classification escalation */
  classifierExcerptChars: number
  /** Overall run deadline in ms; undefined runs to completion */
  deadlineMs?: number
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  confidenceThreshold: 0.7,
  retryPolicy: DEFAULT_RETRY_POLICY,
  rateLimit: DEFAULT_RATE_LIMIT,
  competitorConcurrency: 2,
  pageConcurrency: 4,
  maxContentChars: 12000,
  classifierExcerptChars: 2000,
}

export interface PipelineDependencies {
  fetcher: PageFetcher
  extractionService: ExtractionService
  logger?: ILogger
  /** Injected for tests; defaults to the wall clock */
  clock?: () => Date
}

export interface PipelineResult {
  runId: string
  products: ProductRecord[]
  promotions: PromotionRecord[]
  stats: RunStats
}
