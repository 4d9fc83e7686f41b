/**
 * Field Extractor
 *
 * Converts a classified page into candidate records via the extraction
 * service. Malformed replies and service errors are retried with the same
 * input; exhaustion yields a failed outcome, never a throw.
 */

import type { ZodType } from 'zod'
import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../../config/logger.js'
import type { ExtractionRateLimiter } from '../concurrency.js'
import { ExtractionError, errorCodeOf, errorMessageOf } from '../errors.js'
import { retryWithBackoff } from '../retry.js'
import type {
  CandidateRecord,
  ExtractionService,
  PageLabel,
  ProductCandidate,
  PromotionCandidate,
  PromptSchemaId,
  RawPage,
  RetryPolicy,
} from '../types.js'
import { pageText, truncate } from '../utils/text.js'
import { urlPath } from '../utils/url.js'
import { productResponseSchema, promotionResponseSchema } from './schemas.js'
import type { ProductItem, PromotionItem } from './schemas.js'

const PRODUCT_DETAIL_PATH = /\/(?:p|product|products|dp|pdp|item)\/[^/]+\/?$/

export type ExtractOutcome =
  | { ok: true; candidates: CandidateRecord[]; attempts: number; extrasDiscarded: number }
  | { ok: false; error: ExtractionError; attempts: number }

export interface FieldExtractorOptions {
  service: ExtractionService
  limiter: ExtractionRateLimiter
  retryPolicy: RetryPolicy
  confidenceThreshold: number
  maxContentChars: number
  logger?: ILogger
}

export interface ExtractContext {
  competitorName?: string
  signal?: AbortSignal
}

/**
 * Product-detail pages carry exactly one product; listing pages carry many.
 */
export function isProductDetailUrl(url: string): boolean {
  return PRODUCT_DETAIL_PATH.test(urlPath(url))
}

function isBlank(value: ProductItem['product_url']): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '')
}

export class FieldExtractor {
  private readonly log: ILogger

  constructor(private readonly options: FieldExtractorOptions) {
    this.log = options.logger ?? loggers.extractor
  }

  async extract(page: RawPage, label: PageLabel, context: ExtractContext = {}): Promise<ExtractOutcome> {
    if (label === 'other') {
      return { ok: true, candidates: [], attempts: 0, extrasDiscarded: 0 }
    }

    const competitorName = context.competitorName ?? page.competitorId
    const content = truncate(pageText(page), this.options.maxContentChars)

    if (label === 'product') {
      const outcome = await this.inferValid('product', productResponseSchema, page, content, context.signal)
      if (!outcome.ok) return outcome
      return this.toProductCandidates(page, competitorName, outcome.value, outcome.attempts)
    }

    const outcome = await this.inferValid('promotion', promotionResponseSchema, page, content, context.signal)
    if (!outcome.ok) return outcome
    const candidates = outcome.value.promotions.map((item): PromotionCandidate => {
      const { confidence: itemConfidence, ...fields } = item
      return {
        kind: 'promotion',
        ...this.metadata(page, competitorName, itemConfidence ?? outcome.value.confidence),
        fields,
      }
    })
    return { ok: true, candidates, attempts: outcome.attempts, extrasDiscarded: 0 }
  }

  private async inferValid<T>(
    schema: PromptSchemaId,
    responseSchema: ZodType<T>,
    page: RawPage,
    content: string,
    signal: AbortSignal | undefined
  ): Promise<{ ok: true; value: T; attempts: number } | { ok: false; error: ExtractionError; attempts: number }> {
    const outcome = await retryWithBackoff(
      () =>
        this.options.limiter.run(async () => {
          const response = await this.options.service.infer(schema, content)
          return responseSchema.parse(response)
        }, signal),
      this.options.retryPolicy,
      {
        signal,
        onRetry: (attempt, error, delayMs) => {
          this.log.warn('EXTRACTION_RETRY', {
            url: page.url,
            schema,
            attempt,
            delayMs,
            code: errorCodeOf(error),
            reason: errorMessageOf(error),
          })
        },
      }
    )

    if (outcome.ok) {
      return outcome
    }

    const error = new ExtractionError(
      page.url,
      schema,
      outcome.attempts,
      `Extraction failed after ${outcome.attempts} attempt(s): ${errorMessageOf(outcome.error)}`,
      { cause: outcome.error }
    )
    this.log.error('EXTRACTION_FAILED', { url: page.url, schema, attempts: outcome.attempts }, error)
    return { ok: false, error, attempts: outcome.attempts }
  }

  private toProductCandidates(
    page: RawPage,
    competitorName: string,
    response: { products: ProductItem[]; confidence?: number },
    attempts: number
  ): ExtractOutcome {
    let items = response.products
    let extrasDiscarded = 0

    if (isProductDetailUrl(page.url)) {
      extrasDiscarded = Math.max(0, items.length - 1)
      items = items.slice(0, 1)
      if (items.length === 1 && isBlank(items[0].product_url)) {
        items = [{ ...items[0], product_url: page.url }]
      }
      if (extrasDiscarded > 0) {
        this.log.debug('DETAIL_PAGE_EXTRAS_DISCARDED', { url: page.url, extrasDiscarded })
      }
    }

    const candidates = items.map((item): ProductCandidate => {
      const { confidence: itemConfidence, ...fields } = item
      return {
        kind: 'product',
        ...this.metadata(page, competitorName, itemConfidence ?? response.confidence),
        fields,
      }
    })

    return { ok: true, candidates, attempts, extrasDiscarded }
  }

  private metadata(page: RawPage, competitorName: string, reported: number | undefined) {
    const confidence = reported ?? 0
    return {
      competitorId: page.competitorId,
      competitorName,
      sourceUrl: page.url,
      confidence,
      needsVerification: confidence < this.options.confidenceThreshold,
    }
  }
}
