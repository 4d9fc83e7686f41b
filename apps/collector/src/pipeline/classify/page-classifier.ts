/**
 * Page Classifier
 *
 * Heuristics first; ambiguous pages are escalated to the extraction service
 * for a single label. Escalation failures default to 'other'.
 */

import { z } from 'zod'
import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../../config/logger.js'
import type { ExtractionRateLimiter } from '../concurrency.js'
import { errorCodeOf, errorMessageOf } from '../errors.js'
import { retryWithBackoff } from '../retry.js'
import type { Classification, ExtractionService, RawPage, RetryPolicy } from '../types.js'
import { pageText, truncate } from '../utils/text.js'
import { decideLabel, scorePage } from './heuristics.js'

const pageLabelSchema = z.enum(['product', 'promotion', 'other'])

const pageLabelResponseSchema = z.union([
  pageLabelSchema,
  z.object({ label: pageLabelSchema }).transform((response) => response.label),
])

export interface PageClassifierOptions {
  service: ExtractionService
  limiter: ExtractionRateLimiter
  retryPolicy: RetryPolicy
  /** Characters of page text sent with an escalation */
  excerptChars: number
  logger?: ILogger
}

export class PageClassifier {
  private readonly log: ILogger

  constructor(private readonly options: PageClassifierOptions) {
    this.log = options.logger ?? loggers.classifier
  }

  async classify(page: RawPage, signal?: AbortSignal): Promise<Classification> {
    const scores = scorePage(page)
    const decision = decideLabel(scores)

    if (decision.tier === 'decisive') {
      return { ...decision, scores, escalated: false, fallback: false }
    }

    const excerpt = truncate(pageText(page), this.options.excerptChars)
    const outcome = await retryWithBackoff(
      () =>
        this.options.limiter.run(async () => {
          const response = await this.options.service.infer('page-label', `URL: ${page.url}\n\n${excerpt}`)
          return pageLabelResponseSchema.parse(response)
        }, signal),
      this.options.retryPolicy,
      { signal }
    )

    if (outcome.ok) {
      this.log.debug('PAGE_LABEL_ESCALATED', { url: page.url, label: outcome.value, scores })
      return { label: outcome.value, tier: 'ambiguous', scores, escalated: true, fallback: false }
    }

    this.log.warn('PAGE_LABEL_FALLBACK', {
      url: page.url,
      attempts: outcome.attempts,
      code: errorCodeOf(outcome.error),
      reason: errorMessageOf(outcome.error),
    })
    return { label: 'other', tier: 'ambiguous', scores, escalated: true, fallback: true }
  }
}
