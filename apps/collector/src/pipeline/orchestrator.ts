/**
 * Pipeline Orchestrator
 *
 * Per competitor: fetch every seed URL → classify each page → extract
 * candidates → normalize → (once every page has settled) order by crawl
 * position and deduplicate. Competitors and pages fan out under
 * ConcurrencyLimiters; every extraction-service call shares one
 * ExtractionRateLimiter.
 *
 * Per-page failures are isolated and tallied. Only a failed precondition
 * (collaborator health check) rejects the run. When the deadline fires no
 * new page work starts, in-flight pages are abandoned, and records accepted
 * so far are deduplicated and returned.
 */

import { randomUUID } from 'node:crypto'
import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../config/logger.js'
import { PageClassifier } from './classify/page-classifier.js'
import { ConcurrencyLimiter, ExtractionRateLimiter } from './concurrency.js'
import { PreconditionError, errorCodeOf, errorMessageOf } from './errors.js'
import { FieldExtractor } from './extract/field-extractor.js'
import { recordRunCompleted } from './metrics.js'
import { dedupeProducts, dedupePromotions } from './process/dedupe.js'
import { normalize } from './process/normalizer.js'
import { RunStatsCollector } from './stats.js'
import { DEFAULT_PIPELINE_OPTIONS } from './types.js'
import type {
  Competitor,
  FailureStage,
  FinalRecord,
  PageFetcher,
  PipelineDependencies,
  PipelineOptions,
  PipelineResult,
  ProductRecord,
  PromotionRecord,
  RawPage,
  SeedKind,
} from './types.js'
import { canonicalizeUrl } from './utils/url.js'

interface Positioned<T> {
  record: T
  pageIndex: number
  candidateIndex: number
}

/** Mutable per-competitor accumulator; closed once the run has returned. */
interface CompetitorState {
  competitor: Competitor
  products: Positioned<ProductRecord>[]
  promotions: Positioned<PromotionRecord>[]
  pagesQueued: number
  pagesSettled: number
  closed: boolean
}

interface RunContext {
  runId: string
  stats: RunStatsCollector
  signal: AbortSignal
  pageLimiter: ConcurrencyLimiter
  classifier: PageClassifier
  extractor: FieldExtractor
}

interface Seed {
  url: string
  kind: SeedKind
}

function byPosition<T>(a: Positioned<T>, b: Positioned<T>): number {
  return a.pageIndex - b.pageIndex || a.candidateIndex - b.candidateIndex
}

function pageKey(url: string): string {
  try {
    return canonicalizeUrl(url)
  } catch {
    return url
  }
}

export class CompetitorPipeline {
  private readonly fetcher: PageFetcher
  private readonly deps: PipelineDependencies
  private readonly options: PipelineOptions
  private readonly log: ILogger
  private readonly clock: () => Date

  constructor(deps: PipelineDependencies, options: Partial<PipelineOptions> = {}) {
    this.deps = deps
    this.fetcher = deps.fetcher
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options }
    this.log = deps.logger ?? loggers.pipeline
    this.clock = deps.clock ?? (() => new Date())
  }

  /**
   * Run the pipeline over every competitor.
   *
   * @throws PreconditionError when the fetcher or extraction service is unreachable
   */
  async run(competitors: readonly Competitor[]): Promise<PipelineResult> {
    const runId = randomUUID()
    await this.checkPreconditions(runId)

    const stats = new RunStatsCollector(this.clock())
    const controller = new AbortController()
    const rateLimiter = new ExtractionRateLimiter(this.options.rateLimit)
    const ctx: RunContext = {
      runId,
      stats,
      signal: controller.signal,
      pageLimiter: new ConcurrencyLimiter(this.options.pageConcurrency),
      classifier: new PageClassifier({
        service: this.deps.extractionService,
        limiter: rateLimiter,
        retryPolicy: this.options.retryPolicy,
        excerptChars: this.options.classifierExcerptChars,
        logger: this.log.child('classifier'),
      }),
      extractor: new FieldExtractor({
        service: this.deps.extractionService,
        limiter: rateLimiter,
        retryPolicy: this.options.retryPolicy,
        confidenceThreshold: this.options.confidenceThreshold,
        maxContentChars: this.options.maxContentChars,
        logger: this.log.child('extractor'),
      }),
    }

    this.log.info('PIPELINE_RUN_STARTED', {
      runId,
      competitors: competitors.map((c) => c.id),
      deadlineMs: this.options.deadlineMs ?? null,
    })

    const states: CompetitorState[] = competitors.map((competitor) => ({
      competitor,
      products: [],
      promotions: [],
      pagesQueued: 0,
      pagesSettled: 0,
      closed: false,
    }))

    const competitorLimiter = new ConcurrencyLimiter(this.options.competitorConcurrency)
    const work = Promise.allSettled(
      states.map((state) => competitorLimiter.run(() => this.runCompetitor(state, ctx), ctx.signal))
    ).then(() => 'done' as const)

    let deadlineExceeded = false
    const deadlineMs = this.options.deadlineMs
    if (deadlineMs === undefined) {
      await work
    } else {
      let timer: ReturnType<typeof setTimeout> | undefined
      const deadline = new Promise<'deadline'>((resolve) => {
        timer = setTimeout(() => resolve('deadline'), deadlineMs)
      })
      const winner = await Promise.race([work, deadline])
      clearTimeout(timer)
      deadlineExceeded = winner === 'deadline'
    }

    if (deadlineExceeded) {
      controller.abort(new Error(`Run deadline of ${deadlineMs}ms exceeded`))
      this.log.warn('PIPELINE_DEADLINE_EXCEEDED', { runId, deadlineMs })
    }

    const products: ProductRecord[] = []
    const promotions: PromotionRecord[] = []
    let pagesAbandoned = 0

    for (const state of states) {
      state.closed = true
      pagesAbandoned += state.pagesQueued - state.pagesSettled

      const productSet = dedupeProducts([...state.products].sort(byPosition).map((p) => p.record))
      const promotionSet = dedupePromotions([...state.promotions].sort(byPosition).map((p) => p.record))
      stats.duplicatesCollapsed('products', productSet.collapsed)
      stats.duplicatesCollapsed('promotions', promotionSet.collapsed)
      products.push(...productSet.records)
      promotions.push(...promotionSet.records)
    }

    const sealed = stats.seal({
      finishedAt: this.clock(),
      products: products.length,
      promotions: promotions.length,
      deadlineExceeded,
      pagesAbandoned,
    })
    recordRunCompleted(runId, sealed, products, this.log.child('metrics'))

    return { runId, products, promotions, stats: sealed }
  }

  private async checkPreconditions(runId: string): Promise<void> {
    const [fetcher, service] = await Promise.allSettled([
      this.fetcher.healthCheck(),
      this.deps.extractionService.healthCheck(),
    ])

    if (fetcher.status === 'rejected') {
      this.log.fatal('PRECONDITION_FAILED', { runId, collaborator: 'fetcher' }, fetcher.reason)
      throw new PreconditionError('fetcher', `Page fetcher unreachable: ${errorMessageOf(fetcher.reason)}`, {
        cause: fetcher.reason,
      })
    }
    if (service.status === 'rejected') {
      this.log.fatal('PRECONDITION_FAILED', { runId, collaborator: 'extraction-service' }, service.reason)
      throw new PreconditionError(
        'extraction-service',
        `Extraction service unreachable: ${errorMessageOf(service.reason)}`,
        { cause: service.reason }
      )
    }
  }

  private async fetchSeed(seed: Seed, competitor: Competitor, ctx: RunContext): Promise<RawPage[]> {
    ctx.stats.seedAttempted()
    try {
      const pages = await this.fetcher.fetch(seed.url, competitor.crawl.depth, competitor.crawl.limit)
      ctx.stats.pagesFetched(pages.length)
      return pages.map((page) => ({
        ...page,
        competitorId: competitor.id,
        seedKind: page.seedKind ?? seed.kind,
      }))
    } catch (error) {
      ctx.stats.fetchFailed({
        competitorId: competitor.id,
        url: seed.url,
        stage: 'fetch',
        code: errorCodeOf(error),
        message: errorMessageOf(error),
      })
      this.log.warn('SEED_FETCH_FAILED', { runId: ctx.runId, competitorId: competitor.id, url: seed.url }, error)
      return []
    }
  }

  private async runCompetitor(state: CompetitorState, ctx: RunContext): Promise<void> {
    const { competitor } = state
    const seeds: Seed[] = [
      ...competitor.newProductUrls.map((url): Seed => ({ url, kind: 'product' })),
      ...competitor.promotionUrls.map((url): Seed => ({ url, kind: 'promotion' })),
    ]

    const fetched = await Promise.all(seeds.map((seed) => this.fetchSeed(seed, competitor, ctx)))
    if (ctx.signal.aborted) {
      return
    }

    const seen = new Set<string>()
    const pages: RawPage[] = []
    for (const page of fetched.flat()) {
      const key = pageKey(page.url)
      if (seen.has(key)) {
        ctx.stats.duplicatePageSkipped()
        continue
      }
      seen.add(key)
      if (competitor.excludePatterns.some((pattern) => page.url.includes(pattern))) {
        ctx.stats.pageExcluded()
        continue
      }
      pages.push(page)
    }

    state.pagesQueued += pages.length
    await Promise.allSettled(
      pages.map((page, pageIndex) =>
        ctx.pageLimiter
          .run(() => this.processPage(page, pageIndex, state, ctx), ctx.signal)
          .catch((error: unknown) => this.recordPageFailure(page, competitor, 'classify', error, ctx))
          .finally(() => {
            state.pagesSettled++
          })
      )
    )

    this.log.info('COMPETITOR_COMPLETED', {
      runId: ctx.runId,
      competitorId: competitor.id,
      pages: pages.length,
      products: state.products.length,
      promotions: state.promotions.length,
    })
  }

  private recordPageFailure(
    page: RawPage,
    competitor: Competitor,
    stage: FailureStage,
    error: unknown,
    ctx: RunContext
  ): void {
    if (ctx.signal.aborted) {
      return
    }
    ctx.stats.pageFailed({
      competitorId: competitor.id,
      url: page.url,
      stage,
      code: errorCodeOf(error),
      message: errorMessageOf(error),
    })
    this.log.error('PAGE_FAILED', { runId: ctx.runId, url: page.url, stage }, error)
  }

  private async processPage(page: RawPage, pageIndex: number, state: CompetitorState, ctx: RunContext): Promise<void> {
    const { competitor } = state
    let stage: FailureStage = 'classify'

    try {
      const classification = await ctx.classifier.classify(page, ctx.signal)
      ctx.stats.pageClassified(classification)
      if (classification.label === 'other') {
        return
      }

      stage = 'extract'
      const outcome = await ctx.extractor.extract(page, classification.label, {
        competitorName: competitor.name,
        signal: ctx.signal,
      })

      if (!outcome.ok) {
        if (ctx.signal.aborted) {
          return
        }
        ctx.stats.extractionFailed({
          competitorId: competitor.id,
          url: page.url,
          stage: 'extract',
          code: outcome.error.code,
          message: outcome.error.message,
        })
        return
      }

      ctx.stats.extractionSucceeded(outcome.candidates, outcome.extrasDiscarded)

      stage = 'normalize'
      outcome.candidates.forEach((candidate, candidateIndex) => {
        const result = normalize(candidate, { collectedAt: this.clock() })

        if (result.status === 'rejected') {
          ctx.stats.candidateRejected({
            competitorId: competitor.id,
            sourceUrl: candidate.sourceUrl,
            kind: candidate.kind,
            reason: result.reason,
            field: result.field,
            detail: result.detail,
          })
          this.log.debug('CANDIDATE_REJECTED', {
            runId: ctx.runId,
            url: page.url,
            reason: result.reason,
            field: result.field,
          })
          return
        }

        ctx.stats.normalizeWarnings(result.warnings)
        if (!state.closed) {
          this.accept(state, result.record, pageIndex, candidateIndex)
        }
      })
    } catch (error) {
      this.recordPageFailure(page, competitor, stage, error, ctx)
    }
  }

  private accept(state: CompetitorState, record: FinalRecord, pageIndex: number, candidateIndex: number): void {
    if ('productUrl' in record) {
      state.products.push({ record, pageIndex, candidateIndex })
    } else {
      state.promotions.push({ record, pageIndex, candidateIndex })
    }
  }
}
