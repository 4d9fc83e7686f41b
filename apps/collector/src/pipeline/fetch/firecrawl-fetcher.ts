/**
 * Firecrawl Page Fetcher
 *
 * Crawls a seed URL through the Firecrawl v1 crawl API using native fetch:
 * start a crawl job, poll it until it completes, then follow `next` links
 * to collect every page.
 */

import { z } from 'zod'
import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../../config/logger.js'
import { FetchError, errorMessageOf } from '../errors.js'
import type { PageFetcher, RawPage } from '../types.js'

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

export interface FirecrawlFetcherOptions {
  apiKey: string
  /** API origin without trailing slash, e.g. https://api.firecrawl.dev */
  baseUrl: string
  /** Overall budget for one crawl job, including polling */
  timeoutMs: number
  pollIntervalMs: number
  /** Timeout of each HTTP request */
  requestTimeoutMs?: number
  logger?: ILogger
  clock?: () => number
}

const startCrawlResponseSchema = z.object({
  success: z.boolean(),
  id: z.string().optional(),
  error: z.string().optional(),
})

const crawledPageSchema = z.object({
  markdown: z.string().nullish(),
  html: z.string().nullish(),
  metadata: z
    .object({
      sourceURL: z.string().optional(),
      url: z.string().optional(),
      statusCode: z.number().optional(),
    })
    .passthrough()
    .optional(),
})

const crawlStatusResponseSchema = z.object({
  status: z.enum(['scraping', 'completed', 'failed', 'cancelled']),
  total: z.number().optional(),
  completed: z.number().optional(),
  data: z.array(crawledPageSchema).default([]),
  next: z.string().nullish(),
  error: z.string().optional(),
})

type CrawledPage = z.infer<typeof crawledPageSchema>

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class FirecrawlFetcher implements PageFetcher {
  private readonly requestTimeoutMs: number
  private readonly log: ILogger
  private readonly now: () => number

  constructor(private readonly options: FirecrawlFetcherOptions) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.log = options.logger ?? loggers.fetcher
    this.now = options.clock ?? Date.now
  }

  async fetch(url: string, maxDepth: number, pageLimit: number): Promise<RawPage[]> {
    const startedAt = this.now()

    const started = startCrawlResponseSchema.safeParse(
      await this.request(url, `${this.options.baseUrl}/v1/crawl`, {
        method: 'POST',
        body: JSON.stringify({
          url,
          maxDepth,
          limit: pageLimit,
          scrapeOptions: { formats: ['markdown', 'html'], onlyMainContent: true },
        }),
      })
    )
    if (!started.success || !started.data.success || !started.data.id) {
      const reason = started.success ? started.data.error ?? 'no job id returned' : 'unexpected response shape'
      throw new FetchError(url, `Crawl could not be started: ${reason}`)
    }

    const jobId = started.data.id
    this.log.debug('CRAWL_STARTED', { url, jobId, maxDepth, pageLimit })

    const statusUrl = `${this.options.baseUrl}/v1/crawl/${encodeURIComponent(jobId)}`
    for (;;) {
      const status = await this.crawlStatus(url, statusUrl)

      if (status.status === 'failed' || status.status === 'cancelled') {
        throw new FetchError(url, `Crawl ${status.status}: ${status.error ?? 'no reason given'}`)
      }

      if (status.status === 'completed') {
        const pages = status.data
        let next = status.next
        while (next) {
          const more = await this.crawlStatus(url, next)
          pages.push(...more.data)
          next = more.next
        }

        const fetchedAt = new Date(this.now())
        const result = pages.map((page) => this.toRawPage(page, url, fetchedAt))
        this.log.info('CRAWL_COMPLETED', { url, jobId, pages: result.length, durationMs: this.now() - startedAt })
        return result
      }

      if (this.now() - startedAt + this.options.pollIntervalMs > this.options.timeoutMs) {
        throw new FetchError(url, `Crawl timed out after ${this.options.timeoutMs}ms`)
      }
      await sleep(this.options.pollIntervalMs)
    }
  }

  async healthCheck(): Promise<void> {
    await this.request(this.options.baseUrl, `${this.options.baseUrl}/v1/team/credit-usage`, { method: 'GET' })
  }

  private async crawlStatus(seedUrl: string, statusUrl: string) {
    const parsed = crawlStatusResponseSchema.safeParse(await this.request(seedUrl, statusUrl, { method: 'GET' }))
    if (!parsed.success) {
      throw new FetchError(seedUrl, `Unexpected crawl status response: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
    }
    return parsed.data
  }

  private toRawPage(page: CrawledPage, seedUrl: string, fetchedAt: Date): RawPage {
    return {
      url: page.metadata?.sourceURL ?? page.metadata?.url ?? seedUrl,
      // Assigned by the pipeline, which knows the competitor
      competitorId: '',
      html: page.html ?? '',
      markdown: page.markdown ?? '',
      fetchedAt,
    }
  }

  /**
   * One authenticated JSON request. Transport errors, timeouts and non-2xx
   * statuses become FetchError for `seedUrl`.
   */
  private async request(seedUrl: string, endpoint: string, init: { method: 'GET' | 'POST'; body?: string }): Promise<unknown> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs)

    try {
      const response = await fetch(endpoint, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal: controller.signal,
      })

      if (!response.ok) {
        const detail = await response.text().catch(() => '')
        throw new FetchError(seedUrl, `HTTP ${response.status}: ${detail.slice(0, 200) || response.statusText}`, {
          statusCode: response.status,
        })
      }

      return await response.json()
    } catch (error) {
      if (error instanceof FetchError) {
        throw error
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new FetchError(seedUrl, `Request timed out after ${this.requestTimeoutMs}ms`, { cause: error })
      }
      throw new FetchError(seedUrl, `Request failed: ${errorMessageOf(error)}`, { cause: error })
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
