import { vi } from 'vitest'
import type { ILogger } from '@shelfwatch/logger'
import type { ExtractionService, PageFetcher, PromptSchemaId, RawPage, RetryPolicy } from '../../types.js'

export const NO_DELAY_RETRY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 1,
}

export const UNLIMITED_RATE = { maxInFlight: 100, minSpacingMs: 0 }

export function makePage(url: string, overrides: Partial<RawPage> = {}): RawPage {
  return {
    url,
    competitorId: 'west-elm',
    html: '',
    markdown: '',
    fetchedAt: new Date('2025-03-01T12:00:00Z'),
    ...overrides,
  }
}

export function silentLogger(): ILogger {
  const log: ILogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => log,
  }
  return log
}

type Reply = unknown | Error

/**
 * Extraction service stub: replies are consumed per schema, in order.
 * The last reply for a schema repeats once the queue runs dry.
 */
export class ScriptedExtractionService implements ExtractionService {
  readonly calls: Array<{ schema: PromptSchemaId; content: string }> = []
  healthy = true
  private readonly replies = new Map<PromptSchemaId, Reply[]>()

  constructor(script: Partial<Record<PromptSchemaId, Reply[]>> = {}) {
    for (const [schema, replies] of Object.entries(script)) {
      if (schema === 'product' || schema === 'promotion' || schema === 'page-label') {
        this.replies.set(schema, [...(replies ?? [])])
      }
    }
  }

  /** Reply chosen from the content instead of the queue */
  respondWith?: (schema: PromptSchemaId, content: string) => unknown

  async infer(schema: PromptSchemaId, content: string): Promise<unknown> {
    this.calls.push({ schema, content })
    if (this.respondWith) {
      const reply = this.respondWith(schema, content)
      if (reply instanceof Error) throw reply
      return reply
    }
    const queue = this.replies.get(schema) ?? []
    const reply = queue.length > 1 ? queue.shift() : queue[0]
    if (reply instanceof Error) {
      throw reply
    }
    if (reply === undefined) {
      throw new Error(`no scripted reply for ${schema}`)
    }
    return reply
  }

  async healthCheck(): Promise<void> {
    if (!this.healthy) {
      throw new Error('service unreachable')
    }
  }

  callsFor(schema: PromptSchemaId): number {
    return this.calls.filter((call) => call.schema === schema).length
  }
}

/**
 * Page fetcher stub keyed by seed URL. An Error value is thrown for that seed.
 */
export class StubFetcher implements PageFetcher {
  healthy = true
  readonly calls: string[] = []

  constructor(private readonly results: Record<string, RawPage[] | Error>) {}

  async fetch(url: string): Promise<RawPage[]> {
    this.calls.push(url)
    const result = this.results[url]
    if (result instanceof Error) throw result
    return result ?? []
  }

  async healthCheck(): Promise<void> {
    if (!this.healthy) throw new Error('fetcher unreachable')
  }
}
