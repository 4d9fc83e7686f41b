import type { Settings } from '../../config/settings.js'
import { AnthropicExtractionService } from '../../pipeline/extract/anthropic-service.js'
import { FirecrawlFetcher } from '../../pipeline/fetch/firecrawl-fetcher.js'
import type { ExtractionService, PageFetcher } from '../../pipeline/types.js'

/** Builds the external collaborators; replaced in tests. */
export interface ServiceFactories {
  createFetcher(settings: Settings): PageFetcher
  createExtractionService(settings: Settings): ExtractionService
}

export const defaultServiceFactories: ServiceFactories = {
  createFetcher: (settings) =>
    new FirecrawlFetcher({
      apiKey: settings.firecrawl.apiKey,
      baseUrl: settings.firecrawl.baseUrl,
      timeoutMs: settings.firecrawl.timeoutMs,
      pollIntervalMs: settings.firecrawl.pollIntervalMs,
    }),
  createExtractionService: (settings) =>
    new AnthropicExtractionService({
      apiKey: settings.anthropic.apiKey,
      model: settings.anthropic.model,
      maxTokens: settings.anthropic.maxTokens,
      timeoutMs: settings.anthropic.timeoutMs,
    }),
}
