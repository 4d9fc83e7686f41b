/**
 * Runtime settings, validated from the environment.
 */

import { z } from 'zod'
import { ConfigError } from '../pipeline/errors.js'
import type { PipelineOptions } from '../pipeline/types.js'

const PLACEHOLDER_PATTERNS = [/^your[-_ ]/i, /^<.*>$/, /^x{3,}$/i, /^changeme$/i, /^placeholder$/i]

function isPlaceholder(value: string): boolean {
  return PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(value.trim()))
}

const apiKey = z
  .string({ required_error: 'is required' })
  .trim()
  .min(1, 'is required')
  .refine((value) => !isPlaceholder(value), 'is still a placeholder value')

const int = (min: number, max: number, fallback: number) => z.coerce.number().int().min(min).max(max).default(fallback)

const envSchema = z.object({
  ANTHROPIC_API_KEY: apiKey,
  ANTHROPIC_MODEL: z.string().trim().min(1).default('claude-3-5-sonnet-latest'),
  ANTHROPIC_MAX_TOKENS: int(256, 8192, 4096),
  EXTRACTION_TIMEOUT_SECONDS: int(5, 300, 30),

  FIRECRAWL_API_KEY: apiKey,
  FIRECRAWL_BASE_URL: z.string().trim().url().default('https://api.firecrawl.dev'),
  FIRECRAWL_TIMEOUT_SECONDS: int(10, 1800, 300),
  FIRECRAWL_POLL_INTERVAL_MS: int(250, 60_000, 2000),

  COMPETITORS_CONFIG_PATH: z.string().trim().min(1).default('config/competitors.json'),
  EXPORTS_DIR: z.string().trim().min(1).default('exports'),

  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  EXTRACTION_MAX_RETRIES: int(0, 10, 2),
  EXTRACTION_MAX_IN_FLIGHT: int(1, 20, 2),
  EXTRACTION_MIN_SPACING_MS: int(0, 60_000, 1000),
  COMPETITOR_CONCURRENCY: int(1, 10, 2),
  PAGE_CONCURRENCY: int(1, 32, 4),
  PIPELINE_TIMEOUT_MINUTES: int(1, 240, 80),
  MAX_CONTENT_CHARS: int(1000, 100_000, 12_000),
})

export interface Settings {
  anthropic: {
    apiKey: string
    model: string
    maxTokens: number
    timeoutMs: number
  }
  firecrawl: {
    apiKey: string
    baseUrl: string
    timeoutMs: number
    pollIntervalMs: number
  }
  competitorsConfigPath: string
  exportsDir: string
  confidenceThreshold: number
  extractionMaxRetries: number
  extractionMaxInFlight: number
  extractionMinSpacingMs: number
  competitorConcurrency: number
  pageConcurrency: number
  pipelineTimeoutMinutes: number
  maxContentChars: number
}

/**
 * Validate the environment into typed settings.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // Blank values count as unset so defaults apply
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))
  const parsed = envSchema.safeParse(present)

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`)
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues)
  }

  const e = parsed.data
  return {
    anthropic: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.ANTHROPIC_MODEL,
      maxTokens: e.ANTHROPIC_MAX_TOKENS,
      timeoutMs: e.EXTRACTION_TIMEOUT_SECONDS * 1000,
    },
    firecrawl: {
      apiKey: e.FIRECRAWL_API_KEY,
      baseUrl: e.FIRECRAWL_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: e.FIRECRAWL_TIMEOUT_SECONDS * 1000,
      pollIntervalMs: e.FIRECRAWL_POLL_INTERVAL_MS,
    },
    competitorsConfigPath: e.COMPETITORS_CONFIG_PATH,
    exportsDir: e.EXPORTS_DIR,
    confidenceThreshold: e.CONFIDENCE_THRESHOLD,
    extractionMaxRetries: e.EXTRACTION_MAX_RETRIES,
    extractionMaxInFlight: e.EXTRACTION_MAX_IN_FLIGHT,
    extractionMinSpacingMs: e.EXTRACTION_MIN_SPACING_MS,
    competitorConcurrency: e.COMPETITOR_CONCURRENCY,
    pageConcurrency: e.PAGE_CONCURRENCY,
    pipelineTimeoutMinutes: e.PIPELINE_TIMEOUT_MINUTES,
    maxContentChars: e.MAX_CONTENT_CHARS,
  }
}

/**
 * Orchestrator options from settings. The deadline may be overridden per run.
 */
export function pipelineOptionsFromSettings(
  settings: Settings,
  overrides: { timeoutMinutes?: number } = {}
): Partial<PipelineOptions> {
  const timeoutMinutes = overrides.timeoutMinutes ?? settings.pipelineTimeoutMinutes
  return {
    confidenceThreshold: settings.confidenceThreshold,
    retryPolicy: {
      maxRetries: settings.extractionMaxRetries,
      initialDelayMs: 500,
      maxDelayMs: 8000,
      backoffMultiplier: 2,
    },
    rateLimit: {
      maxInFlight: settings.extractionMaxInFlight,
      minSpacingMs: settings.extractionMinSpacingMs,
    },
    competitorConcurrency: settings.competitorConcurrency,
    pageConcurrency: settings.pageConcurrency,
    maxContentChars: settings.maxContentChars,
    deadlineMs: timeoutMinutes * 60_000,
  }
}
