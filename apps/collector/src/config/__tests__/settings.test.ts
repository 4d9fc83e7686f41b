import { describe, expect, it } from 'vitest'
import { loadSettings, pipelineOptionsFromSettings } from '../settings.js'
import { ConfigError } from '../../pipeline/errors.js'

const baseEnv = {
  ANTHROPIC_API_KEY: 'test-secret',
  FIRECRAWL_API_KEY: 'test-secret',
}

describe('loadSettings', () => {
  it('applies defaults when only the keys are set', () => {
    const settings = loadSettings(baseEnv)

    expect(settings.anthropic).toEqual({
      apiKey: 'test-secret',
      model: 'claude-3-5-sonnet-latest',
      maxTokens: 4096,
      timeoutMs: 30_000,
    })
    expect(settings.firecrawl.baseUrl).toBe('https://api.firecrawl.dev')
    expect(settings.confidenceThreshold).toBe(0.7)
    expect(settings.extractionMaxRetries).toBe(2)
    expect(settings.pipelineTimeoutMinutes).toBe(80)
    expect(settings.competitorsConfigPath).toBe('config/competitors.json')
  })

  it('coerces numeric variables and trims the base URL', () => {
    const settings = loadSettings({
      ...baseEnv,
      CONFIDENCE_THRESHOLD: '0.55',
      PAGE_CONCURRENCY: '8',
      FIRECRAWL_BASE_URL: 'http://localhost:3002/',
    })

    expect(settings.confidenceThreshold).toBe(0.55)
    expect(settings.pageConcurrency).toBe(8)
    expect(settings.firecrawl.baseUrl).toBe('http://localhost:3002')
  })

  it('treats blank values as unset', () => {
    expect(loadSettings({ ...baseEnv, ANTHROPIC_MODEL: '' }).anthropic.model).toBe('claude-3-5-sonnet-latest')
  })

  it('rejects missing and placeholder keys', () => {
    let caught: unknown
    try {
      loadSettings({ FIRECRAWL_API_KEY: 'your-firecrawl-api-key' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigError)
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe('CONFIG_INVALID')
      expect(caught.issues).toEqual([
        'ANTHROPIC_API_KEY is required',
        'FIRECRAWL_API_KEY is still a placeholder value',
      ])
    }
  })

  it('rejects out-of-range values', () => {
    expect(() => loadSettings({ ...baseEnv, CONFIDENCE_THRESHOLD: '1.5' })).toThrow(ConfigError)
    expect(() => loadSettings({ ...baseEnv, EXTRACTION_MAX_IN_FLIGHT: '0' })).toThrow(ConfigError)
  })
})

describe('pipelineOptionsFromSettings', () => {
  it('maps settings and lets the timeout be overridden', () => {
    const settings = loadSettings({ ...baseEnv, EXTRACTION_MAX_RETRIES: '4', EXTRACTION_MIN_SPACING_MS: '250' })

    const options = pipelineOptionsFromSettings(settings, { timeoutMinutes: 5 })

    expect(options.deadlineMs).toBe(300_000)
    expect(options.retryPolicy?.maxRetries).toBe(4)
    expect(options.rateLimit).toEqual({ maxInFlight: 2, minSpacingMs: 250 })
    expect(pipelineOptionsFromSettings(settings).deadlineMs).toBe(80 * 60_000)
  })
})
