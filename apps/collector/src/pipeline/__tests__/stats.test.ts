import { describe, expect, it } from 'vitest'
import { RunStatsCollector } from '../stats.js'
import type { ProductCandidate } from '../types.js'

const startedAt = new Date('2025-03-01T12:00:00Z')

function candidate(needsVerification: boolean): ProductCandidate {
  return {
    kind: 'product',
    competitorId: 'west-elm',
    competitorName: 'West Elm',
    sourceUrl: 'https://www.westelm.com/new',
    confidence: needsVerification ? 0.4 : 0.9,
    needsVerification,
    fields: { product_name: 'Sofa' },
  }
}

describe('RunStatsCollector', () => {
  it('tallies page, extraction and normalization events', () => {
    const stats = new RunStatsCollector(startedAt)

    stats.seedAttempted()
    stats.pagesFetched(3)
    stats.pageClassified({
      label: 'product',
      tier: 'ambiguous',
      scores: { product: 1, promotion: 1, other: 0 },
      escalated: true,
      fallback: false,
    })
    stats.pageClassified({
      label: 'other',
      tier: 'ambiguous',
      scores: { product: 0, promotion: 0, other: 0 },
      escalated: true,
      fallback: true,
    })
    stats.extractionSucceeded([candidate(false), candidate(true)], 1)
    stats.extractionFailed({
      competitorId: 'west-elm',
      url: 'https://www.westelm.com/p/x',
      stage: 'extract',
      code: 'EXTRACTION_FAILED',
      message: 'failed after 3 attempts',
    })
    stats.candidateRejected({
      competitorId: 'west-elm',
      sourceUrl: null,
      kind: 'product',
      reason: 'invalid-url',
      field: 'product_url',
      detail: 'relative URL without page context',
    })
    stats.normalizeWarnings([
      { kind: 'unparseable-price', field: 'price' },
      { kind: 'unparseable-price', field: 'original_price' },
    ])
    stats.duplicatesCollapsed('products', 2)

    const snapshot = stats.snapshot()
    expect(snapshot.seedUrlsAttempted).toBe(1)
    expect(snapshot.pagesFetched).toBe(3)
    expect(snapshot.pagesByLabel).toEqual({ product: 1, promotion: 0, other: 1 })
    expect(snapshot.classificationEscalations).toBe(2)
    expect(snapshot.classificationFallbacks).toBe(1)
    expect(snapshot.pagesExtracted).toBe(2)
    expect(snapshot.candidatesExtracted).toBe(2)
    expect(snapshot.lowConfidenceCandidates).toBe(1)
    expect(snapshot.detailPageExtrasDiscarded).toBe(1)
    expect(snapshot.extractionFailures).toBe(1)
    expect(snapshot.pageFailures).toBe(1)
    expect(snapshot.candidatesRejected['invalid-url']).toBe(1)
    expect(snapshot.normalizeWarnings['unparseable-price']).toBe(2)
    expect(snapshot.duplicatesCollapsed).toEqual({ products: 2, promotions: 0 })
    expect(snapshot.failures).toHaveLength(1)
    expect(snapshot.rejections).toHaveLength(1)
  })

  it('ignores increments after sealing', () => {
    const stats = new RunStatsCollector(startedAt)
    stats.pagesFetched(2)

    const sealed = stats.seal({
      finishedAt: new Date('2025-03-01T12:00:05Z'),
      products: 4,
      promotions: 1,
      deadlineExceeded: true,
      pagesAbandoned: 3,
    })
    stats.pagesFetched(10)
    stats.extractionFailed({
      competitorId: 'west-elm',
      url: 'https://www.westelm.com/p/late',
      stage: 'extract',
      code: 'EXTRACTION_FAILED',
      message: 'late',
    })

    expect(stats.isSealed()).toBe(true)
    expect(sealed.durationMs).toBe(5000)
    expect(sealed.finishedAt).toBe('2025-03-01T12:00:05.000Z')
    expect(sealed.finalRecords).toEqual({ products: 4, promotions: 1 })
    expect(sealed.deadlineExceeded).toBe(true)
    expect(sealed.pagesAbandoned).toBe(3)
    expect(stats.snapshot().pagesFetched).toBe(2)
    expect(stats.snapshot().extractionFailures).toBe(0)
  })

  it('returns independent snapshots', () => {
    const stats = new RunStatsCollector(startedAt)
    const snapshot = stats.snapshot()
    snapshot.pagesFetched = 99

    expect(stats.snapshot().pagesFetched).toBe(0)
  })
})
