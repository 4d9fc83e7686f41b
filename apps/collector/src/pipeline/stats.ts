/**
 * Run stats accumulator.
 *
 * The only mutable state shared between page tasks. Once sealed, further
 * increments (from tasks abandoned at the deadline) are ignored.
 */

import type {
  CandidateRecord,
  Classification,
  NormalizeWarning,
  PageFailure,
  RejectedCandidate,
  RunStats,
} from './types.js'

export function createEmptyStats(startedAt: Date): RunStats {
  return {
    startedAt: startedAt.toISOString(),
    finishedAt: null,
    durationMs: 0,

    seedUrlsAttempted: 0,
    pagesFetched: 0,
    fetchFailures: 0,
    duplicatePagesSkipped: 0,
    pagesExcluded: 0,
    pagesByLabel: { product: 0, promotion: 0, other: 0 },
    classificationEscalations: 0,
    classificationFallbacks: 0,

    pagesExtracted: 0,
    candidatesExtracted: 0,
    lowConfidenceCandidates: 0,
    extractionFailures: 0,
    detailPageExtrasDiscarded: 0,

    candidatesRejected: { 'missing-required-field': 0, 'invalid-url': 0, 'malformed-schema': 0 },
    normalizeWarnings: {
      'unparseable-price': 0,
      'unparseable-date': 0,
      'invalid-image-url': 0,
      'inverted-date-range': 0,
      'implausible-discount': 0,
    },

    duplicatesCollapsed: { products: 0, promotions: 0 },
    finalRecords: { products: 0, promotions: 0 },

    pageFailures: 0,
    pagesAbandoned: 0,
    deadlineExceeded: false,

    failures: [],
    rejections: [],
  }
}

export interface SealInput {
  finishedAt: Date
  products: number
  promotions: number
  deadlineExceeded: boolean
  pagesAbandoned: number
}

export class RunStatsCollector {
  private readonly stats: RunStats
  private readonly startedAt: Date
  private sealed = false

  constructor(startedAt: Date) {
    this.startedAt = startedAt
    this.stats = createEmptyStats(startedAt)
  }

  isSealed(): boolean {
    return this.sealed
  }

  private update(apply: (stats: RunStats) => void): void {
    if (!this.sealed) {
      apply(this.stats)
    }
  }

  seedAttempted(): void {
    this.update((s) => {
      s.seedUrlsAttempted++
    })
  }

  pagesFetched(count: number): void {
    this.update((s) => {
      s.pagesFetched += count
    })
  }

  fetchFailed(failure: PageFailure): void {
    this.update((s) => {
      s.fetchFailures++
      s.failures.push(failure)
    })
  }

  duplicatePageSkipped(): void {
    this.update((s) => {
      s.duplicatePagesSkipped++
    })
  }

  pageExcluded(): void {
    this.update((s) => {
      s.pagesExcluded++
    })
  }

  pageClassified(classification: Classification): void {
    this.update((s) => {
      s.pagesByLabel[classification.label]++
      if (classification.escalated) s.classificationEscalations++
      if (classification.fallback) s.classificationFallbacks++
    })
  }

  extractionSucceeded(candidates: readonly CandidateRecord[], extrasDiscarded: number): void {
    this.update((s) => {
      s.pagesExtracted++
      s.candidatesExtracted += candidates.length
      s.lowConfidenceCandidates += candidates.filter((c) => c.needsVerification).length
      s.detailPageExtrasDiscarded += extrasDiscarded
    })
  }

  extractionFailed(failure: PageFailure): void {
    this.update((s) => {
      s.pagesExtracted++
      s.extractionFailures++
      s.pageFailures++
      s.failures.push(failure)
    })
  }

  /** A page task failed outside the expected fetch/extract paths. */
  pageFailed(failure: PageFailure): void {
    this.update((s) => {
      s.pageFailures++
      s.failures.push(failure)
    })
  }

  candidateRejected(rejection: RejectedCandidate): void {
    this.update((s) => {
      s.candidatesRejected[rejection.reason]++
      s.rejections.push(rejection)
    })
  }

  normalizeWarnings(warnings: readonly NormalizeWarning[]): void {
    this.update((s) => {
      for (const warning of warnings) {
        s.normalizeWarnings[warning.kind]++
      }
    })
  }

  duplicatesCollapsed(kind: 'products' | 'promotions', count: number): void {
    this.update((s) => {
      s.duplicatesCollapsed[kind] += count
    })
  }

  /**
   * Finalize the run and return an independent copy of the stats.
   */
  seal(input: SealInput): RunStats {
    this.update((s) => {
      s.finishedAt = input.finishedAt.toISOString()
      s.durationMs = Math.max(0, input.finishedAt.getTime() - this.startedAt.getTime())
      s.finalRecords = { products: input.products, promotions: input.promotions }
      s.deadlineExceeded = input.deadlineExceeded
      s.pagesAbandoned = input.pagesAbandoned
    })
    this.sealed = true
    return this.snapshot()
  }

  snapshot(): RunStats {
    return structuredClone(this.stats)
  }
}
