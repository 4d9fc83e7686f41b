/**
 * Deterministic page-label heuristics.
 *
 * Scores come from three signals: URL path segments, price-like and
 * discount-like tokens in the visible text, and the seed list the page was
 * crawled from. `decideLabel` turns the scores into a label plus a
 * confidence tier.
 */

import { PAGE_LABELS } from '../types.js'
import type { ConfidenceTier, LabelScores, PageLabel, RawPage } from '../types.js'
import { urlPath } from '../utils/url.js'
import { pageText } from '../utils/text.js'

const PATH_WEIGHT = 3
const SEED_WEIGHT = 1
const MAX_TOKEN_POINTS = 3

/** Lead over the runner-up needed for a decisive label */
export const DECISIVE_MARGIN = 2

const PATH_SEGMENTS: Record<PageLabel, ReadonlySet<string>> = {
  product: new Set(['product', 'products', 'p', 'pdp', 'dp', 'item', 'new', 'new-arrivals', 'whats-new']),
  promotion: new Set(['sale', 'sales', 'promo', 'promos', 'promotions', 'deals', 'offers', 'clearance', 'coupons']),
  other: new Set(['cart', 'account', 'login', 'help', 'about', 'careers', 'stores', 'blog']),
}

const PRICE_TOKEN = /[$€£]\s?\d{1,3}(?:,\d{3})*(?:\.\d{2})?/g

const DISCOUNT_TOKENS = [
  /\b\d{1,2}\s?%\s?off\b/gi,
  /\bsave\s+(?:up\s+to\s+)?[$€£]?\d+/gi,
  /\bpromo(?:tion)?\s+code\b/gi,
  /\bbogo\b|\bbuy\s+one,?\s+get\s+one\b/gi,
  /\bfree\s+shipping\b/gi,
  /\bclearance\b/gi,
]

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0
}

export function scorePage(page: RawPage): LabelScores {
  const scores: LabelScores = { product: 0, promotion: 0, other: 0 }

  const segments = urlPath(page.url).split('/').filter(Boolean)
  for (const label of PAGE_LABELS) {
    if (segments.some((segment) => PATH_SEGMENTS[label].has(segment))) {
      scores[label] += PATH_WEIGHT
    }
  }

  const text = pageText(page)
  scores.product += Math.min(countMatches(text, PRICE_TOKEN), MAX_TOKEN_POINTS)

  const discounts = DISCOUNT_TOKENS.reduce((sum, pattern) => sum + countMatches(text, pattern), 0)
  scores.promotion += Math.min(discounts, MAX_TOKEN_POINTS)

  if (page.seedKind) {
    scores[page.seedKind] += SEED_WEIGHT
  }

  return scores
}

/**
 * Pick the highest-scoring label. Ties resolve in PAGE_LABELS order.
 */
export function decideLabel(scores: LabelScores): { label: PageLabel; tier: ConfidenceTier } {
  const ranked = [...PAGE_LABELS].sort((a, b) => scores[b] - scores[a])
  const [top, runnerUp] = ranked
  const lead = scores[top] - scores[runnerUp]

  if (scores[top] > 0 && lead >= DECISIVE_MARGIN) {
    return { label: top, tier: 'decisive' }
  }
  return { label: top, tier: 'ambiguous' }
}
