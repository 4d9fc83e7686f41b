/**
 * Price parsing.
 *
 * Accepts values such as "$1,899.00", "1899", "USD 49.99", "€ 12.50".
 * Anything else (ranges, "Call for price", European decimal commas) is
 * unparseable.
 */

/** Prices above this are treated as extraction noise. */
export const MAX_PLAUSIBLE_PRICE = 100_000

const CURRENCY_SYMBOLS = /\p{Sc}/gu
const CURRENCY_CODES = /(?:USD|CAD|AUD|NZD|EUR|GBP)/gi
const WHITESPACE = /\s+/g

const GROUPED_AMOUNT = /^\d{1,3}(?:,\d{3})*(?:\.\d+)?$/
const PLAIN_AMOUNT = /^\d+(?:\.\d+)?$/

export type PriceParseResult =
  | { ok: true; value: number }
  | { ok: false; reason: 'unparseable' | 'implausible' }

/**
 * Round to cents.
 */
export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100
}

function checkRange(value: number): PriceParseResult {
  if (!Number.isFinite(value) || value < 0) {
    return { ok: false, reason: 'unparseable' }
  }
  const rounded = roundToCents(value)
  if (rounded > MAX_PLAUSIBLE_PRICE) {
    return { ok: false, reason: 'implausible' }
  }
  return { ok: true, value: rounded }
}

/**
 * Parse a raw price into a non-negative decimal rounded to cents.
 */
export function parsePrice(raw: string | number): PriceParseResult {
  if (typeof raw === 'number') {
    return checkRange(raw)
  }

  const stripped = raw.replace(CURRENCY_SYMBOLS, '').replace(CURRENCY_CODES, '').replace(WHITESPACE, '')

  if (!GROUPED_AMOUNT.test(stripped) && !PLAIN_AMOUNT.test(stripped)) {
    return { ok: false, reason: 'unparseable' }
  }

  return checkRange(Number(stripped.replace(/,/g, '')))
}
