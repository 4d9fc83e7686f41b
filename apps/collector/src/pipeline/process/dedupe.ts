/**
 * Record Deduplication
 *
 * Groups records by uniqueness key and keeps one member per group: the
 * minimum of a total order.
 *
 * (a) more non-empty optional fields first
 * (b) then more numeric price/date fields
 * (c) then earliest position in the input
 *
 * Survivors are never merged, and appear in order of each key's first
 * occurrence.
 */

import type { ProductRecord, PromotionRecord } from '../types.js'

export interface DedupeRank {
  /** Non-empty optional fields */
  optionalFields: number
  /** Numeric price and date fields present */
  numericFields: number
}

export interface DedupeResult<T> {
  records: T[]
  /** Input records dropped as duplicates */
  collapsed: number
}

/**
 * True when `a` should be kept over `b`, both being in the same group.
 */
function outranks(a: DedupeRank, aIndex: number, b: DedupeRank, bIndex: number): boolean {
  if (a.optionalFields !== b.optionalFields) return a.optionalFields > b.optionalFields
  if (a.numericFields !== b.numericFields) return a.numericFields > b.numericFields
  return aIndex < bIndex
}

export function dedupe<T>(records: readonly T[], keyOf: (record: T) => string, rank: (record: T) => DedupeRank): DedupeResult<T> {
  const groups = new Map<string, { record: T; rank: DedupeRank; index: number }>()

  records.forEach((record, index) => {
    const key = keyOf(record)
    const candidate = { record, rank: rank(record), index }
    const current = groups.get(key)
    if (!current || outranks(candidate.rank, candidate.index, current.rank, current.index)) {
      groups.set(key, candidate)
    }
  })

  // Map iteration follows first insertion of each key
  return {
    records: [...groups.values()].map((entry) => entry.record),
    collapsed: records.length - groups.size,
  }
}

function present(values: readonly unknown[]): number {
  return values.filter((value) => value !== undefined && value !== '').length
}

export function productKey(record: ProductRecord): string {
  return JSON.stringify([record.competitor, record.productUrl])
}

export function promotionKey(record: PromotionRecord): string {
  return JSON.stringify([record.competitor, record.promoUrl, record.promoTitle])
}

export function rankProduct(record: ProductRecord): DedupeRank {
  return {
    optionalFields: present([
      record.brand,
      record.category,
      record.price,
      record.originalPrice,
      record.launchDate,
      record.imageUrl,
      record.sku,
    ]),
    numericFields: present([record.price, record.originalPrice, record.launchDate]),
  }
}

export function rankPromotion(record: PromotionRecord): DedupeRank {
  return {
    optionalFields: present([
      record.promoCode,
      record.discountValue,
      record.startDate,
      record.endDate,
      record.applicableProducts,
      record.imageUrl,
      record.description,
    ]),
    numericFields: present([record.discountValue, record.startDate, record.endDate]),
  }
}

export function dedupeProducts(records: readonly ProductRecord[]): DedupeResult<ProductRecord> {
  return dedupe(records, productKey, rankProduct)
}

export function dedupePromotions(records: readonly PromotionRecord[]): DedupeResult<PromotionRecord> {
  return dedupe(records, promotionKey, rankPromotion)
}
