/**
 * Candidate Normalizer
 *
 * Validates and cleans one candidate into a final record. Rules, in order:
 *
 * 1. Text: control characters stripped, whitespace collapsed, trimmed
 * 2. Prices: currency symbols/codes and separators stripped, cents
 * 3. Dates: several notations in, YYYY-MM-DD out
 * 4. URLs: resolved against the source page, canonicalized
 * 5. Required fields: name/title and canonical URL must be present
 *
 * Every rule is idempotent. Optional values that cannot be kept become
 * absent with a warning; required ones reject the candidate.
 */

import type {
  CandidateRecord,
  NormalizeResult,
  NormalizeWarning,
  NormalizeWarningKind,
  ProductCandidate,
  ProductRecord,
  PromoType,
  PromotionCandidate,
  PromotionRecord,
  PromotionStatus,
  RawProductFields,
  RawPromotionFields,
  RawValue,
  RejectionReason,
} from '../types.js'
import { calendarDay, parseIsoDate } from '../utils/date.js'
import { parsePrice } from '../utils/price.js'
import { cleanText, slugify } from '../utils/text.js'
import { resolveHttpUrl } from '../utils/url.js'

export interface NormalizeContext {
  /** Acceptance time; becomes collectedAt and anchors promotion status */
  collectedAt: Date
}

type Draft<T> = { -readonly [K in keyof T]: T[K] }

type Rejection = Extract<NormalizeResult, { status: 'rejected' }>

function reject(reason: RejectionReason, field: string, detail: string): Rejection {
  return { status: 'rejected', reason, field, detail }
}

/** Name of the first field carrying a boolean, or null. */
function firstBooleanField(fields: Record<string, RawValue | undefined>): string | null {
  for (const [field, value] of Object.entries(fields)) {
    if (typeof value === 'boolean') return field
  }
  return null
}

class FieldReader {
  readonly warnings: NormalizeWarning[] = []

  constructor(private readonly sourceUrl: string | null) {}

  private warn(kind: NormalizeWarningKind, field: string): void {
    this.warnings.push({ kind, field })
  }

  text(value: RawValue | undefined): string | undefined {
    if (value === undefined || value === null || typeof value === 'boolean') {
      return undefined
    }
    const cleaned = cleanText(String(value))
    return cleaned === '' ? undefined : cleaned
  }

  price(field: string, value: RawValue | undefined, stripPercent = false): number | undefined {
    if (typeof value === 'number') {
      const parsed = parsePrice(value)
      if (parsed.ok) return parsed.value
      this.warn('unparseable-price', field)
      return undefined
    }
    let cleaned = this.text(value)
    if (cleaned === undefined) return undefined
    if (stripPercent) {
      cleaned = cleaned.replace(/%/g, '').replace(/\boff\b/gi, '')
    }
    const parsed = parsePrice(cleaned)
    if (parsed.ok) return parsed.value
    this.warn('unparseable-price', field)
    return undefined
  }

  date(field: string, value: RawValue | undefined): string | undefined {
    const cleaned = this.text(value)
    if (cleaned === undefined) return undefined
    const parsed = parseIsoDate(cleaned)
    if (parsed === null) {
      this.warn('unparseable-date', field)
      return undefined
    }
    return parsed
  }

  imageUrl(field: string, value: RawValue | undefined): string | undefined {
    const cleaned = this.text(value)
    if (cleaned === undefined) return undefined
    const resolved = resolveHttpUrl(cleaned, this.sourceUrl)
    if (resolved === null) {
      this.warn('invalid-image-url', field)
      return undefined
    }
    return resolved
  }

  /**
   * Canonical URL field.
   * undefined when absent, null when present but unresolvable.
   */
  canonicalUrl(value: RawValue | undefined): string | null | undefined {
    const cleaned = this.text(value)
    if (cleaned === undefined) return undefined
    return resolveHttpUrl(cleaned, this.sourceUrl)
  }

  flag(kind: NormalizeWarningKind, field: string): void {
    this.warn(kind, field)
  }
}

/**
 * Map a free-text promotion type to the enumerated set.
 */
export function mapPromoType(raw: string): PromoType {
  const value = raw.toLowerCase()
  if (/\bbogo\b|buy[\s-]+one|b1g1/.test(value)) return 'bogo'
  if (/free[\s_-]*ship/.test(value)) return 'free-shipping'
  if (/percent|%/.test(value)) return 'percent-off'
  if (/amount|dollar|[$€£]/.test(value)) return 'amount-off'
  return 'other'
}

export function promotionStatus(
  startDate: string | undefined,
  endDate: string | undefined,
  collectedAt: Date
): PromotionStatus {
  const today = calendarDay(collectedAt)
  if (endDate !== undefined && endDate < today) return 'expired'
  if (startDate !== undefined && startDate > today) return 'upcoming'
  if (startDate !== undefined || endDate !== undefined) return 'active'
  return 'unknown'
}

function urlRejection(field: string, raw: RawValue | undefined, sourceUrl: string | null): Rejection {
  const detail =
    sourceUrl === null
      ? `"${String(raw)}" is not an absolute http(s) URL and there is no page to resolve it against`
      : `"${String(raw)}" does not resolve to an http(s) URL`
  return reject('invalid-url', field, detail)
}

export function normalizeProduct(
  candidate: ProductCandidate,
  context: NormalizeContext
): NormalizeResult<ProductRecord> {
  const fields: RawProductFields = candidate.fields
  const malformed = firstBooleanField({ ...fields })
  if (malformed !== null) {
    return reject('malformed-schema', malformed, `boolean value in ${malformed}`)
  }

  const read = new FieldReader(candidate.sourceUrl)

  // Rule 1
  const productName = read.text(fields.product_name)
  const brand = read.text(fields.brand) ?? read.text(candidate.competitorName)
  const category = read.text(fields.category)
  const sku = read.text(fields.sku)

  // Rule 2
  const price = read.price('price', fields.price)
  const originalPrice = read.price('original_price', fields.original_price)

  // Rule 3
  const launchDate = read.date('launch_date', fields.launch_date)

  // Rule 4
  const productUrl = read.canonicalUrl(fields.product_url)
  if (productUrl === null) {
    return urlRejection('product_url', fields.product_url, candidate.sourceUrl)
  }
  const imageUrl = read.imageUrl('image_url', fields.image_url)

  // Rule 5
  if (productName === undefined) {
    return reject('missing-required-field', 'product_name', 'product_name is empty after cleaning')
  }
  if (productUrl === undefined) {
    return reject('missing-required-field', 'product_url', 'product_url is missing')
  }

  const record: Draft<ProductRecord> = {
    competitor: cleanText(candidate.competitorName),
    productName,
    productUrl,
    sourceUrl: candidate.sourceUrl,
    confidence: candidate.confidence,
    needsVerification: candidate.needsVerification,
    collectedAt: context.collectedAt.toISOString(),
  }
  if (brand !== undefined) record.brand = brand
  if (category !== undefined) record.category = category
  if (price !== undefined) record.price = price
  if (originalPrice !== undefined) record.originalPrice = originalPrice
  if (launchDate !== undefined) record.launchDate = launchDate
  if (imageUrl !== undefined) record.imageUrl = imageUrl
  if (sku !== undefined) record.sku = sku

  return { status: 'accepted', record: Object.freeze(record), warnings: read.warnings }
}

export function normalizePromotion(
  candidate: PromotionCandidate,
  context: NormalizeContext
): NormalizeResult<PromotionRecord> {
  const fields: RawPromotionFields = candidate.fields
  const malformed = firstBooleanField({ ...fields })
  if (malformed !== null) {
    return reject('malformed-schema', malformed, `boolean value in ${malformed}`)
  }

  const read = new FieldReader(candidate.sourceUrl)

  // Rule 1
  const promoTitle = read.text(fields.promo_title)
  const rawType = read.text(fields.promo_type)
  const promoType = mapPromoType(rawType ?? promoTitle ?? '')
  const promoCode = read.text(fields.promo_code)
  const applicableProducts = read.text(fields.applicable_products)
  const description = read.text(fields.description)

  // Rule 2
  let discountValue = read.price('discount_value', fields.discount_value, true)
  if (discountValue !== undefined && promoType === 'percent-off' && discountValue > 100) {
    read.flag('implausible-discount', 'discount_value')
    discountValue = undefined
  }

  // Rule 3
  let startDate = read.date('start_date', fields.start_date)
  let endDate = read.date('end_date', fields.end_date)
  if (startDate !== undefined && endDate !== undefined && startDate > endDate) {
    read.flag('inverted-date-range', 'start_date')
    startDate = undefined
    endDate = undefined
  }

  // Rule 4
  const promoUrl = read.canonicalUrl(fields.promo_url)
  if (promoUrl === null) {
    return urlRejection('promo_url', fields.promo_url, candidate.sourceUrl)
  }
  const imageUrl = read.imageUrl('image_url', fields.image_url)

  // Rule 5
  if (promoTitle === undefined) {
    return reject('missing-required-field', 'promo_title', 'promo_title is empty after cleaning')
  }
  if (promoUrl === undefined) {
    return reject('missing-required-field', 'promo_url', 'promo_url is missing')
  }

  const record: Draft<PromotionRecord> = {
    competitor: cleanText(candidate.competitorName),
    promoTitle,
    promoType,
    promoUrl,
    status: promotionStatus(startDate, endDate, context.collectedAt),
    sourceUrl: candidate.sourceUrl,
    confidence: candidate.confidence,
    needsVerification: candidate.needsVerification,
    collectedAt: context.collectedAt.toISOString(),
  }
  if (promoCode !== undefined) record.promoCode = promoCode
  if (discountValue !== undefined) record.discountValue = discountValue
  if (startDate !== undefined) record.startDate = startDate
  if (endDate !== undefined) record.endDate = endDate
  if (applicableProducts !== undefined) record.applicableProducts = applicableProducts
  if (imageUrl !== undefined) record.imageUrl = imageUrl
  if (description !== undefined) record.description = description

  return { status: 'accepted', record: Object.freeze(record), warnings: read.warnings }
}

export function normalize(candidate: CandidateRecord, context: NormalizeContext): NormalizeResult {
  return candidate.kind === 'product' ? normalizeProduct(candidate, context) : normalizePromotion(candidate, context)
}

/**
 * Turn a final record back into a candidate, for re-normalizing stored
 * records.
 */
export function candidateFromRecord(record: ProductRecord | PromotionRecord): CandidateRecord {
  const metadata = {
    competitorId: slugify(record.competitor),
    competitorName: record.competitor,
    sourceUrl: record.sourceUrl,
    confidence: record.confidence,
    needsVerification: record.needsVerification,
  }

  if ('productUrl' in record) {
    return {
      kind: 'product',
      ...metadata,
      fields: {
        product_name: record.productName,
        brand: record.brand,
        category: record.category,
        price: record.price,
        original_price: record.originalPrice,
        launch_date: record.launchDate,
        product_url: record.productUrl,
        image_url: record.imageUrl,
        sku: record.sku,
      },
    }
  }

  return {
    kind: 'promotion',
    ...metadata,
    fields: {
      promo_title: record.promoTitle,
      promo_type: record.promoType,
      promo_code: record.promoCode,
      discount_value: record.discountValue,
      start_date: record.startDate,
      end_date: record.endDate,
      applicable_products: record.applicableProducts,
      promo_url: record.promoUrl,
      image_url: record.imageUrl,
      description: record.description,
    },
  }
}
