/**
 * CSV Writer
 *
 * RecordStore that exports a run to CSV files:
 * - new_products.csv
 * - current_promotions.csv
 * - run_summary.json (the run stats)
 *
 * Columns are snake_case. Each save replaces the previous export.
 */

import { mkdir, rename, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../../config/logger.js'
import type { ProductRecord, PromotionRecord, RecordBatch, RecordStore } from '../types.js'

export const PRODUCTS_FILE = 'new_products.csv'
export const PROMOTIONS_FILE = 'current_promotions.csv'
export const SUMMARY_FILE = 'run_summary.json'

type CsvValue = string | number | boolean | null | undefined

export const PRODUCT_COLUMNS = [
  'competitor',
  'product_name',
  'brand',
  'category',
  'price',
  'original_price',
  'launch_date',
  'product_url',
  'image_url',
  'sku',
  'source_url',
  'confidence',
  'needs_verification',
  'collected_at',
] as const

export const PROMOTION_COLUMNS = [
  'competitor',
  'promo_title',
  'promo_type',
  'promo_code',
  'discount_value',
  'start_date',
  'end_date',
  'status',
  'applicable_products',
  'promo_url',
  'image_url',
  'description',
  'source_url',
  'confidence',
  'needs_verification',
  'collected_at',
] as const

type ProductRow = Record<(typeof PRODUCT_COLUMNS)[number], CsvValue>
type PromotionRow = Record<(typeof PROMOTION_COLUMNS)[number], CsvValue>

export function productRow(record: ProductRecord): ProductRow {
  return {
    competitor: record.competitor,
    product_name: record.productName,
    brand: record.brand,
    category: record.category,
    price: record.price,
    original_price: record.originalPrice,
    launch_date: record.launchDate,
    product_url: record.productUrl,
    image_url: record.imageUrl,
    sku: record.sku,
    source_url: record.sourceUrl,
    confidence: record.confidence,
    needs_verification: record.needsVerification,
    collected_at: record.collectedAt,
  }
}

export function promotionRow(record: PromotionRecord): PromotionRow {
  return {
    competitor: record.competitor,
    promo_title: record.promoTitle,
    promo_type: record.promoType,
    promo_code: record.promoCode,
    discount_value: record.discountValue,
    start_date: record.startDate,
    end_date: record.endDate,
    status: record.status,
    applicable_products: record.applicableProducts,
    promo_url: record.promoUrl,
    image_url: record.imageUrl,
    description: record.description,
    source_url: record.sourceUrl,
    confidence: record.confidence,
    needs_verification: record.needsVerification,
    collected_at: record.collectedAt,
  }
}

function toCsv<Row extends Record<string, CsvValue>>(rows: readonly Row[], columns: readonly string[]): string {
  return stringify([...rows], {
    header: true,
    columns: [...columns],
    cast: { boolean: (value) => (value ? 'true' : 'false') },
  })
}

export interface CsvRecordStoreOptions {
  exportsDir: string
  logger?: ILogger
}

export interface ExportPaths {
  products: string
  promotions: string
  summary: string
}

export class CsvRecordStore implements RecordStore {
  readonly paths: ExportPaths
  private readonly log: ILogger

  constructor(private readonly options: CsvRecordStoreOptions) {
    this.log = options.logger ?? loggers.exporter
    this.paths = {
      products: join(options.exportsDir, PRODUCTS_FILE),
      promotions: join(options.exportsDir, PROMOTIONS_FILE),
      summary: join(options.exportsDir, SUMMARY_FILE),
    }
  }

  async save(batch: RecordBatch): Promise<void> {
    await mkdir(this.options.exportsDir, { recursive: true })

    await writeAtomically(this.paths.products, toCsv(batch.products.map(productRow), PRODUCT_COLUMNS))
    await writeAtomically(this.paths.promotions, toCsv(batch.promotions.map(promotionRow), PROMOTION_COLUMNS))
    await writeAtomically(this.paths.summary, `${JSON.stringify(batch.stats, null, 2)}\n`)

    this.log.info('EXPORT_WRITTEN', {
      exportsDir: this.options.exportsDir,
      products: batch.products.length,
      promotions: batch.promotions.length,
    })
  }
}

/** Readers never see a half-written file. */
async function writeAtomically(path: string, contents: string): Promise<void> {
  const tmp = `${path}.${process.pid}.tmp`
  await writeFile(tmp, contents, 'utf8')
  await rename(tmp, path)
}
