/**
 * Expected shapes of extraction-service replies.
 *
 * Unknown keys are stripped. Field values stay raw scalars; cleaning is the
 * normalizer's job.
 */

import { z } from 'zod'

const rawValue = z.union([z.string(), z.number(), z.boolean(), z.null()])
const confidence = z.number().min(0).max(1)

export const productItemSchema = z.object({
  product_name: rawValue.optional(),
  brand: rawValue.optional(),
  category: rawValue.optional(),
  price: rawValue.optional(),
  original_price: rawValue.optional(),
  launch_date: rawValue.optional(),
  product_url: rawValue.optional(),
  image_url: rawValue.optional(),
  sku: rawValue.optional(),
  confidence: confidence.optional(),
})

export const promotionItemSchema = z.object({
  promo_title: rawValue.optional(),
  promo_type: rawValue.optional(),
  promo_code: rawValue.optional(),
  discount_value: rawValue.optional(),
  start_date: rawValue.optional(),
  end_date: rawValue.optional(),
  applicable_products: rawValue.optional(),
  promo_url: rawValue.optional(),
  image_url: rawValue.optional(),
  description: rawValue.optional(),
  confidence: confidence.optional(),
})

export const productResponseSchema = z.object({
  products: z.array(productItemSchema),
  confidence: confidence.optional(),
})

export const promotionResponseSchema = z.object({
  promotions: z.array(promotionItemSchema),
  confidence: confidence.optional(),
})

export type ProductItem = z.infer<typeof productItemSchema>
export type PromotionItem = z.infer<typeof promotionItemSchema>
