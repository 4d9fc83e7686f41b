/**
 * Prompt text per extraction schema.
 */

import type { PromptSchemaId } from '../types.js'

const SHARED_RULES = `Respond with a single JSON object and nothing else.
Copy values exactly as they appear on the page; do not convert currencies, reformat dates or invent values.
Use null for anything the page does not state.
Set "confidence" between 0 and 1 for each item: how sure you are that it is a real, current listing.`

const PROMPTS: Record<PromptSchemaId, string> = {
  product: `You extract newly launched products from a retailer web page.
Return {"products": [...], "confidence": number}. Each product has:
- product_name, brand, category
- price, original_price (as shown, including the currency symbol)
- launch_date
- product_url, image_url (as linked on the page; relative links are fine)
- sku
- confidence
Skip navigation, headers, footers, recommendations and reviews.
${SHARED_RULES}`,

  promotion: `You extract active promotions from a retailer web page.
Return {"promotions": [...], "confidence": number}. Each promotion has:
- promo_title, description
- promo_type (percent-off, amount-off, bogo, free-shipping or other)
- promo_code, discount_value
- start_date, end_date
- applicable_products
- promo_url, image_url (as linked on the page; relative links are fine)
- confidence
Only extract clear offers: sales, discounts, codes, shipping deals. Skip regular product listings.
${SHARED_RULES}`,

  'page-label': `You classify a retailer web page.
Return {"label": "product" | "promotion" | "other"}:
- product: a product detail page or a listing of new products
- promotion: a sale, deals or promotion page
- other: anything else
Respond with a single JSON object and nothing else.`,
}

export function systemPromptFor(schema: PromptSchemaId): string {
  return PROMPTS[schema]
}
