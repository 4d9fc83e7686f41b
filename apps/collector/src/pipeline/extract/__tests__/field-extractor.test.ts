import { describe, expect, it } from 'vitest'
import { FieldExtractor, isProductDetailUrl } from '../field-extractor.js'
import { ExtractionRateLimiter } from '../../concurrency.js'
import { ExtractionError, ExtractionServiceError } from '../../errors.js'
import {
  NO_DELAY_RETRY,
  ScriptedExtractionService,
  UNLIMITED_RATE,
  makePage,
  silentLogger,
} from '../../__tests__/helpers/fixtures.js'

function extractorWith(service: ScriptedExtractionService, maxContentChars = 12000): FieldExtractor {
  return new FieldExtractor({
    service,
    limiter: new ExtractionRateLimiter(UNLIMITED_RATE),
    retryPolicy: NO_DELAY_RETRY,
    confidenceThreshold: 0.7,
    maxContentChars,
    logger: silentLogger(),
  })
}

const listingPage = makePage('https://www.westelm.com/shop/new', { markdown: '# New arrivals' })

describe('isProductDetailUrl', () => {
  it('recognizes product slugs under detail prefixes', () => {
    expect(isProductDetailUrl('https://www.westelm.com/products/harmony-sofa-h1234/')).toBe(true)
    expect(isProductDetailUrl('https://www.example.com/dp/B000123')).toBe(true)
    expect(isProductDetailUrl('https://www.westelm.com/products/')).toBe(false)
    expect(isProductDetailUrl('https://www.westelm.com/shop/new')).toBe(false)
  })
})

describe('FieldExtractor', () => {
  it('never calls the service for other pages', async () => {
    const service = new ScriptedExtractionService()

    const outcome = await extractorWith(service).extract(listingPage, 'other')

    expect(outcome).toEqual({ ok: true, candidates: [], attempts: 0, extrasDiscarded: 0 })
    expect(service.calls).toHaveLength(0)
  })

  it('maps product replies to candidates and strips unknown fields', async () => {
    const service = new ScriptedExtractionService({
      product: [
        {
          products: [
            { product_name: 'Harmony Sofa', price: '$1,899.00', product_url: '/p/harmony', confidence: 0.92, rating: 4.8 },
            { product_name: 'Oak Table', price: 799, confidence: 0.4 },
          ],
          confidence: 0.8,
          model_notes: 'ignored',
        },
      ],
    })

    const outcome = await extractorWith(service).extract(listingPage, 'product', { competitorName: 'West Elm' })

    expect(outcome.ok).toBe(true)
    if (!outcome.ok) return
    expect(outcome.attempts).toBe(1)
    expect(outcome.candidates).toEqual([
      {
        kind: 'product',
        competitorId: 'west-elm',
        competitorName: 'West Elm',
        sourceUrl: 'https://www.westelm.com/shop/new',
        confidence: 0.92,
        needsVerification: false,
        fields: { product_name: 'Harmony Sofa', price: '$1,899.00', product_url: '/p/harmony' },
      },
      {
        kind: 'product',
        competitorId: 'west-elm',
        competitorName: 'West Elm',
        sourceUrl: 'https://www.westelm.com/shop/new',
        confidence: 0.4,
        needsVerification: true,
        fields: { product_name: 'Oak Table', price: 799 },
      },
    ])
  })

  it('uses the page confidence, then zero, when items carry none', async () => {
    const service = new ScriptedExtractionService({
      promotion: [{ promotions: [{ promo_title: 'Spring Sale' }], confidence: 0.75 }],
      product: [{ products: [{ product_name: 'Lamp' }] }],
    })
    const extractor = extractorWith(service)

    const promo = await extractor.extract(makePage('https://www.westelm.com/sale'), 'promotion')
    const product = await extractor.extract(listingPage, 'product')

    expect(promo.ok && promo.candidates[0]).toMatchObject({
      kind: 'promotion',
      confidence: 0.75,
      needsVerification: false,
      competitorName: 'west-elm',
    })
    expect(product.ok && product.candidates[0]).toMatchObject({ confidence: 0, needsVerification: true })
  })

  it('keeps one product on detail pages and fills its URL from the page', async () => {
    const service = new ScriptedExtractionService({
      product: [
        {
          products: [
            { product_name: 'Harmony Sofa', product_url: null, confidence: 0.9 },
            { product_name: 'Matching Ottoman', confidence: 0.9 },
            { product_name: 'Throw Pillow', confidence: 0.9 },
          ],
        },
      ],
    })
    const page = makePage('https://www.westelm.com/products/harmony-sofa', { markdown: 'Harmony Sofa' })

    const outcome = await extractorWith(service).extract(page, 'product')

    expect(outcome.ok).toBe(true)
    if (!outcome.ok) return
    expect(outcome.extrasDiscarded).toBe(2)
    expect(outcome.candidates).toHaveLength(1)
    expect(outcome.candidates[0].fields).toEqual({
      product_name: 'Harmony Sofa',
      product_url: 'https://www.westelm.com/products/harmony-sofa',
    })
  })

  it('retries malformed replies with the same input', async () => {
    const service = new ScriptedExtractionService({
      product: [{ items: [] }, new ExtractionServiceError('unavailable', 'HTTP 529'), { products: [] }],
    })

    const outcome = await extractorWith(service).extract(listingPage, 'product')

    expect(outcome).toEqual({ ok: true, candidates: [], attempts: 3, extrasDiscarded: 0 })
    expect(service.calls.map((call) => call.content)).toEqual(['# New arrivals', '# New arrivals', '# New arrivals'])
  })

  it('fails after three malformed replies under a retry bound of two', async () => {
    const service = new ScriptedExtractionService({ product: [{ products: 'none' }] })

    const outcome = await extractorWith(service).extract(listingPage, 'product')

    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.attempts).toBe(3)
    expect(outcome.error).toBeInstanceOf(ExtractionError)
    expect(outcome.error.code).toBe('EXTRACTION_FAILED')
    expect(outcome.error.url).toBe('https://www.westelm.com/shop/new')
    expect(service.callsFor('product')).toBe(3)
  })

  it('rejects replies whose fields are not scalars', async () => {
    const service = new ScriptedExtractionService({
      promotion: [{ promotions: [{ promo_title: { text: 'Sale' } }] }],
    })

    const outcome = await extractorWith(service).extract(makePage('https://www.westelm.com/sale'), 'promotion')

    expect(outcome.ok).toBe(false)
  })

  it('sends visible HTML text, truncated, when there is no Markdown', async () => {
    const service = new ScriptedExtractionService({ promotion: [{ promotions: [] }] })
    const page = makePage('https://www.westelm.com/sale', {
      html: '<body><h1>Spring Sale</h1><p>Up to 40% off</p></body>',
    })

    await extractorWith(service, 11).extract(page, 'promotion')

    expect(service.calls[0].content).toBe('Spring Sale')
  })
})
