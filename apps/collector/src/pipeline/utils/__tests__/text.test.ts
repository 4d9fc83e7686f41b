import { describe, expect, it } from 'vitest'
import { cleanText, slugify, truncate, visibleText } from '../text.js'

describe('cleanText', () => {
  it('strips control characters, collapses whitespace and trims', () => {
    expect(cleanText('  Mid-Century\u0000 Sofa\n\t in  Walnut ')).toBe('Mid-Century Sofa in Walnut')
  })

  it('does not join words separated by a control character and spaces', () => {
    expect(cleanText('Oak \u0007 Table')).toBe('Oak Table')
  })

  it('is idempotent', () => {
    const inputs = ['a \u0001 b', '\u0085x  y', '\r\n lead', 'plain']
    for (const input of inputs) {
      const once = cleanText(input)
      expect(cleanText(once)).toBe(once)
    }
  })
})

describe('visibleText', () => {
  it('returns body text without scripts and styles', () => {
    const html =
      '<html><head><style>.x{}</style></head><body><h1>Spring Sale</h1><script>track()</script><p>20% off   sofas</p></body></html>'
    expect(visibleText(html)).toBe('Spring Sale20% off sofas')
  })

  it('returns an empty string for empty input', () => {
    expect(visibleText('')).toBe('')
  })
})

describe('truncate / slugify', () => {
  it('truncates to the character limit', () => {
    expect(truncate('abcdef', 4)).toBe('abcd')
    expect(truncate('abc', 4)).toBe('abc')
  })

  it('does not split a surrogate pair at the cut', () => {
    expect(truncate('ab\u{1F600}', 3)).toBe('ab')
    expect(truncate('ab\u{1F600}c', 4)).toBe('ab\u{1F600}')
  })

  it('slugifies display names', () => {
    expect(slugify('West Elm')).toBe('west-elm')
    expect(slugify('  Crate & Barrel ')).toBe('crate-barrel')
    expect(slugify('Café Nord')).toBe('cafe-nord')
  })
})
