/**
 * Text cleaning helpers shared by the classifier, extractor and normalizer.
 */

import * as cheerio from 'cheerio'
import type { RawPage } from '../types.js'

// C0 and C1 controls, except the whitespace ones collapsed below
const CONTROL_CHARS = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F]/g
const WHITESPACE_RUN = /\s+/g

/**
 * Strip control characters, collapse whitespace runs to one space, trim.
 * Idempotent.
 */
export function cleanText(value: string): string {
  return value.replace(CONTROL_CHARS, '').replace(WHITESPACE_RUN, ' ').trim()
}

/**
 * Human-visible text of an HTML document.
 */
export function visibleText(html: string): string {
  if (!html) {
    return ''
  }
  const $ = cheerio.load(html)
  $('script, style, noscript, template, svg, iframe').remove()
  return cleanText($('body').text())
}

/**
 * Page content for classification and extraction: Markdown when the fetcher
 * produced it, visible HTML text otherwise.
 */
export function pageText(page: RawPage): string {
  return page.markdown.trim() ? page.markdown : visibleText(page.html)
}

/**
 * Truncate to at most `maxChars` UTF-16 units, never splitting a surrogate pair.
 */
export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text
  }
  const last = text.charCodeAt(maxChars - 1)
  const end = last >= 0xd800 && last <= 0xdbff ? maxChars - 1 : maxChars
  return text.slice(0, end)
}

/**
 * Lowercase slug for identifiers: "West Elm" → "west-elm".
 */
export function slugify(value: string): string {
  return cleanText(value)
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
}
