/**
 * URL Resolution and Canonicalization
 *
 * Canonical form:
 * 1. Absolute http(s) only
 * 2. Lowercase hostname, default port dropped
 * 3. Tracking parameters removed: utm_*, fbclid, gclid, msclkid, ref, source, campaign
 * 4. Empty query parameters removed
 * 5. Query parameters sorted by key
 * 6. Fragment removed
 * 7. Trailing slashes removed (except root path)
 */

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'msclkid',
  'mc_cid',
  'mc_eid',
  'ref',
  'source',
  'campaign',
])

function parseUrl(raw: string, base?: string): URL | null {
  try {
    return new URL(raw, base)
  } catch {
    return null
  }
}

function isHttp(url: URL): boolean {
  return url.protocol === 'http:' || url.protocol === 'https:'
}

/**
 * Canonicalize an absolute URL.
 *
 * @throws TypeError if the URL cannot be parsed
 */
export function canonicalizeUrl(url: string | URL): string {
  const parsed = new URL(url.toString())

  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key.toLowerCase()) || key.toLowerCase().startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  if ([...parsed.searchParams.keys()].length === 0) {
    parsed.search = ''
  }

  parsed.hash = ''

  if (parsed.pathname !== '/') {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/'
  }

  return parsed.toString()
}

// Filler the extraction service writes where a link is missing
const PLACEHOLDER_URL = /^(?:n\/?a|none|null|not available|unknown|-+)$/i
const INNER_WHITESPACE = /\s/

/**
 * Resolve a possibly-relative URL against the page it came from and
 * canonicalize it. Placeholder text and values with inner whitespace are
 * not URLs.
 *
 * @param raw - URL as reported on the page
 * @param base - Source page URL, or null when there is no page context
 * @returns Canonical absolute http(s) URL, or null when it cannot be resolved
 */
export function resolveHttpUrl(raw: string, base: string | null): string | null {
  const trimmed = raw.trim()
  if (!trimmed || PLACEHOLDER_URL.test(trimmed) || INNER_WHITESPACE.test(trimmed)) {
    return null
  }

  const parsed = parseUrl(trimmed) ?? (base ? parseUrl(trimmed, base) : null)
  if (!parsed || !isHttp(parsed) || !parsed.hostname) {
    return null
  }

  return canonicalizeUrl(parsed)
}

/**
 * Validate that a URL is absolute with a supported protocol.
 */
export function isValidUrl(url: string): boolean {
  const parsed = parseUrl(url)
  return parsed !== null && isHttp(parsed)
}

/**
 * Path of a URL, or '' when it cannot be parsed.
 */
export function urlPath(url: string): string {
  return parseUrl(url)?.pathname.toLowerCase() ?? ''
}
