/**
 * URL Utilities
 *
 * Canonicalization rules:
 * 1. Enforce https (upgrade http)
 * 2. Remove tracking parameters: utm_*, fbclid, gclid, ref, source, campaign
 * 3. Remove fragment identifiers (#...)
 * 4. Lowercase hostname
 * 5. Remove trailing slash (except root path)
 * 6. Remove empty query parameters
 * 7. Sort query parameters alphabetically
 */

import { createHash } from 'node:crypto'
import * as psl from 'psl'

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'ref',
  'source',
  'campaign',
])

/** Path markers of listing detail pages (English and German site variants) */
const DETAIL_PATH_MARKERS = ['/offers/', '/angebote/']

/** Query parameter carrying the search result page number */
export const PAGE_PARAM = 'page'

/**
 * Canonicalize a URL for deduplication.
 *
 * @throws Error if URL is invalid
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url)

  parsed.protocol = 'https:'
  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

/**
 * Resolve a possibly relative href against a base URL.
 * Returns undefined for unparseable or non-http(s) results.
 */
export function resolveUrl(href: string, baseUrl: string): string | undefined {
  try {
    const resolved = new URL(href.trim(), baseUrl)
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return undefined
    }
    return resolved.toString()
  } catch {
    return undefined
  }
}

/**
 * Extract the registrable domain (eTLD+1) from a URL or bare hostname.
 * Rate limits are scoped by registrable domain.
 *
 * @returns The registrable domain (e.g., "autoscout24.com" from "www.autoscout24.com")
 */
export function getRegistrableDomain(urlOrHost: string): string {
  const hostname = urlOrHost.includes('://')
    ? new URL(urlOrHost).hostname.toLowerCase()
    : urlOrHost.toLowerCase()

  const parsedDomain = psl.parse(hostname)

  if (parsedDomain.error) {
    return hostname
  }

  return parsedDomain.domain || hostname
}

export function isDetailUrl(url: string): boolean {
  try {
    const path = new URL(url).pathname.toLowerCase()
    return DETAIL_PATH_MARKERS.some(marker => path.includes(marker))
  } catch {
    return false
  }
}

/**
 * Percent-decode a path segment. A stray `%` that is not an escape is kept as is.
 */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    return segment
  }
}

/**
 * Listing identifier: the last non-empty path segment of the canonical URL.
 * Falls back to a URL hash when the path has no segment.
 */
export function listingIdFromUrl(url: string): string {
  const canonical = canonicalizeUrl(url)
  const segments = new URL(canonical).pathname.split('/').filter(Boolean)
  const last = segments[segments.length - 1]
  if (last) {
    return decodeSegment(last)
  }
  return `URL:${hashUrl(canonical)}`
}

/**
 * Search result page number from the `page` query parameter (default 1).
 */
export function pageNumberOf(url: string): number {
  const raw = new URL(url).searchParams.get(PAGE_PARAM)
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 1
}

/**
 * Identity of a search query independent of its page number.
 * Two discovery URLs with the same signature and page number are the same page.
 */
export function querySignature(url: string): string {
  const parsed = new URL(canonicalizeUrl(url))
  parsed.searchParams.delete(PAGE_PARAM)
  return `${parsed.hostname}${parsed.pathname}?${parsed.searchParams.toString()}`
}

/**
 * First 16 hex chars of the SHA-256 of a URL.
 */
export function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex').slice(0, 16)
}
