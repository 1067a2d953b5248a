import { PageDocument } from '../extract/document.js'
import { SEARCH_SELECTORS } from '../extract/selectors.js'
import { canonicalizeUrl, resolveUrl } from '../utils/url.js'

/**
 * What a search result page offers the pagination driver.
 */
export interface SearchPage {
  /** Canonical detail URLs in page order, without duplicates */
  listingUrls: string[]
  /** Absolute URL of the next result page, when the page links one */
  nextUrl?: string
}

export function parseSearchPage(html: string, pageUrl: string): SearchPage {
  const doc = PageDocument.load(html)

  const listingUrls: string[] = []
  for (const href of doc.attrs(SEARCH_SELECTORS.listingLinks, ['href'])) {
    const absolute = resolveUrl(href, pageUrl)
    if (!absolute) continue
    const canonical = canonicalizeUrl(absolute)
    if (!listingUrls.includes(canonical)) {
      listingUrls.push(canonical)
    }
  }

  let nextUrl: string | undefined
  for (const selector of SEARCH_SELECTORS.nextPage) {
    const href = doc.attr(selector, ['href'])
    nextUrl = href ? resolveUrl(href, pageUrl) : undefined
    if (nextUrl) break
  }

  return { listingUrls, nextUrl }
}
