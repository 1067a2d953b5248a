import type { ListingRecord } from '../types.js'

export const UNKNOWN_DEALER = 'Unknown dealer'

export interface DealerSummaryEntry {
  dealerName: string
  /** Location of the dealer's first listing */
  location?: string
  ratingCount?: number
  listingCount: number
}

/**
 * Aggregate records by dealer name. Listings without a dealer name are
 * grouped under "Unknown dealer". Entries keep first-seen order.
 */
export function buildDealerSummary(records: Iterable<ListingRecord>): Map<string, DealerSummaryEntry> {
  const summary = new Map<string, DealerSummaryEntry>()

  for (const record of records) {
    const dealerName = record.dealer?.name?.trim() || UNKNOWN_DEALER
    const entry = summary.get(dealerName)
    if (entry) {
      entry.listingCount += 1
      if (entry.location === undefined) entry.location = record.location
      if (entry.ratingCount === undefined) entry.ratingCount = record.dealer?.ratingCount
    } else {
      summary.set(dealerName, {
        dealerName,
        location: record.location,
        ratingCount: record.dealer?.ratingCount,
        listingCount: 1,
      })
    }
  }

  return summary
}
