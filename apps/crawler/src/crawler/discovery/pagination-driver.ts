/**
 * Pagination Driver
 *
 * Walks one search query page by page and turns listing links into detail
 * tasks under the run's record budget.
 *
 *   AT_PAGE(n) --advance--> AT_PAGE(n+1) | EXHAUSTED | BUDGET_REACHED
 *   AT_PAGE(n) --fail-----> EXHAUSTED
 *
 * EXHAUSTED and BUDGET_REACHED are terminal. The frontier is shared by every
 * walk of a run, so budget, visited pages and emitted listings span seeds.
 */

import type { CrawlTask } from '../types.js'
import { canonicalizeUrl, pageNumberOf, querySignature } from '../utils/url.js'
import { loggers } from '../../config/logger.js'
import type { SearchPage } from './search-page.js'

const log = loggers.discovery

export type DriverState =
  | { kind: 'AT_PAGE'; page: number; url: string }
  | { kind: 'EXHAUSTED' }
  | { kind: 'BUDGET_REACHED' }

/**
 * Run-wide discovery bookkeeping.
 */
export class CrawlFrontier {
  private readonly claimedListings = new Set<string>()
  private readonly visitedPages = new Set<string>()

  constructor(readonly maxRecords: number) {
    if (!Number.isInteger(maxRecords) || maxRecords < 1) {
      throw new Error(`Invalid maxRecords: ${maxRecords}`)
    }
  }

  /** Detail tasks handed out so far */
  get dispatched(): number {
    return this.claimedListings.size
  }

  get remaining(): number {
    return this.maxRecords - this.dispatched
  }

  get budgetReached(): boolean {
    return this.remaining <= 0
  }

  get pagesVisited(): number {
    return this.visitedPages.size
  }

  /**
   * Claim a listing for one detail task. False when it was claimed before
   * in this run or the budget is spent.
   */
  claimListing(url: string): boolean {
    if (this.budgetReached) return false
    const canonical = canonicalizeUrl(url)
    if (this.claimedListings.has(canonical)) return false
    this.claimedListings.add(canonical)
    return true
  }

  /**
   * Record a visit to a search page. False when the same query and page
   * number was visited before.
   */
  visitPage(url: string): boolean {
    const key = `${querySignature(url)}#${pageNumberOf(url)}`
    if (this.visitedPages.has(key)) return false
    this.visitedPages.add(key)
    return true
  }
}

export class PaginationDriver {
  private current: DriverState

  constructor(
    seedUrl: string,
    private readonly frontier: CrawlFrontier
  ) {
    if (frontier.budgetReached) {
      this.current = { kind: 'BUDGET_REACHED' }
    } else if (!frontier.visitPage(seedUrl)) {
      log.debug('Seed already visited', { url: seedUrl })
      this.current = { kind: 'EXHAUSTED' }
    } else {
      this.current = { kind: 'AT_PAGE', page: pageNumberOf(seedUrl), url: seedUrl }
    }
  }

  get state(): DriverState {
    return this.current
  }

  get done(): boolean {
    return this.current.kind !== 'AT_PAGE'
  }

  /** Discovery task for the current page; undefined once terminal */
  currentTask(): CrawlTask | undefined {
    if (this.current.kind !== 'AT_PAGE') return undefined
    return { url: this.current.url, kind: 'discovery', page: this.current.page, attempt: 0 }
  }

  /**
   * Consume the current page: new listings become detail tasks (up to the
   * remaining budget) and the driver moves on.
   */
  advance(searchPage: SearchPage): CrawlTask[] {
    const at = this.current
    if (at.kind !== 'AT_PAGE') {
      throw new Error(`Cannot advance a driver in state ${at.kind}`)
    }

    const tasks: CrawlTask[] = []
    for (const url of searchPage.listingUrls) {
      if (this.frontier.budgetReached) break
      if (this.frontier.claimListing(url)) {
        tasks.push({ url: canonicalizeUrl(url), kind: 'detail', attempt: 0 })
      }
    }

    if (this.frontier.budgetReached) {
      this.current = { kind: 'BUDGET_REACHED' }
    } else if (searchPage.listingUrls.length > 0 && searchPage.nextUrl) {
      if (this.frontier.visitPage(searchPage.nextUrl)) {
        this.current = { kind: 'AT_PAGE', page: at.page + 1, url: searchPage.nextUrl }
      } else {
        log.info('Next page already visited', { url: searchPage.nextUrl, page: at.page })
        this.current = { kind: 'EXHAUSTED' }
      }
    } else {
      this.current = { kind: 'EXHAUSTED' }
    }

    log.debug('Search page consumed', {
      url: at.url,
      page: at.page,
      listings: searchPage.listingUrls.length,
      newTasks: tasks.length,
      state: this.current.kind,
    })
    return tasks
  }

  /**
   * The current page could not be fetched; the walk ends here.
   */
  fail(reason: string): void {
    if (this.current.kind !== 'AT_PAGE') return
    log.warn('Search page fetch failed, ending walk', {
      url: this.current.url,
      page: this.current.page,
      reason,
    })
    this.current = { kind: 'EXHAUSTED' }
  }
}
