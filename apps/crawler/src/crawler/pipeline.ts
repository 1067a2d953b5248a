/**
 * Crawl Pipeline
 *
 * Single producer loop over the start URLs:
 * 1. Detail start URLs become detail tasks directly (counted against the budget)
 * 2. Search seeds are walked one after another by a PaginationDriver,
 *    sharing one frontier (budget, visited pages, claimed listings)
 * 3. Every detail task runs concurrently on the worker pool:
 *    fetch -> extract -> normalize -> dedup -> sink
 *
 * Pages that yield no record are reported on the skip channel, including pages
 * whose extraction or normalization throws. Only a fatal
 * error (proxy pool unavailable, a failing sink or dedup store) ends the run
 * early: dispatch stops, in-flight tasks drain, and run() rejects.
 */

import { randomUUID } from 'node:crypto'
import type {
  CrawlContext,
  CrawlTask,
  DedupStore,
  ExtractFailureReason,
  FetchResult,
  ListingRecord,
  RecordSink,
  RunTerminalState,
  SkipChannel,
  SkipEntry,
} from './types.js'
import { CrawlFrontier, PaginationDriver } from './discovery/pagination-driver.js'
import { parseSearchPage } from './discovery/search-page.js'
import { FieldExtractor } from './extract/extractor.js'
import type { FetchWorkerPool } from './fetch/worker-pool.js'
import { normalize } from './normalize/normalizer.js'
import { MemoryDedupStore } from './process/dedup-store.js'
import {
  ExtractionFailedError,
  FetchFailedError,
  classifyError,
  errorLogMeta,
} from './errors.js'
import { recordBudgetReached, recordRunCompleted, type RunCompletedPayload } from './metrics.js'
import { isDetailUrl } from './utils/url.js'
import { loggers } from '../config/logger.js'

export const DEFAULT_MAX_RECORDS = 300

export type CrawlRunSummary = RunCompletedPayload

export interface CrawlPipelineOptions {
  /** Search URLs and/or detail URLs, absolute */
  startUrls: readonly string[]
  maxRecords?: number
  workerPool: FetchWorkerPool
  sink: RecordSink
  skipChannel?: SkipChannel
  extractor?: FieldExtractor
  /** Defaults to an in-memory store */
  dedupStore?: DedupStore
  context?: Partial<CrawlContext>
  now?: () => number
}

/**
 * Skip channel that only logs.
 */
export function loggingSkipChannel(context: CrawlContext): SkipChannel {
  return {
    report(entry: SkipEntry): void {
      context.logger.info('Skipped', { ...entry })
    },
  }
}

export class CrawlPipeline {
  readonly context: CrawlContext
  readonly maxRecords: number

  private readonly startUrls: readonly string[]
  private readonly workerPool: FetchWorkerPool
  private readonly sink: RecordSink
  private readonly skipChannel: SkipChannel
  private readonly extractor: FieldExtractor
  private readonly dedupStore: DedupStore
  private readonly now: () => number

  private readonly inflight = new Set<Promise<void>>()
  private started = false
  private stopped = false
  private fatalError: unknown

  private discoveryPagesVisited = 0
  private detailTasksDispatched = 0
  private recordsEmitted = 0
  private fetchFailures = 0
  private extractionFailures = 0
  private duplicates = 0
  private cancelled = 0

  constructor(options: CrawlPipelineOptions) {
    const runId = options.context?.runId ?? randomUUID()
    this.context = {
      runId,
      logger: options.context?.logger ?? loggers.crawler.child({ runId }),
    }
    this.maxRecords = options.maxRecords ?? DEFAULT_MAX_RECORDS
    this.startUrls = options.startUrls
    this.workerPool = options.workerPool
    this.sink = options.sink
    this.skipChannel = options.skipChannel ?? loggingSkipChannel(this.context)
    this.extractor = options.extractor ?? new FieldExtractor()
    this.dedupStore = options.dedupStore ?? new MemoryDedupStore()
    this.now = options.now ?? Date.now
  }

  /**
   * Stop dispatching new work. In-flight fetches finish; run() resolves as STOPPED.
   */
  stop(): void {
    if (this.stopped) return
    this.stopped = true
    this.context.logger.info('Stop requested')
    this.workerPool.stop()
  }

  private get halted(): boolean {
    return this.stopped || this.fatalError !== undefined
  }

  async run(): Promise<CrawlRunSummary> {
    if (this.started) {
      throw new Error('A pipeline runs once')
    }
    this.started = true

    const log = this.context.logger
    const startTime = this.now()
    const frontier = new CrawlFrontier(this.maxRecords)

    const detailUrls = this.startUrls.filter(url => isDetailUrl(url))
    const searchUrls = this.startUrls.filter(url => !isDetailUrl(url))

    log.info('Crawl started', {
      maxRecords: this.maxRecords,
      detailStartUrls: detailUrls.length,
      searchSeeds: searchUrls.length,
    })

    try {
      for (const url of detailUrls) {
        if (this.halted || frontier.budgetReached) break
        if (frontier.claimListing(url)) {
          this.dispatch({ url, kind: 'detail', attempt: 0 })
        }
      }

      for (const seed of searchUrls) {
        if (this.halted || frontier.budgetReached) break
        await this.walk(seed, frontier)
      }

      while (this.inflight.size > 0) {
        await Promise.all([...this.inflight])
      }
    } finally {
      await this.closeDedupStore()
    }

    const terminalState = this.terminalState(frontier)
    const summary: CrawlRunSummary = {
      runId: this.context.runId,
      terminalState,
      maxRecords: this.maxRecords,
      discoveryPagesVisited: this.discoveryPagesVisited,
      detailTasksDispatched: this.detailTasksDispatched,
      recordsEmitted: this.recordsEmitted,
      fetchFailures: this.fetchFailures,
      extractionFailures: this.extractionFailures,
      duplicates: this.duplicates,
      cancelled: this.cancelled,
      failureRate:
        this.detailTasksDispatched > 0
          ? (this.fetchFailures + this.extractionFailures) / this.detailTasksDispatched
          : 0,
      durationMs: this.now() - startTime,
    }

    if (terminalState === 'BUDGET_REACHED') {
      recordBudgetReached({
        runId: summary.runId,
        maxRecords: summary.maxRecords,
        detailTasksDispatched: summary.detailTasksDispatched,
      })
    }
    recordRunCompleted(summary)

    if (this.fatalError !== undefined) {
      throw this.fatalError
    }
    return summary
  }

  private terminalState(frontier: CrawlFrontier): RunTerminalState {
    if (this.fatalError !== undefined) return 'FAILED'
    if (this.stopped) return 'STOPPED'
    if (frontier.budgetReached) return 'BUDGET_REACHED'
    return 'EXHAUSTED'
  }

  /**
   * Walk one search query until its driver reaches a terminal state.
   */
  private async walk(seed: string, frontier: CrawlFrontier): Promise<void> {
    const driver = new PaginationDriver(seed, frontier)

    for (let task = driver.currentTask(); task && !this.halted; task = driver.currentTask()) {
      this.discoveryPagesVisited += 1

      let result: FetchResult
      try {
        result = await this.workerPool.fetch(task)
      } catch (error) {
        this.fail(error)
        return
      }
      if (this.halted) break

      if (!result.ok) {
        this.reportFetchFailure(result)
        driver.fail(result.reason)
        continue
      }

      const tasks = driver.advance(parseSearchPage(result.body, task.url))
      for (const detail of tasks) {
        this.dispatch(detail)
      }
    }

    this.context.logger.info('Search walk finished', { seed, state: driver.state.kind })
  }

  private dispatch(task: CrawlTask): void {
    this.detailTasksDispatched += 1
    const pending = this.processDetail(task).catch((error: unknown) => this.fail(error))
    this.inflight.add(pending)
    void pending.finally(() => this.inflight.delete(pending))
  }

  private async processDetail(task: CrawlTask): Promise<void> {
    const result = await this.workerPool.fetch(task)
    if (!result.ok) {
      this.reportFetchFailure(result)
      return
    }

    const read = this.readListing(result.body, task.url)
    if (!read.ok) {
      this.reportExtractionFailure(task.url, read.reason, read.details)
      return
    }
    const { record } = read

    if (await this.dedupStore.checkAndMark(record.id)) {
      this.duplicates += 1
      this.skipChannel.report({ url: task.url, reason: 'DUPLICATE', details: record.id })
      return
    }

    if (this.recordsEmitted >= this.maxRecords) return
    this.recordsEmitted += 1
    await this.sink.emit(record)
  }

  /**
   * Extract and normalize one page. Anything either step throws stays local to the page.
   */
  private readListing(
    html: string,
    url: string
  ): { ok: true; record: ListingRecord } | { ok: false; reason: ExtractFailureReason; details?: string } {
    try {
      const extracted = this.extractor.extract(html, url)
      return extracted.ok ? { ok: true, record: normalize(extracted.fields) } : extracted
    } catch (error) {
      return {
        ok: false,
        reason: 'UNREADABLE_PAGE',
        details: error instanceof Error ? error.message : String(error),
      }
    }
  }

  private reportExtractionFailure(url: string, reason: ExtractFailureReason, details?: string): void {
    this.extractionFailures += 1
    const error = new ExtractionFailedError(url, reason)
    this.context.logger.info('Extraction failed', { ...errorLogMeta(classifyError(error)), details })
    this.skipChannel.report({
      url,
      reason: 'EXTRACTION_FAILED',
      details: details ? `${reason}: ${details}` : reason,
    })
  }

  private reportFetchFailure(result: Extract<FetchResult, { ok: false }>): void {
    const { task, reason, lastFailure } = result

    if (reason === 'CANCELLED') {
      this.cancelled += 1
    } else {
      if (task.kind === 'detail') this.fetchFailures += 1
      const error = new FetchFailedError(task.url, result.attempts, lastFailure?.error)
      this.context.logger.warn('Fetch failed', { kind: task.kind, reason, ...errorLogMeta(classifyError(error)) })
    }

    this.skipChannel.report({ url: task.url, reason, details: lastFailure?.error })
  }

  /**
   * First fatal error wins; dispatch stops and queued work is cancelled.
   */
  private fail(error: unknown): void {
    if (this.fatalError !== undefined) return
    this.fatalError = error
    this.context.logger.error('Crawl failed', errorLogMeta(classifyError(error)), error)
    this.workerPool.stop()
  }

  private async closeDedupStore(): Promise<void> {
    try {
      await this.dedupStore.close()
    } catch (error) {
      this.context.logger.warn('Failed to close dedup store', errorLogMeta(classifyError(error)), error)
    }
  }
}
