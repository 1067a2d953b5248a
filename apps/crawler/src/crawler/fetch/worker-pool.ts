/**
 * Fetch Worker Pool
 *
 * Fixed concurrency over a FIFO queue (p-limit). Each attempt:
 *   rate limiter permit -> proxy lease -> one GET -> release lease with outcome -> classify
 *
 * BLOCKED and TRANSIENT attempts are retried with exponential backoff on a
 * different proxy when one is available. PERMANENT is never retried.
 *
 * A proxy pool that stays fully quarantined past its window is fatal: the
 * task's promise rejects with ProxyPoolUnavailableError and the pool stops.
 */

import pLimit, { type LimitFunction } from 'p-limit'
import type {
  AttemptResult,
  CrawlTask,
  Fetcher,
  FetchOptions,
  FetchResult,
  ProxyOutcome,
  RateLimiter,
  RetryPolicy,
} from '../types.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'
import { ProxyPoolUnavailableError } from '../errors.js'
import { loggers } from '../../config/logger.js'
import type { ProxyLease, ProxyPool } from './proxy-pool.js'
import { nextStep } from './retry.js'

const log = loggers.fetch

export const DEFAULT_CONCURRENCY = 8

export interface FetchWorkerPoolOptions {
  fetcher: Fetcher
  proxyPool: ProxyPool
  rateLimiter: RateLimiter
  concurrency?: number
  retryPolicy?: RetryPolicy
  /** Passed to every attempt; the lease decides proxyUrl */
  fetchOptions?: Omit<FetchOptions, 'proxyUrl'>
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

interface QueuedTask {
  task: CrawlTask
  resolve: (result: FetchResult) => void
}

export function outcomeFor(result: AttemptResult): ProxyOutcome {
  switch (result.status) {
    case 'ok':
    case 'permanent':
      return 'success'
    case 'blocked':
      return 'blocked'
    case 'transient':
      return result.timedOut ? 'timeout' : 'transient'
  }
}

export class FetchWorkerPool {
  private readonly fetcher: Fetcher
  private readonly proxyPool: ProxyPool
  private readonly rateLimiter: RateLimiter
  private readonly concurrency: number
  private readonly retryPolicy: RetryPolicy
  private readonly fetchOptions: Omit<FetchOptions, 'proxyUrl'>
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  private readonly limit: LimitFunction
  /** Tasks waiting for a slot */
  private readonly queued = new Set<QueuedTask>()
  /** Every task not yet settled, queued or running */
  private readonly unsettled = new Set<Promise<FetchResult>>()
  private stopped = false

  constructor(options: FetchWorkerPoolOptions) {
    this.fetcher = options.fetcher
    this.proxyPool = options.proxyPool
    this.rateLimiter = options.rateLimiter
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.fetchOptions = options.fetchOptions ?? {}
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new Error(`Invalid concurrency: ${this.concurrency}`)
    }
    if (this.retryPolicy.maxAttempts < 1) {
      throw new Error(`Invalid maxAttempts: ${this.retryPolicy.maxAttempts}`)
    }
    this.limit = pLimit(this.concurrency)
  }

  get isStopped(): boolean {
    return this.stopped
  }

  get pending(): number {
    return this.unsettled.size
  }

  /**
   * Queue a task. Resolves with its final result; rejects only on a fatal error.
   */
  fetch(task: CrawlTask): Promise<FetchResult> {
    if (this.stopped) {
      return Promise.resolve(cancelled(task, 0))
    }

    const result = new Promise<FetchResult>((resolve, reject) => {
      const entry: QueuedTask = { task, resolve }
      this.queued.add(entry)
      void this.limit(() => {
        this.queued.delete(entry)
        return this.execute(task)
      }).then(resolve, (error: unknown) => {
        if (error instanceof ProxyPoolUnavailableError) {
          this.stop()
        }
        reject(error)
      })
    })

    this.unsettled.add(result)
    const settle = () => {
      this.unsettled.delete(result)
    }
    void result.then(settle, settle)
    return result
  }

  /**
   * Stop dispatching. Queued tasks resolve as CANCELLED; in-flight attempts finish.
   */
  stop(): void {
    if (this.stopped) return
    this.stopped = true

    this.limit.clearQueue()
    const queued = [...this.queued]
    this.queued.clear()
    for (const entry of queued) {
      entry.resolve(cancelled(entry.task, 0))
    }
    if (queued.length > 0) {
      log.info('Worker pool stopped', { cancelled: queued.length, inFlight: this.limit.activeCount })
    }
  }

  /**
   * Resolves once nothing is queued or running.
   */
  async drain(): Promise<void> {
    while (this.unsettled.size > 0) {
      await Promise.allSettled([...this.unsettled])
    }
  }

  private async execute(task: CrawlTask): Promise<FetchResult> {
    const startTime = this.now()
    const triedProxies = new Set<string>()
    let attempt = task.attempt + 1
    let lastFailure: AttemptResult | undefined

    for (;;) {
      await this.rateLimiter.acquire(task.url)
      const lease = await this.leaseProxy(triedProxies)

      let result: AttemptResult
      try {
        result = await this.fetcher.fetchOnce(task.url, {
          ...this.fetchOptions,
          proxyUrl: lease.proxyUrl,
        })
      } catch (error) {
        result = {
          status: 'transient',
          durationMs: this.now() - startTime,
          error: error instanceof Error ? error.message : String(error),
        }
      }
      this.proxyPool.release(lease, outcomeFor(result))
      triedProxies.add(lease.handleId)

      const decision = nextStep(this.retryPolicy, attempt, result.status)
      const attempts = attempt - task.attempt
      const durationMs = this.now() - startTime
      const done: CrawlTask = { ...task, attempt }

      switch (decision.action) {
        case 'done':
          return {
            ok: true,
            task: done,
            statusCode: result.statusCode ?? 200,
            body: result.body ?? '',
            attempts,
            durationMs,
          }

        case 'abandon':
          log.debug('Permanent failure', { url: task.url, statusCode: result.statusCode })
          return { ok: false, task: done, reason: 'PERMANENT', lastFailure: result, attempts, durationMs }

        case 'give_up':
          log.warn('Retries exhausted', {
            url: task.url,
            attempts,
            lastStatus: result.status,
            error: result.error,
          })
          return { ok: false, task: done, reason: 'FETCH_FAILED', lastFailure: result, attempts, durationMs }

        case 'retry':
          lastFailure = result
          log.debug('Retrying', {
            url: task.url,
            attempt,
            status: result.status,
            delayMs: decision.delayMs,
            proxyId: lease.handleId,
          })
          await this.sleep(decision.delayMs)
          if (this.stopped) {
            return cancelled(done, attempts, lastFailure, this.now() - startTime)
          }
          attempt = decision.nextAttempt
          break
      }
    }
  }

  /**
   * Lease a proxy, preferring ones this task has not tried.
   * Backs off while the whole pool is quarantined; past the window it is fatal.
   */
  private async leaseProxy(exclude: ReadonlySet<string>): Promise<ProxyLease> {
    let unavailableSince: number | undefined

    for (;;) {
      const acquisition = await this.proxyPool.acquire({ exclude })
      if (acquisition.ok) {
        return acquisition.lease
      }

      const now = this.now()
      if (unavailableSince === undefined) unavailableSince = now
      const unavailableForMs = now - unavailableSince
      if (unavailableForMs > this.proxyPool.config.unavailableWindowMs) {
        log.error('Proxy pool unavailable past window', {
          unavailableForMs,
          windowMs: this.proxyPool.config.unavailableWindowMs,
        })
        throw new ProxyPoolUnavailableError(unavailableForMs)
      }

      log.warn('All proxies quarantined, backing off', {
        retryAfterMs: acquisition.retryAfterMs,
        backoffMs: this.proxyPool.config.unavailableBackoffMs,
      })
      await this.sleep(this.proxyPool.config.unavailableBackoffMs)
    }
  }
}

function cancelled(
  task: CrawlTask,
  attempts: number,
  lastFailure?: AttemptResult,
  durationMs = 0
): FetchResult {
  return { ok: false, task, reason: 'CANCELLED', lastFailure, attempts, durationMs }
}
