/**
 * Wires a validated CrawlConfig into a ready-to-run pipeline and owns the
 * resources it opens (HTTP dispatchers, Redis connection).
 */

import { randomUUID } from 'node:crypto'
import type { CrawlConfig } from '../config/settings.js'
import { createRedisClient } from '../config/redis.js'
import { loggers } from '../config/logger.js'
import type { DedupStore, RecordSink, SkipChannel } from './types.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { ProxyPool } from './fetch/proxy-pool.js'
import { TokenBucketRateLimiter } from './fetch/rate-limiter.js'
import { createUndiciTransport, type Transport } from './fetch/transport.js'
import { FetchWorkerPool } from './fetch/worker-pool.js'
import { MemoryDedupStore, RedisDedupStore, type DedupRedisClient } from './process/dedup-store.js'
import { CrawlPipeline } from './pipeline.js'

export interface CrawlerRuntimeOptions {
  sink: RecordSink
  skipChannel?: SkipChannel
  /** HTTP transport; an undici transport is created when absent */
  transport?: Transport
  /** Redis client for the redis dedup backend; one is created when absent */
  redis?: DedupRedisClient
  runId?: string
}

export interface CrawlerRuntime {
  pipeline: CrawlPipeline
  proxyPool: ProxyPool
  /** Release connections opened for the run */
  close(): Promise<void>
}

export function createCrawlerRuntime(config: CrawlConfig, options: CrawlerRuntimeOptions): CrawlerRuntime {
  const runId = options.runId ?? randomUUID()
  const logger = loggers.crawler.child({ runId })
  const closers: Array<() => Promise<unknown>> = []

  let transport = options.transport
  if (!transport) {
    const undici = createUndiciTransport()
    transport = undici.transport
    closers.push(() => undici.close())
  }

  const fetcher = new HttpFetcher({
    transport,
    userAgent: config.userAgent,
    defaults: {
      timeoutMs: config.timeoutMs,
      maxSizeBytes: config.maxResponseBytes,
      headers: config.headers,
    },
  })

  const proxyPool = new ProxyPool(config.proxies, { config: config.proxyPool })

  const rateLimiter = new TokenBucketRateLimiter({
    defaults: { requestsPerSecond: config.rateLimit.requestsPerSecond, burst: config.rateLimit.burst },
    domainOverrides: new Map(Object.entries(config.rateLimit.domainOverrides)),
  })

  const workerPool = new FetchWorkerPool({
    fetcher,
    proxyPool,
    rateLimiter,
    concurrency: config.concurrency,
    retryPolicy: config.retry,
  })

  let dedupStore: DedupStore
  if (config.dedup.backend === 'redis') {
    let redis = options.redis
    if (!redis) {
      const client = createRedisClient()
      redis = client
      closers.push(() => client.quit())
    }
    dedupStore = new RedisDedupStore(redis, runId)
  } else {
    dedupStore = new MemoryDedupStore()
  }

  logger.info('Crawler configured', {
    startUrls: config.startUrls.length,
    maxRecords: config.maxRecords,
    concurrency: config.concurrency,
    proxies: proxyPool.size,
    dedup: config.dedup.backend,
  })

  const pipeline = new CrawlPipeline({
    startUrls: config.startUrls,
    maxRecords: config.maxRecords,
    workerPool,
    sink: options.sink,
    skipChannel: options.skipChannel,
    dedupStore,
    context: { runId, logger },
  })

  return {
    pipeline,
    proxyPool,
    async close() {
      for (const close of closers.reverse()) {
        await close()
      }
    },
  }
}
