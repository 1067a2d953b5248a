/**
 * Listing crawler: discovery, fetching, extraction and normalization of
 * car listings into ListingRecord values.
 */

export * from './types.js'
export * from './errors.js'
export { CrawlPipeline, DEFAULT_MAX_RECORDS, loggingSkipChannel } from './pipeline.js'
export type { CrawlPipelineOptions, CrawlRunSummary } from './pipeline.js'
export { createCrawlerRuntime } from './runner.js'
export type { CrawlerRuntime, CrawlerRuntimeOptions } from './runner.js'
export { CrawlFrontier, PaginationDriver } from './discovery/pagination-driver.js'
export type { DriverState } from './discovery/pagination-driver.js'
export { parseSearchPage } from './discovery/search-page.js'
export type { SearchPage } from './discovery/search-page.js'
export { FieldExtractor } from './extract/extractor.js'
export { FIELD_RULES, SEARCH_SELECTORS } from './extract/selectors.js'
export { normalize } from './normalize/normalizer.js'
export { FetchWorkerPool } from './fetch/worker-pool.js'
export { HttpFetcher, looksLikeBlockedPage } from './fetch/http-fetcher.js'
export { ProxyPool } from './fetch/proxy-pool.js'
export { TokenBucketRateLimiter } from './fetch/rate-limiter.js'
export { createUndiciTransport } from './fetch/transport.js'
export type { Transport, TransportRequest, TransportResponse } from './fetch/transport.js'
export { MemoryDedupStore, RedisDedupStore } from './process/dedup-store.js'
export type { DedupRedisClient } from './process/dedup-store.js'
export { buildDealerSummary } from './process/dealer-summary.js'
export type { DealerSummaryEntry } from './process/dealer-summary.js'
export { loadCrawlConfig } from '../config/settings.js'
export type { CrawlConfig, CrawlConfigInput } from '../config/settings.js'
export { createSink, MemorySink } from '../output/sinks.js'
export type { OutputSink } from '../output/sinks.js'
