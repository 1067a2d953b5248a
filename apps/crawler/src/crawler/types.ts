/**
 * Crawler Core Types
 *
 * Records, tasks, fetch outcomes and the collaborator interfaces
 * (sink, skip channel, fetcher, rate limiter, dedup store).
 */

import type { ILogger } from '@carlist/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// ListingRecord - Output Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Currencies recognised by the price normalizer.
 * No conversion happens between them.
 */
export type CurrencyCode = 'EUR' | 'USD' | 'GBP' | 'CHF'

export type MileageUnit = 'km' | 'mi'

export interface PriceInfo {
  /** Price as displayed, whitespace collapsed (e.g. "€ 31,980") */
  display: string
  /** Parsed amount; absent when the display string has no number */
  rawPrice?: number
  currency?: CurrencyCode
}

export interface MileageInfo {
  display: string
  value?: number
  unit?: MileageUnit
}

export interface PowerInfo {
  display: string
  kw?: number
  hp?: number
}

export interface RegistrationDate {
  display: string
  month?: number
  year?: number
}

export interface EngineSize {
  display: string
  cc?: number
}

export interface DealerInfo {
  name?: string
  ratingCount?: number
}

export interface ContactInfo {
  name?: string
  phone?: string
}

/**
 * One normalized listing.
 *
 * IMPORTANT: numeric fields are absent when unparseable, never 0.
 * Consumers rely on that to tell "unknown" from "explicitly zero".
 */
export interface ListingRecord {
  /** Last path segment of the canonical listing URL. Immutable. */
  id: string
  title: string
  url: string

  mark?: string
  model?: string
  modelVersion?: string
  location?: string
  dealer?: DealerInfo

  price?: PriceInfo
  mileage?: MileageInfo
  gearbox?: string
  firstRegistration?: RegistrationDate
  fuelType?: string
  power?: PowerInfo

  sellerType?: string
  contact?: ContactInfo

  bodyType?: string
  drivetrain?: string
  seats?: number
  engineSize?: EngineSize
  gears?: number
  emissionClass?: string

  comfort: string[]
  media: string[]
  safety: string[]
  extras: string[]

  colour?: string
  manufacturerColour?: string
  productionDate?: string

  images: string[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Raw Extraction Types
// ═══════════════════════════════════════════════════════════════════════════════

export const SCALAR_FIELDS = [
  'title',
  'pageUrl',
  'mark',
  'model',
  'modelVersion',
  'location',
  'dealerName',
  'dealerRatings',
  'price',
  'mileage',
  'gearbox',
  'firstRegistration',
  'fuelType',
  'power',
  'sellerType',
  'contactName',
  'contactPhone',
  'bodyType',
  'drivetrain',
  'seats',
  'engineSize',
  'gears',
  'emissionClass',
  'colour',
  'manufacturerColour',
  'productionDate',
] as const

export type ScalarField = (typeof SCALAR_FIELDS)[number]

export const LIST_FIELDS = ['comfort', 'media', 'safety', 'extras', 'images'] as const

export type ListField = (typeof LIST_FIELDS)[number]

/**
 * Fields as found in the markup, before any cleanup.
 * `title` and `url` are guaranteed by the extractor's mandatory anchors.
 */
export type RawFieldMap = {
  title: string
  url: string
} & Partial<Record<Exclude<ScalarField, 'title'>, string>> &
  Partial<Record<ListField, string[]>>

export type ExtractFailureReason =
  | 'TITLE_NOT_FOUND' // No title anchor
  | 'ANCHORS_NOT_FOUND' // Title found but neither price nor page URL anchor
  | 'BLOCKED_PAGE' // Markup is an anti-bot or captcha page
  | 'EMPTY_PAGE'
  | 'UNREADABLE_PAGE' // Extraction or normalization threw

export type ExtractResult =
  | { ok: true; fields: RawFieldMap }
  | { ok: false; reason: ExtractFailureReason; details?: string }

// ═══════════════════════════════════════════════════════════════════════════════
// Crawl Tasks
// ═══════════════════════════════════════════════════════════════════════════════

export type CrawlTaskKind = 'discovery' | 'detail'

export interface CrawlTask {
  url: string
  kind: CrawlTaskKind
  /** Search result page number, discovery tasks only */
  page?: number
  /** Attempts already made for this task */
  attempt: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Classification of one HTTP attempt.
 * - ok: 2xx with content
 * - blocked: 403/429 or block signature in the body (retried on another proxy)
 * - transient: timeout, connection failure, empty 2xx (retried)
 * - permanent: any other non-2xx (abandoned)
 */
export type AttemptStatus = 'ok' | 'blocked' | 'transient' | 'permanent'

export interface AttemptResult {
  status: AttemptStatus
  statusCode?: number
  body?: string
  /** Set for timeouts so proxy health can weigh them differently */
  timedOut?: boolean
  error?: string
  durationMs: number
}

export interface FetchOptions {
  /** Request timeout in ms */
  timeoutMs?: number

  /** Maximum response size in bytes */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** Egress proxy URL; direct connection when absent */
  proxyUrl?: string
}

/**
 * Performs a single HTTP attempt. Retries belong to the worker pool.
 */
export interface Fetcher {
  fetchOnce(url: string, options?: FetchOptions): Promise<AttemptResult>
}

export type FetchFailureReason = 'PERMANENT' | 'FETCH_FAILED' | 'CANCELLED'

export type FetchResult =
  | {
      ok: true
      task: CrawlTask
      statusCode: number
      body: string
      attempts: number
      durationMs: number
    }
  | {
      ok: false
      task: CrawlTask
      reason: FetchFailureReason
      lastFailure?: AttemptResult
      attempts: number
      durationMs: number
    }

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 15000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'

export const DEFAULT_FETCH_HEADERS = {
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Limiter
// ═══════════════════════════════════════════════════════════════════════════════

export type Admission = { granted: true } | { granted: false; waitMs: number }

/**
 * Per-host admission control.
 *
 * DOMAIN DEFINITION: limits apply to the registrable domain (eTLD+1), so
 * www.example.com and m.example.com share one bucket.
 */
export interface RateLimiter {
  /** Non-blocking: a permit, or how long to wait before asking again */
  admit(hostOrUrl: string): Admission

  /** Suspends until a permit is granted */
  acquire(hostOrUrl: string): Promise<void>
}

export interface RateLimitConfig {
  /** Token refill rate */
  requestsPerSecond: number

  /** Bucket capacity */
  burst: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  requestsPerSecond: 2,
  burst: 4,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Proxy Pool
// ═══════════════════════════════════════════════════════════════════════════════

/** What happened on a leased proxy; drives its health score */
export type ProxyOutcome = 'success' | 'transient' | 'timeout' | 'blocked'

export interface ProxyPoolConfig {
  /** Concurrent leases allowed per handle (default: 1) */
  maxLeasesPerHandle: number

  /** Health at or below this quarantines the handle (default: -5) */
  quarantineThreshold: number

  /** Quarantine length in ms (default: 60000) */
  cooldownMs: number

  /** Half-life of health decay toward the neutral baseline (default: 60000) */
  healthHalfLifeMs: number

  /** How long a worker backs off when the whole pool is quarantined (default: 5000) */
  unavailableBackoffMs: number

  /** Pool-wide unavailability longer than this fails the run (default: 120000) */
  unavailableWindowMs: number
}

export const DEFAULT_PROXY_POOL_CONFIG: ProxyPoolConfig = {
  maxLeasesPerHandle: 1,
  quarantineThreshold: -5,
  cooldownMs: 60_000,
  healthHalfLifeMs: 60_000,
  unavailableBackoffMs: 5_000,
  unavailableWindowMs: 120_000,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline Collaborators
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Output sink. Serialization is the sink's business.
 */
export interface RecordSink {
  emit(record: ListingRecord): void | Promise<void>
}

export type SkipReason =
  | 'PERMANENT'
  | 'FETCH_FAILED'
  | 'EXTRACTION_FAILED'
  | 'DUPLICATE'
  | 'CANCELLED'

export interface SkipEntry {
  url: string
  reason: SkipReason
  details?: string
}

/**
 * Side channel for pages that produced no record.
 */
export interface SkipChannel {
  report(entry: SkipEntry): void
}

/**
 * Run-scoped set of listing ids already emitted.
 */
export interface DedupStore {
  seen(id: string): Promise<boolean>
  mark(id: string): Promise<void>
  /** Atomic check-then-mark; true when the id was already present */
  checkAndMark(id: string): Promise<boolean>
  size(): Promise<number>
  close(): Promise<void>
}

/**
 * How a run ended.
 * - EXHAUSTED: every search walk ran out of pages
 * - BUDGET_REACHED: maxRecords detail tasks dispatched
 * - STOPPED: stop() was called
 * - FAILED: fatal error (proxy pool unavailable)
 */
export type RunTerminalState = 'EXHAUSTED' | 'BUDGET_REACHED' | 'STOPPED' | 'FAILED'

export interface CrawlContext {
  runId: string
  logger: ILogger
}
