/**
 * Token Bucket Rate Limiter
 *
 * One bucket per registrable domain (eTLD+1): capacity `burst`, refilled at
 * `requestsPerSecond`. `admit` is synchronous, so a check-and-take is atomic
 * on the event loop and buckets never go negative.
 */

import type { Admission, RateLimiter, RateLimitConfig } from '../types.js'
import { DEFAULT_RATE_LIMIT } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'
import { loggers } from '../../config/logger.js'

const log = loggers.fetch

interface Bucket {
  tokens: number
  refilledAt: number
}

export interface TokenBucketRateLimiterOptions {
  defaults?: RateLimitConfig

  /** Override default rate limits per domain */
  domainOverrides?: Map<string, RateLimitConfig>

  /** Clock, injectable for tests */
  now?: () => number

  sleep?: (ms: number) => Promise<void>
}

export class TokenBucketRateLimiter implements RateLimiter {
  private readonly defaults: RateLimitConfig
  private readonly domainOverrides: Map<string, RateLimitConfig>
  private readonly buckets = new Map<string, Bucket>()
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: TokenBucketRateLimiterOptions = {}) {
    this.defaults = options.defaults ?? DEFAULT_RATE_LIMIT
    this.domainOverrides = options.domainOverrides ?? new Map()
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))

    if (this.defaults.requestsPerSecond <= 0 || this.defaults.burst < 1) {
      throw new Error('Rate limit needs requestsPerSecond > 0 and burst >= 1')
    }
  }

  admit(hostOrUrl: string): Admission {
    const domain = this.domainOf(hostOrUrl)
    const config = this.getConfig(domain)
    const now = this.now()

    let bucket = this.buckets.get(domain)
    if (!bucket) {
      bucket = { tokens: config.burst, refilledAt: now }
      this.buckets.set(domain, bucket)
    }

    const elapsedMs = Math.max(0, now - bucket.refilledAt)
    bucket.tokens = Math.min(config.burst, bucket.tokens + (elapsedMs / 1000) * config.requestsPerSecond)
    bucket.refilledAt = now

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1
      return { granted: true }
    }

    const waitMs = Math.ceil(((1 - bucket.tokens) / config.requestsPerSecond) * 1000)
    return { granted: false, waitMs }
  }

  /**
   * Suspends until the domain's bucket grants a permit.
   */
  async acquire(hostOrUrl: string): Promise<void> {
    for (;;) {
      const admission = this.admit(hostOrUrl)
      if (admission.granted) return
      log.debug('Rate limited', { domain: this.domainOf(hostOrUrl), waitMs: admission.waitMs })
      await this.sleep(admission.waitMs)
    }
  }

  private domainOf(hostOrUrl: string): string {
    try {
      return getRegistrableDomain(hostOrUrl)
    } catch {
      return hostOrUrl.toLowerCase()
    }
  }

  private getConfig(domain: string): RateLimitConfig {
    return this.domainOverrides.get(domain) ?? this.defaults
  }
}
