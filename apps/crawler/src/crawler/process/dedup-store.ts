/**
 * Run-Level Deduplication
 *
 * Tracks listing ids already emitted in the current run. Nothing survives
 * the run: the memory store dies with the process, the Redis set is deleted
 * on close() and expires on its own if the process dies first.
 */

import type { DedupStore } from '../types.js'
import { loggers } from '../../config/logger.js'

const log = loggers.redis

/** TTL for dedup sets: 2 hours (covers long-running runs + buffer) */
export const DEDUP_SET_TTL_SECONDS = 2 * 60 * 60

/** Redis key prefix for dedup sets */
export const DEDUP_KEY_PREFIX = 'crawl:dedup:'

/**
 * In-process set. checkAndMark has no await between the check and the add,
 * so it is atomic on the event loop.
 */
export class MemoryDedupStore implements DedupStore {
  private readonly ids = new Set<string>()

  async seen(id: string): Promise<boolean> {
    return this.ids.has(id)
  }

  async mark(id: string): Promise<void> {
    this.ids.add(id)
  }

  async checkAndMark(id: string): Promise<boolean> {
    if (this.ids.has(id)) return true
    this.ids.add(id)
    return false
  }

  async size(): Promise<number> {
    return this.ids.size
  }

  async close(): Promise<void> {
    this.ids.clear()
  }
}

/**
 * The Redis commands the store needs. An ioredis client satisfies it.
 */
export interface DedupRedisClient {
  sadd(key: string, member: string): Promise<number>
  sismember(key: string, member: string): Promise<number>
  scard(key: string): Promise<number>
  expire(key: string, seconds: number): Promise<number>
  del(key: string): Promise<number>
}

/**
 * One Redis set per run, shared by every process crawling that run.
 * SADD is the atomic check-and-mark.
 */
export class RedisDedupStore implements DedupStore {
  readonly key: string

  constructor(
    private readonly redis: DedupRedisClient,
    readonly runId: string,
    private readonly ttlSeconds = DEDUP_SET_TTL_SECONDS
  ) {
    this.key = `${DEDUP_KEY_PREFIX}${runId}`
  }

  async seen(id: string): Promise<boolean> {
    return (await this.redis.sismember(this.key, id)) === 1
  }

  async mark(id: string): Promise<void> {
    await this.checkAndMark(id)
  }

  async checkAndMark(id: string): Promise<boolean> {
    // SADD returns 1 if new member added, 0 if already exists
    const added = await this.redis.sadd(this.key, id)

    // Set/refresh TTL on the set (only if we added a new member)
    if (added === 1) {
      await this.redis.expire(this.key, this.ttlSeconds)
    }

    return added === 0
  }

  async size(): Promise<number> {
    return this.redis.scard(this.key)
  }

  async close(): Promise<void> {
    await this.redis.del(this.key)
    log.debug('Dedup set removed', { runId: this.runId, key: this.key })
  }
}
