import { describe, it, expect } from 'vitest'
import {
  DEDUP_SET_TTL_SECONDS,
  MemoryDedupStore,
  RedisDedupStore,
  type DedupRedisClient,
} from '../process/dedup-store.js'

/** In-process stand-in for the Redis set commands */
class FakeRedis implements DedupRedisClient {
  readonly sets = new Map<string, Set<string>>()
  readonly expiries: Array<[string, number]> = []

  async sadd(key: string, member: string): Promise<number> {
    const set = this.sets.get(key) ?? new Set<string>()
    this.sets.set(key, set)
    if (set.has(member)) return 0
    set.add(member)
    return 1
  }

  async sismember(key: string, member: string): Promise<number> {
    return this.sets.get(key)?.has(member) ? 1 : 0
  }

  async scard(key: string): Promise<number> {
    return this.sets.get(key)?.size ?? 0
  }

  async expire(key: string, seconds: number): Promise<number> {
    this.expiries.push([key, seconds])
    return this.sets.has(key) ? 1 : 0
  }

  async del(key: string): Promise<number> {
    return this.sets.delete(key) ? 1 : 0
  }
}

describe('MemoryDedupStore', () => {
  it('reports an id as seen only after it is marked', async () => {
    const store = new MemoryDedupStore()

    expect(await store.checkAndMark('bmw-x5-1')).toBe(false)
    expect(await store.checkAndMark('bmw-x5-1')).toBe(true)
    expect(await store.seen('bmw-x5-1')).toBe(true)
    expect(await store.seen('audi-a4-2')).toBe(false)
  })

  it('marks idempotently', async () => {
    const store = new MemoryDedupStore()

    await store.mark('a')
    await store.mark('a')

    expect(await store.size()).toBe(1)
  })

  it('lets exactly one of many concurrent checks win', async () => {
    const store = new MemoryDedupStore()

    const results = await Promise.all(Array.from({ length: 10 }, () => store.checkAndMark('same-id')))

    expect(results.filter(duplicate => !duplicate)).toHaveLength(1)
  })

  it('forgets everything on close', async () => {
    const store = new MemoryDedupStore()
    await store.mark('a')

    await store.close()

    expect(await store.size()).toBe(0)
  })
})

describe('RedisDedupStore', () => {
  it('keeps one set per run', async () => {
    const redis = new FakeRedis()
    const first = new RedisDedupStore(redis, 'run-1')
    const second = new RedisDedupStore(redis, 'run-2')

    expect(await first.checkAndMark('a')).toBe(false)
    expect(await second.checkAndMark('a')).toBe(false)
    expect(await first.checkAndMark('a')).toBe(true)
    expect(first.key).toBe('crawl:dedup:run-1')
    expect([...redis.sets.keys()]).toEqual(['crawl:dedup:run-1', 'crawl:dedup:run-2'])
  })

  it('refreshes the TTL only when a member is added', async () => {
    const redis = new FakeRedis()
    const store = new RedisDedupStore(redis, 'run-1')

    await store.mark('a')
    await store.mark('a')
    await store.mark('b')

    expect(redis.expiries).toEqual([
      ['crawl:dedup:run-1', DEDUP_SET_TTL_SECONDS],
      ['crawl:dedup:run-1', DEDUP_SET_TTL_SECONDS],
    ])
  })

  it('answers seen and size from the set', async () => {
    const store = new RedisDedupStore(new FakeRedis(), 'run-1', 60)
    await store.mark('a')
    await store.mark('b')

    expect(await store.seen('a')).toBe(true)
    expect(await store.seen('c')).toBe(false)
    expect(await store.size()).toBe(2)
  })

  it('deletes the run set on close', async () => {
    const redis = new FakeRedis()
    const store = new RedisDedupStore(redis, 'run-1')
    await store.mark('a')

    await store.close()

    expect(redis.sets.has('crawl:dedup:run-1')).toBe(false)
  })
})
