import { describe, it, expect } from 'vitest'
import { TokenBucketRateLimiter } from '../fetch/rate-limiter.js'

function fakeClock(start = 1_000_000) {
  let now = start
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms
    },
  }
}

describe('TokenBucketRateLimiter', () => {
  it('grants up to burst immediately, then asks the caller to wait', () => {
    const clock = fakeClock()
    const limiter = new TokenBucketRateLimiter({
      defaults: { requestsPerSecond: 2, burst: 3 },
      now: clock.now,
    })

    expect(limiter.admit('https://www.example.com/a')).toEqual({ granted: true })
    expect(limiter.admit('https://www.example.com/b')).toEqual({ granted: true })
    expect(limiter.admit('https://www.example.com/c')).toEqual({ granted: true })
    expect(limiter.admit('https://www.example.com/d')).toEqual({ granted: false, waitMs: 500 })
  })

  it('refills at requestsPerSecond', () => {
    const clock = fakeClock()
    const limiter = new TokenBucketRateLimiter({
      defaults: { requestsPerSecond: 2, burst: 1 },
      now: clock.now,
    })

    expect(limiter.admit('example.com').granted).toBe(true)
    expect(limiter.admit('example.com').granted).toBe(false)

    clock.advance(500)
    expect(limiter.admit('example.com').granted).toBe(true)
  })

  it('shares one bucket across subdomains of a registrable domain', () => {
    const clock = fakeClock()
    const limiter = new TokenBucketRateLimiter({
      defaults: { requestsPerSecond: 1, burst: 1 },
      now: clock.now,
    })

    expect(limiter.admit('https://www.example.com/').granted).toBe(true)
    expect(limiter.admit('https://m.example.com/').granted).toBe(false)
  })

  it('keeps buckets of different domains independent', () => {
    const clock = fakeClock()
    const limiter = new TokenBucketRateLimiter({
      defaults: { requestsPerSecond: 1, burst: 1 },
      now: clock.now,
    })

    expect(limiter.admit('https://www.example.com/').granted).toBe(true)
    expect(limiter.admit('https://www.example.org/').granted).toBe(true)
  })

  it('applies per-domain overrides', () => {
    const clock = fakeClock()
    const limiter = new TokenBucketRateLimiter({
      defaults: { requestsPerSecond: 1, burst: 1 },
      domainOverrides: new Map([['example.com', { requestsPerSecond: 10, burst: 2 }]]),
      now: clock.now,
    })

    expect(limiter.admit('example.com').granted).toBe(true)
    expect(limiter.admit('example.com').granted).toBe(true)
    expect(limiter.admit('example.com')).toEqual({ granted: false, waitMs: 100 })
  })

  it('acquire sleeps for the advertised wait and then proceeds', async () => {
    const clock = fakeClock()
    const sleeps: number[] = []
    const limiter = new TokenBucketRateLimiter({
      defaults: { requestsPerSecond: 4, burst: 1 },
      now: clock.now,
      sleep: async ms => {
        sleeps.push(ms)
        clock.advance(ms)
      },
    })

    await limiter.acquire('example.com')
    await limiter.acquire('example.com')

    expect(sleeps).toEqual([250])
  })
})
