import { describe, it, expect } from 'vitest'
import { DIRECT_HANDLE_ID, ProxyPool, type ProxyLease } from '../fetch/proxy-pool.js'

const PROXIES = ['http://10.0.0.1:8080', 'http://10.0.0.2:8080']

function fakeClock(start = 1_000_000) {
  let now = start
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms
    },
  }
}

async function lease(pool: ProxyPool, exclude?: ReadonlySet<string>): Promise<ProxyLease> {
  const acquisition = await pool.acquire({ exclude })
  if (!acquisition.ok) {
    throw new Error(`pool unavailable for ${acquisition.retryAfterMs}ms`)
  }
  return acquisition.lease
}

describe('ProxyPool', () => {
  it('runs in direct mode when no proxies are configured', async () => {
    const pool = new ProxyPool([])

    const first = await lease(pool)
    const second = await lease(pool)

    expect(pool.isDirect).toBe(true)
    expect(first.handleId).toBe(DIRECT_HANDLE_ID)
    expect(first.proxyUrl).toBeUndefined()
    expect(second.handleId).toBe(DIRECT_HANDLE_ID)
  })

  it('never quarantines the direct handle', async () => {
    const pool = new ProxyPool([])
    for (let i = 0; i < 5; i++) {
      pool.release(await lease(pool), 'blocked')
    }
    expect(pool.isQuarantined(DIRECT_HANDLE_ID)).toBe(false)
  })

  it('ignores blank and duplicate addresses', () => {
    const pool = new ProxyPool(['http://10.0.0.1:8080', ' ', 'http://10.0.0.1:8080'])
    expect(pool.size).toBe(1)
  })

  it('scores outcomes and caps health', async () => {
    const clock = fakeClock()
    const pool = new ProxyPool(PROXIES.slice(0, 1), { now: clock.now })

    for (let i = 0; i < 7; i++) {
      pool.release(await lease(pool), 'success')
    }
    expect(pool.healthOf('proxy-1')).toBe(5)

    pool.release(await lease(pool), 'timeout')
    expect(pool.healthOf('proxy-1')).toBe(3)
  })

  it('decays health toward the baseline with the configured half-life', async () => {
    const clock = fakeClock()
    const pool = new ProxyPool(PROXIES.slice(0, 1), {
      now: clock.now,
      config: { healthHalfLifeMs: 1000 },
    })

    pool.release(await lease(pool), 'success')
    pool.release(await lease(pool), 'success')
    pool.release(await lease(pool), 'success')
    pool.release(await lease(pool), 'success')
    expect(pool.healthOf('proxy-1')).toBe(4)

    clock.advance(1000)
    expect(pool.healthOf('proxy-1')).toBe(2)

    clock.advance(1000)
    expect(pool.healthOf('proxy-1')).toBe(1)
  })

  it('prefers the healthiest proxy', async () => {
    const clock = fakeClock()
    const pool = new ProxyPool(PROXIES, { now: clock.now })

    const first = await lease(pool)
    expect(first.handleId).toBe('proxy-1')
    pool.release(first, 'transient')

    clock.advance(1)
    const second = await lease(pool)
    expect(second.handleId).toBe('proxy-2')
  })

  it('breaks health ties by least recent use', async () => {
    const clock = fakeClock()
    const pool = new ProxyPool(PROXIES, { now: clock.now, config: { maxLeasesPerHandle: 2 } })

    const first = await lease(pool)
    clock.advance(10)
    const second = await lease(pool)

    expect(first.handleId).toBe('proxy-1')
    expect(second.handleId).toBe('proxy-2')
  })

  it('rotates away from excluded proxies when another is free', async () => {
    const pool = new ProxyPool(PROXIES)

    const rotated = await lease(pool, new Set(['proxy-1']))

    expect(rotated.handleId).toBe('proxy-2')
    expect(rotated.proxyUrl).toBe('http://10.0.0.2:8080')
  })

  it('falls back to an excluded proxy when it is the only one free', async () => {
    const pool = new ProxyPool(PROXIES.slice(0, 1))

    const fallback = await lease(pool, new Set(['proxy-1']))

    expect(fallback.handleId).toBe('proxy-1')
  })

  it('quarantines a proxy at the threshold and reports when it comes back', async () => {
    const clock = fakeClock()
    const pool = new ProxyPool(PROXIES.slice(0, 1), {
      now: clock.now,
      config: { cooldownMs: 60_000 },
    })

    pool.release(await lease(pool), 'blocked')
    pool.release(await lease(pool), 'blocked')

    expect(pool.isQuarantined('proxy-1')).toBe(true)
    clock.advance(15_000)
    expect(await pool.acquire()).toEqual({ ok: false, retryAfterMs: 45_000 })

    clock.advance(45_000)
    const back = await lease(pool)
    expect(back.handleId).toBe('proxy-1')
    expect(pool.healthOf('proxy-1')).toBe(0)
  })

  it('suspends acquire until a lease is released when every proxy is busy', async () => {
    const pool = new ProxyPool(PROXIES.slice(0, 1))
    const held = await lease(pool)

    let acquired = false
    const waiting = pool.acquire().then(result => {
      acquired = true
      return result
    })

    await Promise.resolve()
    expect(acquired).toBe(false)

    pool.release(held, 'success')
    const result = await waiting
    expect(result.ok).toBe(true)
  })

  it('ignores a second release of the same lease', async () => {
    const clock = fakeClock()
    const pool = new ProxyPool(PROXIES.slice(0, 1), { now: clock.now })

    const held = await lease(pool)
    pool.release(held, 'success')
    pool.release(held, 'blocked')

    expect(pool.healthOf('proxy-1')).toBe(1)
  })
})
