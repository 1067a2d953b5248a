import { describe, it, expect } from 'vitest'
import { buildRedisOptions, readRedisSettings } from '../redis.js'

describe('readRedisSettings', () => {
  it('reads REDIS_URL or host settings with defaults', () => {
    expect(readRedisSettings({ REDIS_URL: 'redis://cache.internal:6379' })).toEqual({
      url: 'redis://cache.internal:6379',
      host: 'localhost',
      port: 6379,
      password: undefined,
    })
    expect(readRedisSettings({ REDIS_HOST: 'cache', REDIS_PORT: '6380', REDIS_PASSWORD: 'test-secret' })).toEqual({
      url: undefined,
      host: 'cache',
      port: 6380,
      password: 'test-secret',
    })
  })
})

describe('buildRedisOptions', () => {
  it('passes host settings through when there is no URL', () => {
    const options = buildRedisOptions({ host: 'cache', port: 6380, password: 'test-secret' })

    expect(options).toMatchObject({ host: 'cache', port: 6380, password: 'test-secret', maxRetriesPerRequest: 3 })
  })

  it('leaves connection details to the URL', () => {
    const options = buildRedisOptions({ url: 'redis://cache.internal:6379', host: 'localhost', port: 6379 })

    expect(options.host).toBeUndefined()
  })

  it('backs off linearly and gives up after ten reconnects', () => {
    const options = buildRedisOptions({ host: 'cache', port: 6379 })

    expect(options.retryStrategy?.(2)).toBe(1000)
    expect(options.retryStrategy?.(10)).toBe(5000)
    expect(options.retryStrategy?.(11)).toBeNull()
  })
})
