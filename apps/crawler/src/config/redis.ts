import { Redis, type RedisOptions } from 'ioredis'
import { loggers } from './logger.js'

const log = loggers.redis

/**
 * Connection settings for the optional Redis-backed dedup store.
 * Supports REDIS_URL or individual HOST/PORT/PASSWORD.
 */
export interface RedisSettings {
  url?: string
  host: string
  port: number
  password?: string
}

export function readRedisSettings(env: NodeJS.ProcessEnv = process.env): RedisSettings {
  return {
    url: env.REDIS_URL || undefined,
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
  }
}

function describeConnection(settings: RedisSettings): string {
  return settings.url ? settings.url.replace(/\/\/:[^@]+@/, '//***@') : `${settings.host}:${settings.port}`
}

export function buildRedisOptions(settings: RedisSettings): RedisOptions {
  const connection = describeConnection(settings)

  const base: RedisOptions = {
    maxRetriesPerRequest: 3,
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 30000,
    enableOfflineQueue: true,
    retryStrategy(times: number) {
      // A crawl is short-lived; give up instead of reconnecting forever
      if (times > 10) {
        log.error('Giving up on Redis reconnects', { attempts: times, connection })
        return null
      }
      const delay = Math.min(times * 500, 5000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },
  }

  return settings.url
    ? base
    : { ...base, host: settings.host, port: settings.port, password: settings.password }
}

export function createRedisClient(settings: RedisSettings = readRedisSettings()): Redis {
  const options = buildRedisOptions(settings)
  const client = settings.url ? new Redis(settings.url, options) : new Redis(options)
  client.on('error', (err: Error) => {
    log.error('Redis error', { error: err.message, connection: describeConnection(settings) })
  })
  return client
}
