import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { deepMerge, loadCrawlConfig, parseUrlList, proxiesFromEnv } from '../settings.js'
import { ConfigError } from '../../crawler/errors.js'

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'crawl-settings-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

function writeFile(name: string, content: string): string {
  const path = join(dir, name)
  writeFileSync(path, content)
  return path
}

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn()
  } catch (error) {
    if (error instanceof ConfigError) return error
    throw error
  }
  throw new Error('expected a ConfigError')
}

describe('loadCrawlConfig', () => {
  it('applies defaults and resolves relative start URLs against the base URL', () => {
    const config = loadCrawlConfig({ overrides: { startUrls: ['/lst/bmw'] }, env: {} })

    expect(config).toMatchObject({
      baseUrl: 'https://www.autoscout24.com',
      startUrls: ['https://www.autoscout24.com/lst/bmw'],
      maxRecords: 300,
      concurrency: 8,
      timeoutMs: 15000,
      proxies: [],
      retry: { maxAttempts: 3, initialDelayMs: 1000, maxDelayMs: 30000, backoffMultiplier: 2 },
      rateLimit: { requestsPerSecond: 2, burst: 4, domainOverrides: {} },
      proxyPool: {
        maxLeasesPerHandle: 1,
        quarantineThreshold: -5,
        cooldownMs: 60000,
        healthHalfLifeMs: 60000,
        unavailableBackoffMs: 5000,
        unavailableWindowMs: 120000,
      },
      dedup: { backend: 'memory' },
      output: { format: 'json' },
    })
  })

  it('layers settings file, input file and overrides', () => {
    const file = writeFile(
      'settings.json',
      JSON.stringify({
        maxRecords: 50,
        retry: { maxAttempts: 5 },
        startUrls: ['https://www.example.com/lst/bmw'],
        rateLimit: { burst: 8 },
      })
    )
    const input = writeFile('input.json', JSON.stringify({ maxRecords: 20, startUrls: ['/lst/audi'] }))

    const config = loadCrawlConfig({
      file,
      input,
      overrides: { maxRecords: 10, rateLimit: { requestsPerSecond: 1 } },
      env: {},
    })

    expect(config.maxRecords).toBe(10)
    expect(config.retry).toEqual({ maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 30000, backoffMultiplier: 2 })
    expect(config.rateLimit).toEqual({ requestsPerSecond: 1, burst: 8, domainOverrides: {} })
    expect(config.startUrls).toEqual(['https://www.autoscout24.com/lst/audi'])
  })

  it('appends URLs from a URL file and the command line, without duplicates', () => {
    const urlFile = writeFile(
      'urls.txt',
      ['# search pages', 'https://www.example.com/lst/bmw', '', '/offers/audi-a4-1  # a listing', '/lst/bmw'].join('\n')
    )

    const config = loadCrawlConfig({
      urlFile,
      overrides: { baseUrl: 'https://www.example.com', startUrls: ['https://www.example.com/lst/vw'] },
      env: {},
    })

    expect(config.startUrls).toEqual([
      'https://www.example.com/lst/bmw',
      'https://www.example.com/offers/audi-a4-1',
      'https://www.example.com/lst/vw',
    ])
  })

  it('adds proxies from the environment', () => {
    const config = loadCrawlConfig({
      overrides: { startUrls: ['/lst'], proxies: ['http://proxy-a.example.com:8080'] },
      env: { HTTP_PROXIES: 'http://proxy-b.example.com:8080, http://proxy-c.example.com:8080' },
    })

    expect(config.proxies).toEqual([
      'http://proxy-a.example.com:8080',
      'http://proxy-b.example.com:8080',
      'http://proxy-c.example.com:8080',
    ])
  })

  it('rejects a non-positive record budget', () => {
    const error = configErrorOf(() => loadCrawlConfig({ overrides: { startUrls: ['/lst'], maxRecords: 0 }, env: {} }))

    expect(error.message).toBe('Invalid configuration in command line: maxRecords: Number must be greater than 0')
    expect(error.code).toBe('CONFIG_INVALID')
  })

  it('requires at least one start URL', () => {
    expect(() => loadCrawlConfig({ env: {} })).toThrow('At least one start URL is required')
  })

  it('rejects start URLs that are not http(s)', () => {
    const error = configErrorOf(() =>
      loadCrawlConfig({ overrides: { startUrls: ['mailto:sales@example.com'] }, env: {} })
    )

    expect(error.message).toBe('Invalid start URLs: startUrls.0: Not an http(s) URL: mailto:sales@example.com')
  })

  it('reports unreadable and malformed files', () => {
    expect(configErrorOf(() => loadCrawlConfig({ file: join(dir, 'missing.json'), env: {} })).code).toBe(
      'CONFIG_FILE_UNREADABLE'
    )

    const broken = writeFile('broken.json', '{ "maxRecords": ')
    expect(configErrorOf(() => loadCrawlConfig({ file: broken, env: {} })).code).toBe('CONFIG_FILE_UNREADABLE')

    const list = writeFile('list.json', '[]')
    expect(configErrorOf(() => loadCrawlConfig({ file: list, env: {} })).message).toBe(
      `Expected a JSON object in ${list}`
    )
  })
})

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(
      deepMerge(
        { retry: { maxAttempts: 3, initialDelayMs: 1000 }, startUrls: ['a', 'b'] },
        { retry: { maxAttempts: 5 }, startUrls: ['c'], concurrency: undefined }
      )
    ).toEqual({ retry: { maxAttempts: 5, initialDelayMs: 1000 }, startUrls: ['c'] })
  })
})

describe('parseUrlList', () => {
  it('drops comments and blank lines', () => {
    expect(parseUrlList('# header\r\nhttps://a.example.com/\n\n  /lst # trailing\n')).toEqual([
      'https://a.example.com/',
      '/lst',
    ])
  })
})

describe('proxiesFromEnv', () => {
  it('splits on commas and whitespace', () => {
    expect(proxiesFromEnv({ HTTP_PROXIES: 'http://a.example.com:1 http://b.example.com:2', HTTPS_PROXIES: '' })).toEqual([
      'http://a.example.com:1',
      'http://b.example.com:2',
    ])
  })
})

describe('example files', () => {
  const example = (name: string) => fileURLToPath(new URL(`../../../examples/${name}`, import.meta.url))

  it('load into a valid config', () => {
    const config = loadCrawlConfig({
      file: example('settings.example.json'),
      urlFile: example('urls.example.txt'),
      env: {},
    })

    expect(config.startUrls).toEqual([
      'https://www.autoscout24.com/lst/bmw/3-series?atype=C&cy=D',
      'https://www.autoscout24.com/lst/audi/a4?atype=C&cy=D',
      'https://www.autoscout24.com/lst/volkswagen/golf?atype=C&cy=D',
    ])
    expect(config.rateLimit.domainOverrides).toEqual({
      'autoscout24.de': { requestsPerSecond: 1, burst: 2 },
    })
    expect(config.output).toEqual({ path: 'listings.json', format: 'json' })
  })
})
