/**
 * Crawl Settings
 *
 * Layers, later wins:
 *   settings file -> input file -> CLI overrides
 * Objects merge key by key; arrays and scalars replace. Start URLs from a
 * URL file (and from --url) are appended after the merged list.
 *
 * Proxies also come from HTTP_PROXIES / HTTPS_PROXIES (comma or whitespace
 * separated), appended to the configured list.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { ConfigError, ERROR_CODES } from '../crawler/errors.js'
import { DEFAULT_USER_AGENT } from '../crawler/types.js'
import { resolveUrl } from '../crawler/utils/url.js'

export const DEFAULT_BASE_URL = 'https://www.autoscout24.com'

const rateLimitSchema = z.object({
  requestsPerSecond: z.number().positive().default(2),
  burst: z.number().int().positive().default(4),
})

const crawlConfigSchema = z.object({
  baseUrl: z.string().trim().url().default(DEFAULT_BASE_URL),
  startUrls: z.array(z.string().trim().min(1)).default([]),
  maxRecords: z.number().int().positive().default(300),
  concurrency: z.number().int().positive().default(8),
  timeoutMs: z.number().int().positive().default(15000),
  maxResponseBytes: z.number().int().positive().default(10 * 1024 * 1024),
  userAgent: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  headers: z.record(z.string()).default({}),
  proxies: z.array(z.string().trim().url()).default([]),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      initialDelayMs: z.number().int().nonnegative().default(1000),
      maxDelayMs: z.number().int().nonnegative().default(30000),
      backoffMultiplier: z.number().min(1).default(2),
    })
    .default({}),
  rateLimit: rateLimitSchema
    .extend({
      /** Keyed by registrable domain */
      domainOverrides: z.record(rateLimitSchema).default({}),
    })
    .default({}),
  proxyPool: z
    .object({
      maxLeasesPerHandle: z.number().int().positive().default(1),
      quarantineThreshold: z.number().max(0).default(-5),
      cooldownMs: z.number().int().nonnegative().default(60_000),
      healthHalfLifeMs: z.number().int().positive().default(60_000),
      unavailableBackoffMs: z.number().int().positive().default(5_000),
      unavailableWindowMs: z.number().int().nonnegative().default(120_000),
    })
    .default({}),
  dedup: z
    .object({
      backend: z.enum(['memory', 'redis']).default('memory'),
    })
    .default({}),
  output: z
    .object({
      path: z.string().trim().min(1).optional(),
      format: z.enum(['json', 'ndjson', 'csv']).default('json'),
    })
    .default({}),
})

export type CrawlConfig = z.infer<typeof crawlConfigSchema>
export type CrawlConfigInput = z.input<typeof crawlConfigSchema>
export type OutputFormat = CrawlConfig['output']['format']

export interface LoadCrawlConfigOptions {
  /** Settings JSON file */
  file?: string
  /** Input JSON file (typically `startUrls` and `maxRecords`) */
  input?: string
  /** Text file with one start URL per line; `#` starts a comment */
  urlFile?: string
  overrides?: CrawlConfigInput
  env?: NodeJS.ProcessEnv
}

type JsonObject = Record<string, unknown>

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Merge `next` over `base`: nested objects merge, everything else replaces.
 * Undefined values in `next` leave `base` untouched.
 */
export function deepMerge(base: JsonObject, next: JsonObject): JsonObject {
  const merged: JsonObject = { ...base }
  for (const [key, value] of Object.entries(next)) {
    if (value === undefined) continue
    const current = merged[key]
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value
  }
  return merged
}

function readText(path: string): string {
  try {
    return readFileSync(path, 'utf8')
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
      [],
      ERROR_CODES.CONFIG_FILE_UNREADABLE
    )
  }
}

function readJsonObject(path: string): JsonObject {
  let parsed: unknown
  try {
    parsed = JSON.parse(readText(path))
  } catch (error) {
    if (error instanceof ConfigError) throw error
    throw new ConfigError(
      `Invalid JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`,
      [],
      ERROR_CODES.CONFIG_FILE_UNREADABLE
    )
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Expected a JSON object in ${path}`)
  }
  return parsed
}

/**
 * One URL per line. Blank lines and `#` comments are ignored.
 */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.replace(/#.*$/, '').trim())
    .filter(line => line.length > 0)
}

/**
 * Proxy addresses from HTTP_PROXIES and HTTPS_PROXIES.
 */
export function proxiesFromEnv(env: NodeJS.ProcessEnv): string[] {
  return [env.HTTP_PROXIES, env.HTTPS_PROXIES]
    .flatMap(value => (value ? value.split(/[\s,]+/) : []))
    .filter(address => address.length > 0)
}

/**
 * Resolve start URLs against the base URL, dropping duplicates.
 */
function resolveStartUrls(urls: readonly string[], baseUrl: string): string[] {
  const resolved: string[] = []
  const issues: Array<{ path: string; message: string }> = []

  urls.forEach((url, index) => {
    const absolute = resolveUrl(url, baseUrl)
    if (!absolute) {
      issues.push({ path: `startUrls.${index}`, message: `Not an http(s) URL: ${url}` })
    } else if (!resolved.includes(absolute)) {
      resolved.push(absolute)
    }
  })

  if (issues.length > 0) {
    throw new ConfigError('Invalid start URLs', issues)
  }
  return resolved
}

export function loadCrawlConfig(options: LoadCrawlConfigOptions = {}): CrawlConfig {
  const env = options.env ?? process.env
  const sources: string[] = []

  let raw: JsonObject = {}
  if (options.file) {
    raw = deepMerge(raw, readJsonObject(options.file))
    sources.push(options.file)
  }
  if (options.input) {
    raw = deepMerge(raw, readJsonObject(options.input))
    sources.push(options.input)
  }
  if (options.overrides) {
    raw = deepMerge(raw, { ...options.overrides, startUrls: undefined })
    sources.push('command line')
  }

  const parsed = crawlConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error, sources.join(', ') || 'defaults')
  }
  const config = parsed.data

  const extraUrls = [
    ...(options.urlFile ? parseUrlList(readText(options.urlFile)) : []),
    ...(options.overrides?.startUrls ?? []),
  ]
  const startUrls = resolveStartUrls([...config.startUrls, ...extraUrls], config.baseUrl)
  if (startUrls.length === 0) {
    throw new ConfigError('At least one start URL is required')
  }

  const envProxies = z.array(z.string().url()).safeParse(proxiesFromEnv(env))
  if (!envProxies.success) {
    throw ConfigError.fromZod(envProxies.error, 'HTTP_PROXIES/HTTPS_PROXIES')
  }

  return {
    ...config,
    startUrls,
    proxies: [...config.proxies, ...envProxies.data],
  }
}
