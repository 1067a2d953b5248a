/**
 * HTTP Fetcher Implementation
 *
 * One GET per call, classified into ok / blocked / transient / permanent.
 * Retries, proxy choice and rate limiting belong to the worker pool.
 */

import type { AttemptResult, AttemptStatus, Fetcher, FetchOptions } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_USER_AGENT } from '../types.js'
import { loggers } from '../../config/logger.js'
import type { Transport, TransportResponse } from './transport.js'

const log = loggers.fetch

/**
 * Markers of anti-bot interstitials and captcha walls.
 * Matched case-insensitively against the whole body.
 */
const BLOCK_INDICATORS = [
  'g-recaptcha',
  'h-captcha',
  'px-captcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'cf-chl-',
  'please verify you are a human',
  'are you a robot',
  'access denied',
  'bot detection',
]

/**
 * Heuristic check for blocked/captcha pages.
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator))
}

/**
 * Classify a completed HTTP response.
 */
export function classifyResponse(statusCode: number, body: string): AttemptStatus {
  if (statusCode === 403 || statusCode === 429) return 'blocked'
  if (looksLikeBlockedPage(body)) return 'blocked'
  if (statusCode < 200 || statusCode >= 300) return 'permanent'
  if (body.trim() === '') return 'transient'
  return 'ok'
}

export interface HttpFetcherOptions {
  transport: Transport

  /** Defaults applied under each call's options */
  defaults?: FetchOptions

  userAgent?: string
}

export class HttpFetcher implements Fetcher {
  private readonly transport: Transport
  private readonly defaults: FetchOptions
  private readonly userAgent: string

  constructor(options: HttpFetcherOptions) {
    this.transport = options.transport
    this.defaults = options.defaults ?? {}
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
  }

  /**
   * Single fetch attempt (no retries).
   */
  async fetchOnce(url: string, options?: FetchOptions): Promise<AttemptResult> {
    const startTime = Date.now()
    const timeoutMs = options?.timeoutMs ?? this.defaults.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const maxSizeBytes =
      options?.maxSizeBytes ?? this.defaults.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const proxyUrl = options?.proxyUrl ?? this.defaults.proxyUrl

    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      ...DEFAULT_FETCH_HEADERS,
      ...(this.defaults.headers ?? {}),
      ...(options?.headers ?? {}),
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await this.transport({ url, headers, signal: controller.signal, proxyUrl })

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        await discardBody(response)
        return {
          status: 'permanent',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await response.text()
      if (Buffer.byteLength(body, 'utf8') > maxSizeBytes) {
        return {
          status: 'permanent',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      const status = classifyResponse(response.status, body)
      log.debug('Fetched', { url, statusCode: response.status, status, proxy: proxyUrl })

      return {
        status,
        statusCode: response.status,
        body: status === 'ok' ? body : undefined,
        durationMs: Date.now() - startTime,
        error: describeFailure(status, response.status, response.statusText),
      }
    } catch (error) {
      if (controller.signal.aborted) {
        return {
          status: 'transient',
          timedOut: true,
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      return {
        status: 'transient',
        durationMs: Date.now() - startTime,
        error: connectionErrorMessage(error),
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

function describeFailure(
  status: AttemptStatus,
  statusCode: number,
  statusText: string
): string | undefined {
  switch (status) {
    case 'ok':
      return undefined
    case 'blocked':
      return 'Request blocked (captcha or access denied)'
    case 'transient':
      return 'Empty response body'
    case 'permanent':
      return `HTTP ${statusCode}: ${statusText}`
  }
}

async function discardBody(response: TransportResponse): Promise<void> {
  try {
    await response.body?.cancel()
  } catch (error) {
    log.debug('Failed to discard response body', { error: connectionErrorMessage(error) })
  }
}

function connectionErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    // undici wraps socket errors as TypeError('fetch failed') with the cause attached
    if (error.cause instanceof Error) {
      return `${error.message}: ${error.cause.message}`
    }
    return error.message
  }
  return String(error)
}
