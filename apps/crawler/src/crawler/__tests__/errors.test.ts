import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  ConfigError,
  ERROR_CODES,
  FetchFailedError,
  ProxyPoolUnavailableError,
  classifyError,
  errorLogMeta,
} from '../errors.js'

describe('error classes', () => {
  it('names errors after their class', () => {
    const error = new FetchFailedError('https://www.example.com/offers/a-1', 3, 'HTTP 503: Service Unavailable')

    expect(error.name).toBe('FetchFailedError')
    expect(error.message).toBe('Fetch failed after 3 attempts: https://www.example.com/offers/a-1')
    expect(error.details).toEqual({
      url: 'https://www.example.com/offers/a-1',
      attempts: 3,
      lastError: 'HTTP 503: Service Unavailable',
    })
  })

  it('lists config issues in the message', () => {
    const error = new ConfigError('Invalid configuration in settings.json', [
      { path: 'maxRecords', message: 'Expected number, received string' },
      { path: '', message: 'Required' },
    ])

    expect(error.message).toBe(
      'Invalid configuration in settings.json: maxRecords: Expected number, received string; (root): Required'
    )
    expect(error.isFatal).toBe(true)
  })

  it('builds a config error from a zod error', () => {
    const parsed = z.object({ maxRecords: z.number() }).safeParse({ maxRecords: 'many' })
    if (parsed.success) throw new Error('expected a validation failure')

    const error = ConfigError.fromZod(parsed.error, 'input.json')

    expect(error.issues).toEqual([{ path: 'maxRecords', message: 'Expected number, received string' }])
    expect(error.code).toBe(ERROR_CODES.CONFIG_INVALID)
  })
})

describe('classifyError', () => {
  it('passes crawl errors through', () => {
    const classified = classifyError(new ProxyPoolUnavailableError(130_000))

    expect(classified).toMatchObject({
      category: 'unavailable',
      code: 'PROXY_POOL_UNAVAILABLE',
      message: 'Proxy pool unavailable for 130000ms',
      isFatal: true,
      isRetryable: false,
      details: { unavailableForMs: 130_000 },
    })
  })

  it('treats zod errors as config errors', () => {
    const parsed = z.object({ url: z.string() }).safeParse({})
    if (parsed.success) throw new Error('expected a validation failure')

    expect(classifyError(parsed.error)).toMatchObject({
      category: 'config',
      code: 'CONFIG_INVALID',
      message: 'Invalid configuration in input: url: Required',
      isFatal: true,
    })
  })

  it('recognises network error codes', () => {
    const refused = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' })
    const timedOut = Object.assign(new Error('connect failed'), { code: 'ETIMEDOUT' })

    expect(classifyError(refused)).toMatchObject({
      category: 'fetch',
      code: 'NETWORK_ERROR',
      message: 'Network error: ECONNREFUSED',
      isRetryable: true,
    })
    expect(classifyError(timedOut)).toMatchObject({ category: 'timeout', code: 'OPERATION_TIMEOUT' })
  })

  it('recognises aborts as timeouts', () => {
    const aborted = new Error('This operation was aborted')
    aborted.name = 'AbortError'

    expect(classifyError(aborted)).toMatchObject({ category: 'timeout', isFatal: false })
  })

  it('treats anything else as an internal fatal error', () => {
    expect(classifyError(new Error('boom'))).toMatchObject({
      category: 'internal',
      code: 'UNEXPECTED_ERROR',
      message: 'boom',
      isFatal: true,
    })
    expect(classifyError('plain string')).toEqual({
      category: 'internal',
      code: 'UNEXPECTED_ERROR',
      message: 'plain string',
      isFatal: true,
      isRetryable: false,
    })
  })
})

describe('errorLogMeta', () => {
  it('flattens a classified error', () => {
    expect(errorLogMeta(classifyError(new ProxyPoolUnavailableError(5)))).toEqual({
      errorCategory: 'unavailable',
      errorCode: 'PROXY_POOL_UNAVAILABLE',
      errorMessage: 'Proxy pool unavailable for 5ms',
      isFatal: true,
      errorDetails: { unavailableForMs: 5 },
    })
  })
})
