/**
 * Crawler Metrics
 *
 * Structured log events only; no metrics backend.
 */

import { loggers } from '../config/logger.js'
import type { RunTerminalState } from './types.js'

const log = loggers.crawler

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_TASKS_FOR_ALERT = 20

export interface RunCompletedPayload {
  runId: string
  terminalState: RunTerminalState
  maxRecords: number
  discoveryPagesVisited: number
  detailTasksDispatched: number
  recordsEmitted: number
  fetchFailures: number
  extractionFailures: number
  duplicates: number
  cancelled: number
  failureRate: number
  durationMs: number
}

export function recordRunCompleted(payload: RunCompletedPayload): void {
  log.info('CRAWL_RUN_COMPLETED', {
    event_name: 'CRAWL_RUN_COMPLETED',
    ...payload,
  })

  if (
    payload.detailTasksDispatched >= MIN_TASKS_FOR_ALERT &&
    payload.failureRate > FAILURE_RATE_ALERT_THRESHOLD
  ) {
    log.warn('CRAWL_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'CRAWL_ALERT_HIGH_FAILURE_RATE',
      runId: payload.runId,
      failureRate: payload.failureRate,
      detailTasksDispatched: payload.detailTasksDispatched,
    })
  }
}

export function recordProxyQuarantined(payload: {
  proxyId: string
  health: number
  cooldownMs: number
}): void {
  log.warn('CRAWL_PROXY_QUARANTINED', {
    event_name: 'CRAWL_PROXY_QUARANTINED',
    ...payload,
  })
}

export function recordBudgetReached(payload: {
  runId: string
  maxRecords: number
  detailTasksDispatched: number
}): void {
  log.info('CRAWL_BUDGET_REACHED', {
    event_name: 'CRAWL_BUDGET_REACHED',
    ...payload,
  })
}
