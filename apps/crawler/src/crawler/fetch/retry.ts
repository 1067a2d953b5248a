/**
 * Retry state machine for one fetch task.
 *
 * Pure: takes the outcome of the attempt just made and says what to do next.
 * Timers, proxies and rate limiting stay with the caller.
 */

import type { AttemptStatus, RetryPolicy } from '../types.js'

export type RetryDecision =
  | { action: 'done' }
  | { action: 'abandon' } // PERMANENT: never retried
  | { action: 'retry'; delayMs: number; nextAttempt: number }
  | { action: 'give_up' } // FETCH_FAILED: attempts exhausted

/**
 * Delay before attempt `attempt + 1`, given `attempt` attempts already made.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  )
}

/**
 * @param attempt - 1-based number of the attempt that produced `status`
 */
export function nextStep(policy: RetryPolicy, attempt: number, status: AttemptStatus): RetryDecision {
  switch (status) {
    case 'ok':
      return { action: 'done' }
    case 'permanent':
      return { action: 'abandon' }
    case 'blocked':
    case 'transient':
      if (attempt >= policy.maxAttempts) {
        return { action: 'give_up' }
      }
      return { action: 'retry', delayMs: backoffDelay(policy, attempt), nextAttempt: attempt + 1 }
  }
}
