/**
 * Proxy Pool
 *
 * Leases egress proxies to fetch attempts and keeps a health score per proxy.
 *
 * Health model:
 * - Neutral baseline 0, capped at +5
 * - Outcome deltas: success +1, transient -1, timeout -2, blocked -3
 * - Decays toward the baseline between observations: h * 0.5^(elapsed / halfLife)
 * - At or below the quarantine threshold a proxy sits out `cooldownMs`,
 *   then comes back at the baseline
 *
 * With no proxies configured the pool hands out a single direct handle that is
 * never quarantined and has no lease cap.
 */

import type { ProxyOutcome, ProxyPoolConfig } from '../types.js'
import { DEFAULT_PROXY_POOL_CONFIG } from '../types.js'
import { recordProxyQuarantined } from '../metrics.js'
import { loggers } from '../../config/logger.js'

const log = loggers.proxy

export const HEALTH_BASELINE = 0
export const HEALTH_CAP = 5
export const DIRECT_HANDLE_ID = 'direct'

const OUTCOME_DELTAS: Record<ProxyOutcome, number> = {
  success: 1,
  transient: -1,
  timeout: -2,
  blocked: -3,
}

export interface ProxyHandle {
  id: string
  /** Proxy URL; absent for the direct handle */
  address?: string
  /** Health as of `observedAt`; read through `healthOf` */
  health: number
  observedAt: number
  lastUsedAt: number
  activeLeases: number
  quarantinedUntil?: number
}

export interface ProxyLease {
  readonly handleId: string
  readonly proxyUrl?: string
  readonly leasedAt: number
}

export type ProxyAcquisition =
  | { ok: true; lease: ProxyLease }
  | { ok: false; retryAfterMs: number }

export interface AcquireOptions {
  /** Handles to avoid if any other is available (rotation on retry) */
  exclude?: ReadonlySet<string>
}

export interface ProxyPoolOptions {
  config?: Partial<ProxyPoolConfig>
  now?: () => number
}

export class ProxyPool {
  readonly config: ProxyPoolConfig
  private readonly handles: ProxyHandle[]
  private readonly directMode: boolean
  private readonly now: () => number
  private readonly outstanding = new Set<ProxyLease>()
  private waiters: Array<() => void> = []

  constructor(addresses: readonly string[], options: ProxyPoolOptions = {}) {
    this.config = { ...DEFAULT_PROXY_POOL_CONFIG, ...options.config }
    this.now = options.now ?? Date.now

    const unique = [...new Set(addresses.map(a => a.trim()).filter(Boolean))]
    this.directMode = unique.length === 0

    const now = this.now()
    this.handles = this.directMode
      ? [this.newHandle(DIRECT_HANDLE_ID, undefined, now)]
      : unique.map((address, i) => this.newHandle(`proxy-${i + 1}`, address, now))

    log.info('Proxy pool ready', {
      mode: this.directMode ? 'direct' : 'proxied',
      proxies: this.directMode ? 0 : this.handles.length,
    })
  }

  get isDirect(): boolean {
    return this.directMode
  }

  get size(): number {
    return this.handles.length
  }

  /**
   * Lease the healthiest eligible handle (ties: least recently used).
   * Suspends while every eligible handle is at its lease cap; returns
   * `{ ok: false }` when every handle is quarantined.
   */
  async acquire(options: AcquireOptions = {}): Promise<ProxyAcquisition> {
    for (;;) {
      const now = this.now()
      this.liftExpiredQuarantines(now)

      const eligible = this.handles.filter(h => h.quarantinedUntil === undefined)
      if (eligible.length === 0) {
        return { ok: false, retryAfterMs: this.msUntilFirstRecovery(now) }
      }

      const free = eligible.filter(h => this.directMode || h.activeLeases < this.config.maxLeasesPerHandle)
      if (free.length > 0) {
        const exclude = options.exclude
        const preferred = exclude ? free.filter(h => !exclude.has(h.id)) : free
        const handle = this.pickHealthiest(preferred.length > 0 ? preferred : free, now)
        return { ok: true, lease: this.lease(handle, now) }
      }

      await new Promise<void>(resolve => this.waiters.push(resolve))
    }
  }

  /**
   * Return a lease and record what happened on it. Releasing twice is a no-op.
   */
  release(lease: ProxyLease, outcome: ProxyOutcome): void {
    if (!this.outstanding.delete(lease)) return

    const handle = this.handles.find(h => h.id === lease.handleId)
    if (handle) {
      handle.activeLeases = Math.max(0, handle.activeLeases - 1)
      if (!this.directMode) {
        this.observe(handle, outcome)
      }
    }

    const waiters = this.waiters
    this.waiters = []
    for (const wake of waiters) wake()
  }

  /**
   * Current health including decay.
   */
  healthOf(handleId: string): number | undefined {
    const handle = this.handles.find(h => h.id === handleId)
    return handle ? this.decayedHealth(handle, this.now()) : undefined
  }

  isQuarantined(handleId: string): boolean {
    const now = this.now()
    this.liftExpiredQuarantines(now)
    return this.handles.some(h => h.id === handleId && h.quarantinedUntil !== undefined)
  }

  /** Copy of every handle with decayed health; expired quarantines are lifted first */
  snapshot(): ProxyHandle[] {
    const now = this.now()
    this.liftExpiredQuarantines(now)
    return this.handles.map(h => ({ ...h, health: this.decayedHealth(h, now), observedAt: now }))
  }

  private newHandle(id: string, address: string | undefined, now: number): ProxyHandle {
    return {
      id,
      address,
      health: HEALTH_BASELINE,
      observedAt: now,
      lastUsedAt: 0,
      activeLeases: 0,
    }
  }

  private lease(handle: ProxyHandle, now: number): ProxyLease {
    handle.activeLeases += 1
    handle.lastUsedAt = now
    const lease: ProxyLease = { handleId: handle.id, proxyUrl: handle.address, leasedAt: now }
    this.outstanding.add(lease)
    return lease
  }

  private observe(handle: ProxyHandle, outcome: ProxyOutcome): void {
    const now = this.now()
    if (handle.quarantinedUntil !== undefined) return

    const health = Math.min(HEALTH_CAP, this.decayedHealth(handle, now) + OUTCOME_DELTAS[outcome])
    handle.health = health
    handle.observedAt = now

    if (health <= this.config.quarantineThreshold) {
      handle.quarantinedUntil = now + this.config.cooldownMs
      recordProxyQuarantined({ proxyId: handle.id, health, cooldownMs: this.config.cooldownMs })
    }
  }

  private decayedHealth(handle: ProxyHandle, now: number): number {
    const elapsed = Math.max(0, now - handle.observedAt)
    if (elapsed === 0 || handle.health === HEALTH_BASELINE) return handle.health
    return handle.health * Math.pow(0.5, elapsed / this.config.healthHalfLifeMs)
  }

  private liftExpiredQuarantines(now: number): void {
    for (const handle of this.handles) {
      if (handle.quarantinedUntil !== undefined && now >= handle.quarantinedUntil) {
        handle.quarantinedUntil = undefined
        handle.health = HEALTH_BASELINE
        handle.observedAt = now
        log.info('Proxy back in rotation', { proxyId: handle.id })
      }
    }
  }

  private msUntilFirstRecovery(now: number): number {
    let earliest = Infinity
    for (const handle of this.handles) {
      if (handle.quarantinedUntil !== undefined) {
        earliest = Math.min(earliest, handle.quarantinedUntil)
      }
    }
    return Math.max(0, earliest - now)
  }

  private pickHealthiest(candidates: ProxyHandle[], now: number): ProxyHandle {
    let best = candidates[0]
    let bestHealth = this.decayedHealth(best, now)
    for (const handle of candidates.slice(1)) {
      const health = this.decayedHealth(handle, now)
      if (health > bestHealth || (health === bestHealth && handle.lastUsedAt < best.lastUsedAt)) {
        best = handle
        bestHealth = health
      }
    }
    return best
  }
}
