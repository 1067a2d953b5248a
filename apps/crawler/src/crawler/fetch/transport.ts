/**
 * HTTP Transport
 *
 * The one place that touches the network. Native fetch has no egress proxy
 * support, so requests go through undici with a ProxyAgent per proxy address.
 * Tests substitute an in-process Transport instead.
 */

import { Agent, ProxyAgent, fetch as undiciFetch, type Dispatcher } from 'undici'

export interface TransportRequest {
  url: string
  headers: Record<string, string>
  signal: AbortSignal
  /** Egress proxy; direct connection when absent */
  proxyUrl?: string
}

/**
 * The subset of a fetch Response the fetcher reads.
 * Both undici's and the global Response satisfy it.
 */
export interface TransportResponse {
  status: number
  statusText: string
  headers: { get(name: string): string | null }
  text(): Promise<string>
  /** Cancelled when the body is not read, releasing the connection */
  body?: { cancel(reason?: unknown): Promise<void> } | null
}

export type Transport = (request: TransportRequest) => Promise<TransportResponse>

export interface UndiciTransport {
  transport: Transport
  /** Closes every pooled connection */
  close(): Promise<void>
}

/**
 * Build a transport on undici, reusing one dispatcher per proxy address.
 */
export function createUndiciTransport(): UndiciTransport {
  const direct = new Agent({ keepAliveTimeout: 10_000 })
  const proxies = new Map<string, ProxyAgent>()

  function dispatcherFor(proxyUrl?: string): Dispatcher {
    if (!proxyUrl) return direct
    let agent = proxies.get(proxyUrl)
    if (!agent) {
      agent = new ProxyAgent(proxyUrl)
      proxies.set(proxyUrl, agent)
    }
    return agent
  }

  const transport: Transport = request =>
    undiciFetch(request.url, {
      method: 'GET',
      headers: request.headers,
      signal: request.signal,
      redirect: 'follow',
      dispatcher: dispatcherFor(request.proxyUrl),
    })

  return {
    transport,
    async close() {
      await Promise.all([direct.close(), ...[...proxies.values()].map(agent => agent.close())])
      proxies.clear()
    },
  }
}
