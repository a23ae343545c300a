/**
 * ProviderTransport backed by the global fetch API.
 */

import type { ProviderTransport, TransportRequest, TransportResponse } from './types.js'

export class FetchProviderTransport implements ProviderTransport {
  async post(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
    const res = await fetch(request.endpoint, {
      method: 'POST',
      headers: { 'content-type': 'application/json', ...request.headers },
      body: JSON.stringify(request.body),
      signal,
    })
    const body = await res.text()
    return { status: res.status, body }
  }
}

export function createFetchTransport(): ProviderTransport {
  return new FetchProviderTransport()
}
