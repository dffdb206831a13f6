import type {
  Transport,
  TransportRequest,
  TransportResponse,
} from './transport.js';

export class FetchTransport implements Transport {
  async execute(request: TransportRequest): Promise<TransportResponse> {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.signal,
    });
    const data = new Uint8Array(await response.arrayBuffer());

    return {
      status: response.status,
      headers: response.headers,
      data,
      url: response.url || request.url.href,
    };
  }
}
