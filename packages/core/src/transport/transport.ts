import type { HttpVerb } from '../types/request.js';

export interface TransportRequest {
  method: HttpVerb;
  url: URL;
  headers: Record<string, string>;
  body?: string | FormData;
  /** Aborts the call; the transport must then reject. */
  signal: AbortSignal;
}

export interface TransportResponse {
  status: number;
  headers: Headers;
  data: Uint8Array;
  /** Final URL after redirects. */
  url: string;
}

/**
 * Executes a single HTTP exchange. Resolves for any status code the server
 * returns and rejects only when no response arrived (network failure or
 * abort).
 */
export interface Transport {
  execute(request: TransportRequest): Promise<TransportResponse>;
}
