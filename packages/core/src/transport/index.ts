export { FetchTransport } from './fetch-transport.js';
export type {
  Transport,
  TransportRequest,
  TransportResponse,
} from './transport.js';
