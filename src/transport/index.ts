/**
 * HTTP transport
 */

export type {
  ChunkWriter,
  ChunkedBody,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from './types.js';
export {
  getHeader,
  getRequestId,
  isChunkedBody,
  isSuccessResponse,
  removeHeader,
  setHeader,
} from './types.js';
export {
  DEFAULT_TRANSPORT_TIMEOUT,
  FetchTransport,
  type FetchTransportOptions,
} from './fetch-transport.js';
