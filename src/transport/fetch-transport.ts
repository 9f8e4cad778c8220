/**
 * Fetch-based HTTP transport
 */

import { AwsServiceError, TransportError } from '../errors/index.js';
import { encodeAwsChunk } from '../signing/index.js';
import {
  isChunkedBody,
  removeHeader,
  type ChunkWriter,
  type ChunkedBody,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './types.js';

/**
 * Default request timeout in milliseconds
 */
export const DEFAULT_TRANSPORT_TIMEOUT = 60000;

export interface FetchTransportOptions {
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

/**
 * Headers that fetch derives from the URL and body itself
 */
const TRANSPORT_MANAGED_HEADERS = ['host', 'content-length', 'transfer-encoding'] as const;

/**
 * Streaming body state shared between the stream and the transport, so a
 * failure raised while producing chunks surfaces as itself. `release` stops
 * the producer once the exchange is over, whether or not the body was read.
 */
interface BodyStreamState {
  failure?: unknown;
  release?: () => void;
}

/**
 * Turns a chunked body into an aws-chunked byte stream. Each chunk is framed
 * as `<hex length>;chunk-signature=<hex>\r\n<bytes>\r\n`; the writer waits
 * until the consumer has taken the previous frame.
 */
function toAwsChunkedStream(body: ChunkedBody, state: BodyStreamState): ReadableStream<Uint8Array> {
  let resume: (() => void) | undefined;
  let cancelled = false;

  const wake = (): void => {
    const resolve = resume;
    resume = undefined;
    resolve?.();
  };

  const stop = (): void => {
    cancelled = true;
    wake();
  };
  state.release = stop;

  return new ReadableStream<Uint8Array>(
    {
      start(controller) {
        const writer: ChunkWriter = async (bytes, extension) => {
          if (cancelled) {
            throw new TransportError('Request body stream was cancelled');
          }
          controller.enqueue(encodeAwsChunk(bytes, extension));
          if ((controller.desiredSize ?? 0) <= 0) {
            await new Promise<void>((resolve) => {
              resume = resolve;
            });
          }
        };

        void body.write(writer).then(
          () => {
            if (!cancelled) {
              controller.close();
            }
          },
          (error: unknown) => {
            state.failure = error;
            if (!cancelled) {
              controller.error(error);
            }
          }
        );
      },
      pull() {
        wake();
      },
      cancel() {
        stop();
      },
    },
    { highWaterMark: 1 }
  );
}

/**
 * HTTP transport over the global `fetch`.
 *
 * Chunked bodies are sent with aws-chunked framing over HTTP/1.1 chunked
 * transfer encoding. `host`, `content-length` and `transfer-encoding` are
 * left to fetch, which sends the same values that were signed.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;

  constructor(options: FetchTransportOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TRANSPORT_TIMEOUT;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const headers = { ...request.headers };
    for (const name of TRANSPORT_MANAGED_HEADERS) {
      removeHeader(headers, name);
    }

    const state: BodyStreamState = {};
    const body = isChunkedBody(request.body)
      ? toAwsChunkedStream(request.body, state)
      : request.body;

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers,
        body,
        duplex: 'half',
        signal: AbortSignal.timeout(this.timeout),
      });

      // Convert headers to plain object
      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      return {
        status: response.status,
        headers: responseHeaders,
        body: new Uint8Array(await response.arrayBuffer()),
      };
    } catch (error) {
      if (state.failure !== undefined) {
        throw state.failure;
      }
      if (error instanceof AwsServiceError) {
        throw error;
      }
      if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        throw TransportError.timeout(this.timeout);
      }
      throw TransportError.fromCause(error);
    } finally {
      // A server may answer before the body is drained; the stream is locked
      // by fetch, so the producer is stopped directly.
      state.release?.();
    }
  }

  async close(): Promise<void> {
    // fetch keeps no per-transport connections
  }
}
