/**
 * HTTP transport type definitions
 */

/**
 * Receives one chunk of a streaming body together with its chunk
 * extension (`chunk-signature=<hex>`). Resolves once the transport is ready
 * for the next chunk.
 */
export type ChunkWriter = (bytes: Uint8Array, extension: string) => Promise<void>;

/**
 * Streaming request body. The transport calls `write` once and supplies a
 * writer; the body pushes its chunks through it in order.
 */
export interface ChunkedBody {
  readonly write: (writer: ChunkWriter) => Promise<void>;
}

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method (GET, PUT, POST, DELETE, HEAD) */
  method: string;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers, exactly as signed */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: Uint8Array | ChunkedBody;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Response body as buffer */
  body: Uint8Array;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns the buffered response.
   *
   * Resolves for every status code; rejects only when no response was
   * received (connection, TLS or timeout failure).
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Closes the transport and releases resources
   */
  close(): Promise<void>;
}

/**
 * Checks whether a request body is a streaming body
 */
export function isChunkedBody(body: HttpRequest['body']): body is ChunkedBody {
  return body !== undefined && !(body instanceof Uint8Array);
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Removes every header matching the name (case-insensitive)
 */
export function removeHeader(headers: Record<string, string>, name: string): void {
  const lowerName = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lowerName) {
      delete headers[key];
    }
  }
}

/**
 * Sets a header under its lowercase name, replacing any other casing
 */
export function setHeader(headers: Record<string, string>, name: string, value: string): void {
  removeHeader(headers, name);
  headers[name.toLowerCase()] = value;
}

/**
 * Helper to extract request ID from response headers
 */
export function getRequestId(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'x-amzn-requestid') ?? getHeader(headers, 'x-amz-request-id');
}

/**
 * Helper to check if response is successful (status below 400)
 */
export function isSuccessResponse(response: HttpResponse): boolean {
  return response.status < 400;
}
