/**
 * Response of a successful AWS call
 */

import { getRequestId, type HttpResponse } from '../transport/index.js';

export class AwsResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly raw: Uint8Array;
  /** Body decoded as UTF-8 */
  readonly text: string;
  /** Parsed JSON body; `null` when the body is empty or not JSON */
  readonly body: unknown;

  constructor(response: HttpResponse) {
    this.status = response.status;
    this.headers = response.headers;
    this.raw = response.body;
    this.text = new TextDecoder().decode(response.body);
    this.body = parseJsonBody(this.text);
  }

  get requestId(): string | undefined {
    return getRequestId(this.headers);
  }

  toString(): string {
    return `AwsResponse(${this.status}) ${this.text}`;
  }
}

function parseJsonBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
}
