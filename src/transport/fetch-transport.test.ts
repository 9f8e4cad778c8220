/**
 * Tests for the fetch-based transport
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { PreconditionError, TransportError } from '../errors/index.js';
import { FetchTransport } from './fetch-transport.js';
import type { ChunkedBody } from './types.js';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

function stubFetch(handler: (url: string, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) =>
    handler(String(input), init)
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send a buffered request and buffer the response', async () => {
    const fetchMock = stubFetch(async () =>
      new Response('{"TableNames":[]}', {
        status: 200,
        headers: { 'x-amzn-requestid': 'req-1' },
      })
    );
    const body = encode('{}');

    const response = await new FetchTransport().send({
      method: 'POST',
      url: 'https://dynamodb.us-east-1.amazonaws.com/',
      headers: { host: 'dynamodb.us-east-1.amazonaws.com', 'x-amz-target': 'DynamoDB_20120810.ListTables' },
      body,
    });

    expect(response.status).toBe(200);
    expect(response.headers['x-amzn-requestid']).toBe('req-1');
    expect(new TextDecoder().decode(response.body)).toBe('{"TableNames":[]}');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://dynamodb.us-east-1.amazonaws.com/');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'x-amz-target': 'DynamoDB_20120810.ListTables' });
    expect(init?.body).toBe(body);
  });

  it('should resolve error statuses instead of rejecting', async () => {
    stubFetch(async () => new Response('{"__type":"ValidationException"}', { status: 400 }));

    const response = await new FetchTransport().send({ method: 'POST', url: 'https://h/', headers: {} });
    expect(response.status).toBe(400);
  });

  it('should frame a chunked body as aws-chunked', async () => {
    let sent = '';
    const fetchMock = stubFetch(async (_url, init) => {
      sent = new TextDecoder().decode(await new Response(init?.body).arrayBuffer());
      return new Response(null, { status: 200 });
    });
    const body: ChunkedBody = {
      write: async (writer) => {
        await writer(encode('abc'), 'chunk-signature=s1');
        await writer(new Uint8Array(0), 'chunk-signature=s2');
      },
    };

    await new FetchTransport().send({
      method: 'PUT',
      url: 'https://s3.amazonaws.com/bucket/key',
      headers: {
        host: 's3.amazonaws.com',
        'content-encoding': 'aws-chunked',
        'transfer-encoding': 'chunked',
        'x-amz-decoded-content-length': '3',
      },
      body,
    });

    expect(sent).toBe('3;chunk-signature=s1\r\nabc\r\n0;chunk-signature=s2\r\n\r\n');
    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toEqual({
      'content-encoding': 'aws-chunked',
      'x-amz-decoded-content-length': '3',
    });
  });

  it('should surface an error raised while producing chunks', async () => {
    stubFetch(async (_url, init) => {
      await new Response(init?.body).arrayBuffer();
      return new Response(null, { status: 200 });
    });
    const failure = PreconditionError.payloadSizeMismatch(10, 4);
    const body: ChunkedBody = {
      write: async (writer) => {
        await writer(encode('abcd'), 'chunk-signature=s1');
        throw failure;
      },
    };

    await expect(
      new FetchTransport().send({ method: 'PUT', url: 'https://h/k', headers: {}, body })
    ).rejects.toBe(failure);
  });

  it('should stop producing chunks when the response arrives before the body is read', async () => {
    stubFetch(async () => new Response('<Error><Code>SignatureDoesNotMatch</Code></Error>', { status: 403 }));
    let sourceClosed = false;
    async function* blocks(): AsyncGenerator<Uint8Array> {
      try {
        for (let i = 0; i < 10; i++) {
          yield encode('block');
        }
      } finally {
        sourceClosed = true;
      }
    }
    const body: ChunkedBody = {
      write: async (writer) => {
        for await (const block of blocks()) {
          await writer(block, 'chunk-signature=s');
        }
      },
    };

    const response = await new FetchTransport().send({ method: 'PUT', url: 'https://h/k', headers: {}, body });

    expect(response.status).toBe(403);
    await vi.waitFor(() => {
      expect(sourceClosed).toBe(true);
    });
  });

  it('should map network failures to a retriable TransportError', async () => {
    stubFetch(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await new FetchTransport()
      .send({ method: 'POST', url: 'https://h/', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ retriable: true, serviceMessage: 'fetch failed' });
  });

  it('should map a timeout to a TransportError', async () => {
    stubFetch(async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), {
        name: 'TimeoutError',
      });
    });

    await expect(
      new FetchTransport({ timeout: 250 }).send({ method: 'POST', url: 'https://h/', headers: {} })
    ).rejects.toMatchObject({ serviceMessage: 'Request timed out after 250ms' });
  });

  it('should pass an abort signal to fetch', async () => {
    const fetchMock = stubFetch(async () => new Response(null, { status: 200 }));

    await new FetchTransport({ timeout: 250 }).send({ method: 'GET', url: 'https://h/', headers: {} });

    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });
});
