/**
 * AWS client
 *
 * Signs and sends JSON-RPC calls and chunk-signed streaming uploads, retrying
 * failed attempts with jittered exponential backoff. Every attempt fetches
 * credentials, takes a fresh timestamp and signs the request again.
 */

import {
  createConfigFromEnv,
  normalizeConfig,
  type ClientConfig,
  type PartialClientConfig,
} from '../config/index.js';
import {
  CachingCredentialSource,
  EnvironmentCredentialSource,
  type CredentialSource,
  type Credentials,
} from '../credentials/index.js';
import {
  PreconditionError,
  classifyError,
  parseErrorBody,
  type AuthorizationContext,
  type AuthorizationError,
} from '../errors/index.js';
import { createLogger, logOperation, type Logger } from '../observability/index.js';
import {
  RetryExecutor,
  captureAttempt,
  type RandomSource,
  type Sleeper,
} from '../resilience/index.js';
import {
  ChunkSignatureChain,
  RequestSigner,
  STREAMING_PAYLOAD,
  SigningKeyCache,
  assertBlockSize,
  readBlocks,
  sha256Hex,
  uriEncodePath,
  utf8,
} from '../signing/index.js';
import {
  FetchTransport,
  getHeader,
  getRequestId,
  isSuccessResponse,
  removeHeader,
  setHeader,
  type ChunkedBody,
  type HttpResponse,
  type HttpTransport,
} from '../transport/index.js';
import { AwsResponse } from './response.js';

/**
 * Source of the signing timestamp
 */
export type Clock = () => Date;

/**
 * Upload payload. A function is called once per attempt and must return a
 * fresh stream from byte 0 every time.
 */
export type UploadPayload = Uint8Array | (() => AsyncIterable<Uint8Array>);

/**
 * Storage class sent when the caller sets none
 */
export const DEFAULT_STORAGE_CLASS = 'STANDARD';

export interface AwsClientOptions {
  /** HTTP transport; defaults to a FetchTransport with the configured timeout */
  transport?: HttpTransport;
  /** Logger; defaults to a console logger at the configured level */
  logger?: Logger;
  /** Signing key cache, shareable between clients */
  keyCache?: SigningKeyCache;
  clock?: Clock;
  sleeper?: Sleeper;
  random?: RandomSource;
}

/**
 * Attempt body. `use` records the credentials the attempt signs with, so an
 * authorization failure can report exactly those to the credential source.
 */
type AttemptBody<T> = (use: (credentials: Credentials) => void) => Promise<T>;

async function* singleBlock(bytes: Uint8Array): AsyncGenerator<Uint8Array> {
  yield bytes;
}

function openPayload(payload: UploadPayload): AsyncIterable<Uint8Array> {
  return payload instanceof Uint8Array ? singleBlock(payload) : payload();
}

export class AwsClient {
  readonly config: ClientConfig;
  private readonly credentialSource: CredentialSource;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly signer: RequestSigner;
  private readonly clock: Clock;
  private readonly sleeper?: Sleeper;
  private readonly random?: RandomSource;

  /**
   * @throws {ConfigError} If the configuration is invalid
   */
  constructor(
    config: PartialClientConfig,
    credentialSource: CredentialSource,
    options: AwsClientOptions = {}
  ) {
    this.config = normalizeConfig(config);
    this.credentialSource = credentialSource;
    this.transport = options.transport ?? new FetchTransport({ timeout: this.config.timeout });
    this.logger = options.logger ?? createLogger(this.config.logLevel);
    this.signer = new RequestSigner({
      region: this.config.region,
      service: this.config.service,
      keyCache: options.keyCache,
    });
    this.clock = options.clock ?? (() => new Date());
    this.sleeper = options.sleeper;
    this.random = options.random;
  }

  /**
   * Scope under which credentials are requested and invalidated
   */
  get credentialScope(): string {
    return `${this.config.region}/${this.config.service}`;
  }

  /**
   * Calls a JSON-RPC operation (`x-amz-target`) with a JSON payload.
   *
   * @example
   * ```typescript
   * const response = await client.request('DynamoDB_20120810.ListTables', {});
   * ```
   *
   * @throws {AwsServiceError} The last failure once retries are exhausted,
   * or the first non-retriable one
   */
  async request(operation: string, payload: unknown = {}): Promise<AwsResponse> {
    const body = utf8(JSON.stringify(payload ?? {}));
    const payloadHash = sha256Hex(body);
    const started = Date.now();

    const response = await this.execute(operation, async (use) => {
      const credentials = await this.credentialSource.credentials(this.credentialScope);
      use(credentials);

      const signed = this.signer.signRequest(
        {
          method: 'POST',
          uri: '/',
          headers: {
            host: this.config.endpoint,
            'x-amz-target': operation,
            'content-type': this.config.jsonContentType,
          },
          payloadHash,
        },
        credentials,
        this.clock()
      );

      const httpResponse = await this.transport.send({
        method: 'POST',
        url: this.url('/'),
        headers: signed.headers,
        body,
      });
      return this.checkForError(httpResponse);
    });

    logOperation(this.logger, operation, response.status, Date.now() - started);
    return response;
  }

  /**
   * Uploads a payload with chunk-signed aws-chunked encoding.
   *
   * The block size is checked before credentials are fetched or anything is
   * sent. `resource` is an unencoded path; a leading `/` is added when
   * missing.
   *
   * @example
   * ```typescript
   * await client.upload('PUT', 'bucket/key.bin', {}, () => createReadStream(file), size);
   * ```
   *
   * @throws {PreconditionError} If the block size is too small or the payload
   * length differs from `payloadSize`
   */
  async upload(
    method: string,
    resource: string,
    headers: Record<string, string>,
    payload: UploadPayload,
    payloadSize: number,
    blockSize: number = this.config.uploadBlockSize
  ): Promise<AwsResponse> {
    assertBlockSize(blockSize);
    if (payload instanceof Uint8Array && payload.length !== payloadSize) {
      throw PreconditionError.payloadSizeMismatch(payloadSize, payload.length);
    }

    const httpMethod = method.toUpperCase();
    const uri = uriEncodePath(resource.startsWith('/') ? resource : `/${resource}`);
    const requestHeaders = this.uploadHeaders(headers, payloadSize);
    const operation = `${httpMethod} ${uri}`;
    const started = Date.now();

    const response = await this.execute(operation, async (use) => {
      const credentials = await this.credentialSource.credentials(this.credentialScope);
      use(credentials);

      const signed = this.signer.signRequest(
        { method: httpMethod, uri, headers: requestHeaders, payloadHash: STREAMING_PAYLOAD },
        credentials,
        this.clock()
      );

      const chain = new ChunkSignatureChain({
        signingKey: signed.signingKey,
        dateStamp: signed.dateStamp,
        timeStampUTC: signed.timeStampUTC,
        region: this.config.region,
        service: this.config.service,
        seedSignatureHex: signed.signatureHex,
        payloadSize,
      });

      const body: ChunkedBody = {
        write: async (writer) => {
          for await (const block of readBlocks(openPayload(payload), blockSize, payloadSize)) {
            const chunk = chain.next(block);
            await writer(chunk.bytes, chunk.extension);
          }
          const last = chain.finish();
          await writer(last.bytes, last.extension);
        },
      };

      const httpResponse = await this.transport.send({
        method: httpMethod,
        url: this.url(uri),
        headers: signed.headers,
        body,
      });
      return this.checkForError(httpResponse);
    });

    logOperation(this.logger, operation, response.status, Date.now() - started);
    return response;
  }

  /**
   * Closes the underlying transport
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  private async execute<T>(operation: string, body: AttemptBody<T>): Promise<T> {
    const executor = new RetryExecutor({
      maxRetries: this.config.maxErrorRetry,
      initialBackoffMs: this.config.initialBackoffMs,
      operation,
      logger: this.logger,
      sleeper: this.sleeper,
      random: this.random,
      onAuthorizationFailure: (context, error) => this.invalidateCredentials(context, error),
    });

    return executor.execute(() => {
      let used: Credentials | undefined;
      return captureAttempt(
        () =>
          body((credentials) => {
            used = credentials;
          }),
        () => (used ? { scope: this.credentialScope, credentials: used } : undefined)
      );
    });
  }

  private async invalidateCredentials(
    context: AuthorizationContext,
    error: AuthorizationError
  ): Promise<void> {
    this.signer.invalidateKeys(context.credentials.accessKeyId);
    await this.credentialSource.credentialsInvalid(
      context.scope,
      context.credentials,
      error.message
    );
  }

  private uploadHeaders(headers: Record<string, string>, payloadSize: number): Record<string, string> {
    const result = { ...headers };

    const contentEncoding = getHeader(result, 'content-encoding');
    setHeader(
      result,
      'content-encoding',
      contentEncoding ? `aws-chunked,${contentEncoding}` : 'aws-chunked'
    );
    removeHeader(result, 'content-length');
    setHeader(result, 'transfer-encoding', 'chunked');
    setHeader(result, 'x-amz-decoded-content-length', String(payloadSize));
    if (getHeader(result, 'x-amz-storage-class') === undefined) {
      setHeader(result, 'x-amz-storage-class', DEFAULT_STORAGE_CLASS);
    }
    setHeader(result, 'host', this.config.endpoint);

    return result;
  }

  private checkForError(response: HttpResponse): AwsResponse {
    if (isSuccessResponse(response)) {
      return new AwsResponse(response);
    }

    const { type, message } = parseErrorBody(response.body);
    throw classifyError(response.status, type, message, {
      prefix: this.config.errorTypePrefix,
      requestId: getRequestId(response.headers),
    });
  }

  private url(path: string): string {
    return `${this.config.protocol}://${this.config.endpoint}${path}`;
  }
}

/**
 * Creates a client configured from environment variables, with credentials
 * from AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY behind a shared cache.
 */
export function createClientFromEnv(
  overrides: PartialClientConfig = {},
  options: AwsClientOptions = {}
): AwsClient {
  const config = createConfigFromEnv(overrides);
  const logger = options.logger ?? createLogger(config.logLevel);
  const credentials = new CachingCredentialSource(new EnvironmentCredentialSource(process.env, logger), {
    logger,
  });
  return new AwsClient(config, credentials, { ...options, logger });
}
