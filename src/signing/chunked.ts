/**
 * Chunk-signed streaming uploads.
 *
 * A streaming upload is signed once with the `STREAMING-AWS4-HMAC-SHA256-PAYLOAD`
 * sentinel as payload hash; that seed signature starts a chain in which every
 * chunk's string to sign contains the previous chunk's signature. A final
 * zero-length chunk closes the stream.
 *
 * The chain holds only the previous signature and the remaining byte count,
 * so memory use does not grow with the payload.
 */

import { PreconditionError } from '../errors/index.js';
import { EMPTY_SHA256, hmacSha256, sha256Hash, toHex, utf8 } from './crypto.js';
import { createCredentialScope } from './signer.js';
import type { SignableChunk } from './types.js';

export const CHUNK_SIGNING_ALGORITHM = 'AWS4-HMAC-SHA256-PAYLOAD';

/** Block sizes must be strictly larger than this, 8 KiB */
export const MIN_BLOCK_SIZE = 8 * 1024;

/** Default block size, 512 KiB */
export const DEFAULT_BLOCK_SIZE = 512 * 1024;

const CRLF = '\r\n';

/**
 * A chunk ready for the transport
 */
export interface SignedChunk {
  readonly bytes: Uint8Array;
  readonly signatureHex: string;
  /** `chunk-signature=<hex>` */
  readonly extension: string;
}

/**
 * @throws {PreconditionError} When the block size is not an integer above 8 KiB
 */
export function assertBlockSize(blockSize: number): void {
  if (!Number.isInteger(blockSize) || blockSize <= MIN_BLOCK_SIZE) {
    throw PreconditionError.blockSizeTooSmall(blockSize, MIN_BLOCK_SIZE);
  }
}

/**
 * Creates the chunk string to sign:
 * AWS4-HMAC-SHA256-PAYLOAD\n
 * TIMESTAMP\n
 * CREDENTIAL_SCOPE\n
 * PREVIOUS_SIGNATURE\n
 * HEX(SHA256(""))\n
 * HEX(SHA256(CHUNK))
 */
export function createChunkStringToSign(chunk: SignableChunk): string {
  return [
    CHUNK_SIGNING_ALGORITHM,
    `${chunk.dateStamp}T${chunk.timeStampUTC}`,
    createCredentialScope(chunk.dateStamp, chunk.region, chunk.service),
    chunk.previousSignatureHex,
    EMPTY_SHA256,
    toHex(chunk.chunkPayloadHash),
  ].join('\n');
}

/**
 * Signs one chunk and returns the hex signature
 */
export function signChunk(chunk: SignableChunk, signingKey: Uint8Array): string {
  return toHex(hmacSha256(signingKey, createChunkStringToSign(chunk)));
}

export interface ChunkSignatureChainParams {
  signingKey: Uint8Array;
  dateStamp: string;
  timeStampUTC: string;
  region: string;
  service: string;
  /** Signature of the request headers, which chunk 0 chains from */
  seedSignatureHex: string;
  /** Decoded payload length, `x-amz-decoded-content-length` */
  payloadSize: number;
}

export class ChunkSignatureChain {
  private readonly params: ChunkSignatureChainParams;
  private previousSignature: string;
  private remaining: number;
  private finished = false;

  constructor(params: ChunkSignatureChainParams) {
    this.params = params;
    this.previousSignature = params.seedSignatureHex;
    this.remaining = params.payloadSize;
  }

  get signature(): string {
    return this.previousSignature;
  }

  get remainingBytes(): number {
    return this.remaining;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Signs the next data chunk
   *
   * @throws {PreconditionError} If the chain is complete, the chunk is
   * empty, or it runs past the declared payload size
   */
  next(bytes: Uint8Array): SignedChunk {
    if (this.finished) {
      throw PreconditionError.chainComplete();
    }
    if (bytes.length === 0 || bytes.length > this.remaining) {
      throw PreconditionError.payloadSizeMismatch(
        this.params.payloadSize,
        this.params.payloadSize - this.remaining + bytes.length
      );
    }

    const signed = this.signNext(bytes);
    this.remaining -= bytes.length;
    return signed;
  }

  /**
   * Signs the terminating zero-length chunk
   *
   * @throws {PreconditionError} If data is still outstanding or the chain
   * is already complete
   */
  finish(): SignedChunk {
    if (this.finished) {
      throw PreconditionError.chainComplete();
    }
    if (this.remaining !== 0) {
      throw PreconditionError.payloadSizeMismatch(
        this.params.payloadSize,
        this.params.payloadSize - this.remaining
      );
    }

    const signed = this.signNext(new Uint8Array(0));
    this.finished = true;
    return signed;
  }

  private signNext(bytes: Uint8Array): SignedChunk {
    const { signingKey, dateStamp, timeStampUTC, region, service } = this.params;
    const signatureHex = signChunk(
      {
        dateStamp,
        timeStampUTC,
        region,
        service,
        previousSignatureHex: this.previousSignature,
        chunkPayloadHash: sha256Hash(bytes),
      },
      signingKey
    );
    this.previousSignature = signatureHex;
    return { bytes, signatureHex, extension: `chunk-signature=${signatureHex}` };
  }
}

/**
 * Re-slices a byte stream into blocks of exactly `blockSize` bytes, the
 * last one possibly shorter. Holds at most one block in memory.
 *
 * @throws {PreconditionError} If the source yields more or fewer bytes than
 * `totalSize`
 */
export async function* readBlocks(
  source: AsyncIterable<Uint8Array>,
  blockSize: number,
  totalSize: number
): AsyncGenerator<Uint8Array> {
  assertBlockSize(blockSize);

  let block = new Uint8Array(blockSize);
  let filled = 0;
  let total = 0;

  for await (const piece of source) {
    total += piece.length;
    if (total > totalSize) {
      throw PreconditionError.payloadSizeMismatch(totalSize, total);
    }

    let offset = 0;
    while (offset < piece.length) {
      const take = Math.min(blockSize - filled, piece.length - offset);
      block.set(piece.subarray(offset, offset + take), filled);
      filled += take;
      offset += take;

      if (filled === blockSize) {
        yield block;
        block = new Uint8Array(blockSize);
        filled = 0;
      }
    }
  }

  if (total !== totalSize) {
    throw PreconditionError.payloadSizeMismatch(totalSize, total);
  }
  if (filled > 0) {
    yield block.subarray(0, filled);
  }
}

/**
 * Frames a chunk for an aws-chunked body:
 * `<hex length>;<extension>\r\n<bytes>\r\n`
 */
export function encodeAwsChunk(bytes: Uint8Array, extension: string): Uint8Array {
  const header = utf8(`${bytes.length.toString(16)};${extension}${CRLF}`);
  const frame = new Uint8Array(header.length + bytes.length + CRLF.length);
  frame.set(header, 0);
  frame.set(bytes, header.length);
  frame.set(utf8(CRLF), header.length + bytes.length);
  return frame;
}

/**
 * Length of the aws-chunked encoding of a payload, framing included
 */
export function awsChunkedLength(payloadSize: number, blockSize: number): number {
  const signatureFrame = ';chunk-signature='.length + 64 + 2 * CRLF.length;
  const frameLength = (dataLength: number): number =>
    dataLength.toString(16).length + signatureFrame + dataLength;

  const fullBlocks = Math.floor(payloadSize / blockSize);
  const lastLength = payloadSize - fullBlocks * blockSize;

  return (
    fullBlocks * frameLength(blockSize) +
    (lastLength > 0 ? frameLength(lastLength) : 0) +
    frameLength(0)
  );
}
