/**
 * Binary embedding codec
 *
 * Wire format: [u32 LE dimension][dimension × f32 LE]. Used for `.bin`
 * files in the file-backed store and for BLOB columns in SQLite.
 */

import { EmbeddingDecodeError, MAX_EMBEDDING_DIMENSION } from '@scriptdex/core';

const HEADER_BYTES = 4;
const FLOAT_BYTES = 4;

export interface DecodeOptions {
  /** Largest dimension accepted on read (default 10,000) */
  maxDimension?: number;
}

/**
 * Encode a vector. An empty vector encodes to the 4-byte zero header,
 * which {@link deserializeEmbedding} rejects.
 */
export function serializeEmbedding(vector: ArrayLike<number>): Buffer {
  const buf = Buffer.alloc(HEADER_BYTES + vector.length * FLOAT_BYTES);
  buf.writeUInt32LE(vector.length, 0);
  for (let i = 0; i < vector.length; i++) {
    buf.writeFloatLE(vector[i], HEADER_BYTES + i * FLOAT_BYTES);
  }
  return buf;
}

/**
 * Decode a payload produced by {@link serializeEmbedding}.
 *
 * @throws EmbeddingDecodeError on any structural problem
 */
export function deserializeEmbedding(bytes: Uint8Array, options: DecodeOptions = {}): Float32Array {
  const maxDimension = options.maxDimension ?? MAX_EMBEDDING_DIMENSION;

  if (bytes.length < HEADER_BYTES) {
    throw new EmbeddingDecodeError(
      'TOO_SHORT',
      `Embedding payload too short: ${bytes.length} bytes, need at least ${HEADER_BYTES}`,
    );
  }

  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const dimension = buf.readUInt32LE(0);

  if (dimension === 0) {
    throw new EmbeddingDecodeError('ZERO_DIMENSION', 'Embedding payload declares zero dimensions');
  }
  if (dimension > maxDimension) {
    throw new EmbeddingDecodeError(
      'DIMENSION_TOO_LARGE',
      `Embedding dimension ${dimension} exceeds maximum ${maxDimension}`,
    );
  }

  const expected = dimension * FLOAT_BYTES;
  const remaining = buf.length - HEADER_BYTES;
  if (remaining !== expected) {
    throw new EmbeddingDecodeError(
      'SIZE_MISMATCH',
      `Embedding payload size mismatch: expected ${expected} bytes for ${dimension} dimensions, got ${remaining}`,
    );
  }

  const out = new Float32Array(dimension);
  for (let i = 0; i < dimension; i++) {
    out[i] = buf.readFloatLE(HEADER_BYTES + i * FLOAT_BYTES);
  }
  return out;
}
