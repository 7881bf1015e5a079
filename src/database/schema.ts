/**
 * Database Schema Helpers
 *
 * Row shapes live in validation.ts (as Zod schemas); this module holds the
 * id generator and the vector BLOB codec.
 */

import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

/**
 * Encode a vector as a little-endian Float32 BLOB.
 *
 * @example
 * ```ts
 * db.prepare('UPDATE index_entries SET vector = ? WHERE chunk_id = ?')
 *   .run(vectorToBlob(vector), chunkId);
 * ```
 */
export function vectorToBlob(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/**
 * Decode a Float32 BLOB. The bytes are copied, since SQLite buffers are
 * not guaranteed to be 4-byte aligned.
 */
export function blobToVector(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer);
}
