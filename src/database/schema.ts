/**
 * Chunk Embedding Encoding
 *
 * Embedding encoding for the chunks table. Vectors are stored as
 * little-endian Float32 BLOBs.
 */

// ============================================================================
// Utilities
// ============================================================================

/**
 * Convert an embedding to a Buffer for BLOB storage (Float32).
 *
 * @example
 * ```ts
 * const blob = embeddingToBlob(new Float32Array([0.1, 0.2, 0.3]));
 * db.prepare('INSERT INTO chunks (embedding) VALUES (?)').run(blob);
 * ```
 */
export function embeddingToBlob(embedding: Float32Array | number[]): Buffer {
  const floats = embedding instanceof Float32Array ? embedding : Float32Array.from(embedding);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert Buffer from BLOB back to Float32Array.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  // Copy so the view is 4-byte aligned whatever pooled buffer it came from
  const copy = new Uint8Array(blob.length);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.length / 4));
}
