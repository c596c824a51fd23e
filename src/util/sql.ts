// src/util/sql.ts
// What: Vector helpers shared by the store adapters.
// How: vectorToParam formats an array for ::vector casting; distanceToSimilarity turns pgvector cosine distance
//      into cosine similarity; cosineSimilarity and the blob codecs serve the SQLite adapter.

export function vectorToParam(v: number[]): string {
  // Postgres vector literal: [0.1, 0.2, ...]
  return `[${v.join(',')}]`;
}

export function distanceToSimilarity(distance: number): number {
  return 1 - distance;
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function encodeVector(values: number[]): Buffer {
  const arr = Float32Array.from(values);
  return Buffer.from(arr.buffer, arr.byteOffset, arr.byteLength);
}

export function decodeVector(buffer: Buffer): Float32Array {
  // Copy: the blob's backing buffer is not guaranteed to be 4-byte aligned.
  const copy = new Uint8Array(buffer.byteLength);
  copy.set(buffer);
  return new Float32Array(copy.buffer);
}
