/**
 * Vector math shared by the identity indexes and the CLIP extractor.
 */

export function dot(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new Error(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(v: Float32Array): number {
  return Math.sqrt(dot(v, v));
}

/**
 * Returns a unit-norm copy of the vector.
 * A zero vector cannot be normalized and is rejected.
 */
export function normalize(v: ArrayLike<number>): Float32Array {
  const out = Float32Array.from(v);
  const n = norm(out);
  if (n === 0 || !Number.isFinite(n)) {
    throw new Error('Cannot normalize a zero or non-finite vector');
  }
  for (let i = 0; i < out.length; i++) {
    out[i] /= n;
  }
  return out;
}

/**
 * Cosine similarity in [-1, 1]. Equal to `1 - cosineDistance`.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  const denom = norm(a) * norm(b);
  if (denom === 0) return 0;
  return dot(a, b) / denom;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}
