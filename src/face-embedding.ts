/**
 * Face embedding construction.
 *
 * Every embedding that leaves the pipeline is built through createFaceEmbedding,
 * which L2-normalizes the raw model output before it is sent for
 * comparison. A zero vector (degenerate model output) is kept as-is rather
 * than divided by zero.
 */

import type { FaceEmbedding } from "./types.js";

/** Euclidean (L2) norm of a vector. */
export function l2Norm(values: ArrayLike<number>): number {
  let sumSquares = 0;
  for (let i = 0; i < values.length; i++) {
    sumSquares += values[i] * values[i];
  }
  return Math.sqrt(sumSquares);
}

export function createFaceEmbedding(raw: ArrayLike<number>): FaceEmbedding {
  const norm = l2Norm(raw);
  const values = Array.from(raw, (v) => (norm > 0 ? v / norm : v));
  return Object.freeze({ values: Object.freeze(values) });
}

