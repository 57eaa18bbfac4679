import {
  CustomerNotFoundError,
  FeatureError,
  IntelligenceError
} from "../../../utils/error";
import {
  CustomerId,
  FeatureMatrix,
  ScaledFeatureVector,
  SimilarNeighbor,
  SimilarityResult
} from "./types";

function largestMagnitude(vector: ScaledFeatureVector, side: string): number {
  let largest = 0;
  for (const value of vector) {
    if (!Number.isFinite(value)) {
      throw new FeatureError("Cannot compare a vector with a non-finite component", {
        side,
        value
      });
    }
    largest = Math.max(largest, Math.abs(value));
  }
  return largest;
}

/**
 * Cosine similarity computed as dot / sqrt(|a|^2 * |b|^2) after dividing each
 * vector by its largest absolute component. A vector compared with itself
 * yields exactly 1 at any magnitude. Zero-magnitude vectors are similar to
 * nothing (0).
 */
export function cosineSimilarity(
  a: ScaledFeatureVector,
  b: ScaledFeatureVector
): number {
  if (a.length !== b.length) {
    throw new FeatureError(
      `Cannot compare vectors of dimension ${a.length} and ${b.length}`,
      { left: a.length, right: b.length }
    );
  }
  const maxA = largestMagnitude(a, "left");
  const maxB = largestMagnitude(b, "right");
  if (maxA === 0 || maxB === 0) {
    return 0;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] / maxA;
    const y = b[i] / maxB;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const similarity = dot / Math.sqrt(normA * normB);
  return Math.min(1, Math.max(-1, similarity));
}

function assertK(k: number): void {
  if (!Number.isInteger(k) || k < 0) {
    throw new IntelligenceError(
      `k must be a non-negative integer, received ${k}`,
      "INVALID_INPUT",
      { k }
    );
  }
}

/**
 * Ranks every matrix row against `target`, highest similarity first. Ties
 * keep matrix row order. `excludeId` removes a row by identity, never by
 * value.
 */
export function rankNeighbors(
  target: ScaledFeatureVector,
  matrix: FeatureMatrix,
  k: number,
  excludeId?: CustomerId
): SimilarNeighbor[] {
  assertK(k);
  const candidates: SimilarNeighbor[] = [];
  matrix.rows.forEach((row, index) => {
    const customerId = matrix.customerIds[index];
    if (customerId === undefined || customerId === excludeId) {
      return;
    }
    candidates.push({ customerId, similarity: cosineSimilarity(target, row) });
  });
  // Array.prototype.sort is stable
  candidates.sort((left, right) => right.similarity - left.similarity);
  return candidates.slice(0, k);
}

export function findSimilar(
  customerId: CustomerId,
  matrix: FeatureMatrix,
  k: number
): SimilarityResult {
  const index = matrix.customerIds.indexOf(customerId);
  const target = index === -1 ? undefined : matrix.rows[index];
  if (target === undefined) {
    throw new CustomerNotFoundError(customerId);
  }
  return {
    customerId,
    neighbors: rankNeighbors(target, matrix, k, customerId)
  };
}
