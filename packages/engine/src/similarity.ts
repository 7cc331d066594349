import type { Item, Ranking } from '@shelfwise/shared';
import { scoreItems } from './ranking.js';
import { projectQuery, type SparseVector, type VectorizedCorpus } from './vectorizer.js';

function dotProduct(left: SparseVector, right: SparseVector): number {
  const [small, large] = left.size <= right.size ? [left, right] : [right, left];
  let dot = 0;
  for (const [column, value] of small) {
    dot += value * (large.get(column) ?? 0);
  }
  return dot;
}

function squaredNorm(vector: SparseVector): number {
  let sum = 0;
  for (const value of vector.values()) {
    sum += value * value;
  }
  return sum;
}

/**
 * Cosine similarity; 0 when either side is the zero vector.
 */
export function cosineSimilarity(left: SparseVector, right: SparseVector): number {
  const denominator = Math.sqrt(squaredNorm(left)) * Math.sqrt(squaredNorm(right));
  if (!denominator) return 0;
  return dotProduct(left, right) / denominator;
}

export function meanVector(vectors: SparseVector[]): SparseVector {
  const mean: SparseVector = new Map();
  if (vectors.length === 0) return mean;

  for (const vector of vectors) {
    for (const [column, value] of vector) {
      mean.set(column, (mean.get(column) ?? 0) + value);
    }
  }
  for (const [column, sum] of mean) {
    mean.set(column, sum / vectors.length);
  }
  return mean;
}

/**
 * Rank every item by cosine similarity to the mean of the given rows.
 */
export function rankByProfile(
  corpus: VectorizedCorpus,
  items: readonly Item[],
  profileIndices: number[],
  excludedIds: ReadonlySet<string>
): Ranking {
  const profile = meanVector(profileIndices.map(index => corpus.rows[index]));
  return scoreItems(items, excludedIds, index => cosineSimilarity(corpus.rows[index], profile));
}

/**
 * Rank every item by cosine similarity to a free-text query.
 */
export function rankByQuery(
  corpus: VectorizedCorpus,
  items: readonly Item[],
  query: string,
  excludedIds: ReadonlySet<string>
): Ranking {
  const target = projectQuery(corpus, query);
  return scoreItems(items, excludedIds, index => cosineSimilarity(corpus.rows[index], target));
}

/**
 * Default ordering when there is nothing to compare against: squared L2 norm of each row.
 */
export function rankByNorm(
  corpus: VectorizedCorpus,
  items: readonly Item[],
  excludedIds: ReadonlySet<string>
): Ranking {
  return scoreItems(items, excludedIds, index => squaredNorm(corpus.rows[index]));
}
