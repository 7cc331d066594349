import natural from 'natural';
import type { Item } from '@shelfwise/shared';

/** Column index -> weight. Columns missing from the map are zero. */
export type SparseVector = Map<number, number>;

/**
 * TF-IDF representation of one corpus. Built per call, never shared between corpora.
 */
export interface VectorizedCorpus {
  /** Term -> column index, columns assigned in sorted term order */
  vocabulary: Map<string, number>;
  /** Smoothed inverse document frequency per column */
  idf: number[];
  /** One L2-normalised row per corpus item, same order as the input */
  rows: SparseVector[];
}

const MIN_TOKEN_LENGTH = 2;

// Anything that is not a letter, combining mark, digit or underscore separates words
const tokenizer = new natural.RegexpTokenizer({ pattern: /[^\p{L}\p{M}\p{N}_]+/u });
const STOP_WORDS = new Set(natural.stopwords);

/**
 * Document text for an item: title, author and topic joined by spaces.
 * Missing fields count as empty strings.
 */
export function buildDocument(item: Partial<Item>): string {
  return [item.title ?? '', item.author ?? '', item.topic ?? ''].join(' ');
}

export function tokenize(text: string): string[] {
  return (tokenizer.tokenize(text.toLowerCase()) ?? [])
    .filter(token => token.length >= MIN_TOKEN_LENGTH && !STOP_WORDS.has(token));
}

function countTerms(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function l2Normalize(vector: SparseVector): SparseVector {
  let sumOfSquares = 0;
  for (const value of vector.values()) {
    sumOfSquares += value * value;
  }
  if (sumOfSquares === 0) return new Map();

  const norm = Math.sqrt(sumOfSquares);
  const normalized: SparseVector = new Map();
  for (const [column, value] of vector) {
    normalized.set(column, value / norm);
  }
  return normalized;
}

function weigh(
  counts: Map<string, number>,
  vocabulary: Map<string, number>,
  idf: number[]
): SparseVector {
  const vector: SparseVector = new Map();
  for (const [term, count] of counts) {
    const column = vocabulary.get(term);
    // Terms outside the vocabulary carry no weight
    if (column === undefined) continue;
    vector.set(column, count * idf[column]);
  }
  return l2Normalize(vector);
}

/**
 * Build the TF-IDF matrix for a corpus.
 *
 * Term frequency is the raw count, idf is ln((1 + n) / (1 + df)) + 1 and every row is
 * L2-normalised. An empty corpus yields an empty vocabulary and no rows.
 */
export function vectorizeCorpus(items: readonly Partial<Item>[]): VectorizedCorpus {
  const termCounts = items.map(item => countTerms(tokenize(buildDocument(item))));

  const documentFrequency = new Map<string, number>();
  for (const counts of termCounts) {
    for (const term of counts.keys()) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const terms = [...documentFrequency.keys()].sort();
  const vocabulary = new Map(terms.map((term, column) => [term, column] as const));
  const documentCount = items.length;
  const idf = terms.map(term =>
    Math.log((1 + documentCount) / (1 + (documentFrequency.get(term) ?? 0))) + 1
  );

  return {
    vocabulary,
    idf,
    rows: termCounts.map(counts => weigh(counts, vocabulary, idf)),
  };
}

/**
 * Project free text into the corpus' vector space.
 */
export function projectQuery(corpus: VectorizedCorpus, text: string): SparseVector {
  return weigh(countTerms(tokenize(text)), corpus.vocabulary, corpus.idf);
}
