import { describe, it, expect } from 'vitest';
import {
  cosineSimilarity,
  meanVector,
  rankByNorm,
  rankByProfile,
  rankByQuery,
} from './similarity.js';
import { EXCLUDED_SCORE } from './ranking.js';
import { vectorizeCorpus } from './vectorizer.js';
import { DUNE_CATALOG, makeItem } from './__fixtures__/catalog.js';

const NONE = new Set<string>();

describe('cosineSimilarity', () => {
  it('is 1 for a vector against itself', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    for (const row of corpus.rows) {
      expect(cosineSimilarity(row, row)).toBeCloseTo(1, 12);
    }
  });

  it('is 0 against the zero vector', () => {
    expect(cosineSimilarity(new Map([[0, 0.4]]), new Map())).toBe(0);
    expect(cosineSimilarity(new Map(), new Map())).toBe(0);
  });

  it('ignores vector scale', () => {
    const left = new Map([[0, 1], [1, 2]]);
    const right = new Map([[0, 3], [1, 6]]);
    expect(cosineSimilarity(left, right)).toBeCloseTo(1, 12);
  });
});

describe('meanVector', () => {
  it('averages element-wise, treating missing columns as zero', () => {
    expect(meanVector([new Map([[0, 1]]), new Map([[0, 3], [1, 2]])])).toEqual(
      new Map([[0, 2], [1, 1]])
    );
  });

  it('is empty for no vectors', () => {
    expect(meanVector([]).size).toBe(0);
  });
});

describe('rankByProfile', () => {
  it('ranks by similarity to the profile and pins past items to the sentinel', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const ranking = rankByProfile(corpus, DUNE_CATALOG, [0], new Set(['A']));

    expect(ranking.map(entry => entry.item.id)).toEqual(['B', 'C', 'A']);
    expect(ranking[0].score).toBeCloseTo(0.8355915419449177, 12);
    expect(ranking[1].score).toBe(0);
    expect(ranking[2].score).toBe(EXCLUDED_SCORE);
  });

  it('keeps every item in the ranking', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const ranking = rankByProfile(corpus, DUNE_CATALOG, [0, 1], new Set(['A', 'B']));
    expect(ranking).toHaveLength(3);
    expect(ranking[0].item.id).toBe('C');
  });
});

describe('rankByQuery', () => {
  it('puts the matching document first', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const ranking = rankByQuery(corpus, DUNE_CATALOG, 'romance', NONE);
    expect(ranking.map(entry => entry.item.id)).toEqual(['C', 'A', 'B']);
    expect(ranking[0].score).toBeCloseTo(0.5, 12);
  });

  it('scores every item 0 for an unknown query and keeps corpus order', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const ranking = rankByQuery(corpus, DUNE_CATALOG, 'xyzzy', NONE);
    expect(ranking.map(entry => entry.score)).toEqual([0, 0, 0]);
    expect(ranking.map(entry => entry.index)).toEqual([0, 1, 2]);
  });
});

describe('rankByNorm', () => {
  it('breaks the unit-norm tie by corpus index', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const ranking = rankByNorm(corpus, DUNE_CATALOG, NONE);
    expect(ranking.map(entry => entry.item.id)).toEqual(['A', 'B', 'C']);
  });

  it('ranks documents without usable terms last', () => {
    const items = [makeItem('empty', 'The'), ...DUNE_CATALOG];
    const ranking = rankByNorm(vectorizeCorpus(items), items, NONE);
    expect(ranking.map(entry => entry.item.id)).toEqual(['A', 'B', 'C', 'empty']);
    expect(ranking[3].score).toBe(0);
  });
});
