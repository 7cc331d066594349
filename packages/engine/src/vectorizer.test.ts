import { describe, it, expect } from 'vitest';
import { buildDocument, projectQuery, tokenize, vectorizeCorpus } from './vectorizer.js';
import { DUNE_CATALOG, makeItem } from './__fixtures__/catalog.js';

describe('tokenize', () => {
  it('lowercases, drops stop words and single characters', () => {
    expect(tokenize('The Dune Messiah, a Novel!')).toEqual(['dune', 'messiah', 'novel']);
  });

  it('keeps accented letters inside words', () => {
    expect(tokenize('Les Misérables')).toEqual(['les', 'misérables']);
    expect(tokenize('Emily Brontë')).toEqual(['emily', 'brontë']);
  });

  it('keeps combining marks inside words', () => {
    expect(tokenize('Bronte\u0308')).toEqual(['bronte\u0308']);
  });

  it('keeps words in non-Latin scripts', () => {
    expect(tokenize('ノルウェイの森 村上春樹')).toEqual(['ノルウェイの森', '村上春樹']);
  });

  it('returns nothing for blank text', () => {
    expect(tokenize('   ')).toEqual([]);
  });
});

describe('buildDocument', () => {
  it('joins title, author and topic with spaces', () => {
    expect(buildDocument(makeItem('1', 'Emma', 'Jane Austen', 'romance'))).toBe(
      'Emma Jane Austen romance'
    );
  });

  it('treats missing fields as empty strings', () => {
    expect(buildDocument({ id: '1', title: 'Emma' })).toBe('Emma  ');
  });
});

describe('vectorizeCorpus', () => {
  it('returns an empty matrix for an empty corpus', () => {
    const corpus = vectorizeCorpus([]);
    expect(corpus.vocabulary.size).toBe(0);
    expect(corpus.rows).toEqual([]);
  });

  it('assigns columns in sorted term order', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    expect([...corpus.vocabulary.keys()]).toEqual([
      'austen',
      'dune',
      'emma',
      'frank',
      'herbert',
      'jane',
      'messiah',
      'romance',
      'scifi',
    ]);
  });

  it('uses smoothed idf', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const dune = corpus.vocabulary.get('dune') ?? -1;
    const messiah = corpus.vocabulary.get('messiah') ?? -1;
    expect(corpus.idf[dune]).toBeCloseTo(Math.log(4 / 3) + 1, 12);
    expect(corpus.idf[messiah]).toBeCloseTo(Math.log(2) + 1, 12);
  });

  it('L2-normalises every row', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const first = [...corpus.rows[0].values()];
    expect(first).toHaveLength(4);
    for (const weight of first) {
      expect(weight).toBeCloseTo(0.5, 12);
    }

    const messiah = corpus.vocabulary.get('messiah') ?? -1;
    expect(corpus.rows[1].get(messiah)).toBeCloseTo(0.5493512310263033, 12);
  });

  it('leaves rows with no usable terms empty', () => {
    const corpus = vectorizeCorpus([makeItem('x', 'The', 'a', 'of'), ...DUNE_CATALOG]);
    expect(corpus.rows[0].size).toBe(0);
    expect(corpus.rows).toHaveLength(4);
  });

  it('is deterministic for identical input', () => {
    expect(vectorizeCorpus(DUNE_CATALOG)).toEqual(vectorizeCorpus(DUNE_CATALOG));
  });

  it('weights rows independently of corpus order', () => {
    const forward = vectorizeCorpus(DUNE_CATALOG);
    const reversed = vectorizeCorpus([...DUNE_CATALOG].reverse());
    expect(reversed.rows[2]).toEqual(forward.rows[0]);
    expect(reversed.rows[0]).toEqual(forward.rows[2]);
  });
});

describe('projectQuery', () => {
  it('ignores terms outside the vocabulary', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    expect(projectQuery(corpus, 'xyzzy nonsense').size).toBe(0);
  });

  it('produces a unit vector over known terms', () => {
    const corpus = vectorizeCorpus(DUNE_CATALOG);
    const romance = corpus.vocabulary.get('romance') ?? -1;
    const vector = projectQuery(corpus, 'Romance');
    expect(vector.size).toBe(1);
    expect(vector.get(romance)).toBeCloseTo(1, 12);
  });
});
