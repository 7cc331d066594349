/**
 * Approximate title matching for free-text queries.
 * Token-set scoring: word order and extra words on either side are tolerated.
 */

import natural from 'natural';
import type { Item, Ranking } from '@shelfwise/shared';
import { scoreItems } from './ranking.js';

/** Titles scoring below this are never recommended by the fuzzy strategy. */
export const FUZZY_SCORE_FLOOR = 80;

/** Candidates taken from the title ranking per requested recommendation. */
export const FUZZY_CANDIDATE_MULTIPLIER = 3;

const NO_EXCLUSIONS: ReadonlySet<string> = new Set();

/**
 * Lowercase, turn anything that isn't a letter or digit into a space, collapse whitespace.
 */
export function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

/**
 * Similarity of two strings in [0, 100] based on insert/delete edit distance.
 */
export function ratio(left: string, right: string): number {
  if (!left.length || !right.length) return 0;

  const total = left.length + right.length;
  // A substitution costs a deletion plus an insertion
  const distance = natural.LevenshteinDistance(left, right, {
    insertion_cost: 1,
    deletion_cost: 1,
    substitution_cost: 2,
  });
  return Math.round((100 * (total - distance)) / total);
}

function tokenSet(text: string): Set<string> {
  return new Set(text.split(' ').filter(Boolean));
}

function joinSorted(tokens: Iterable<string>): string {
  return [...tokens].sort().join(' ');
}

/**
 * Token-set ratio: compares the shared words against each side's full word set.
 * A query whose words all appear in the title scores 100 regardless of order.
 */
export function tokenSetRatio(query: string, title: string): number {
  const normalizedQuery = normalizeForMatch(query);
  const normalizedTitle = normalizeForMatch(title);
  if (!normalizedQuery || !normalizedTitle) return 0;

  const queryTokens = tokenSet(normalizedQuery);
  const titleTokens = tokenSet(normalizedTitle);

  const shared = joinSorted([...queryTokens].filter(token => titleTokens.has(token)));
  const queryOnly = joinSorted([...queryTokens].filter(token => !titleTokens.has(token)));
  const titleOnly = joinSorted([...titleTokens].filter(token => !queryTokens.has(token)));

  const withQuery = [shared, queryOnly].filter(Boolean).join(' ');
  const withTitle = [shared, titleOnly].filter(Boolean).join(' ');

  return Math.max(
    ratio(shared, withQuery),
    ratio(shared, withTitle),
    ratio(withQuery, withTitle)
  );
}

/**
 * Rank every item by the token-set ratio of its title against the query.
 */
export function rankByTitle(items: readonly Item[], query: string): Ranking {
  return scoreItems(items, NO_EXCLUSIONS, index => tokenSetRatio(query, items[index].title ?? ''));
}
