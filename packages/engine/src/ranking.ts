import type { Item, Ranking, RankedItem } from '@shelfwise/shared';

/** Below any attainable cosine or token-set score; marks an item that must not be picked. */
export const EXCLUDED_SCORE = -1;

// Scores closer than this compare as equal, so floating-point noise never reorders ties
const SCORE_RESOLUTION = 1e-9;

function quantize(score: number): number {
  return Math.round(score / SCORE_RESOLUTION);
}

/**
 * Sort descending by score, ties broken by corpus index.
 */
export function sortRanking(entries: RankedItem[]): Ranking {
  return [...entries].sort(
    (a, b) => quantize(b.score) - quantize(a.score) || a.index - b.index
  );
}

/**
 * Score every item and return the sorted ranking. Items whose ID is excluded keep their
 * place in the ranking with EXCLUDED_SCORE instead of being dropped.
 */
export function scoreItems(
  items: readonly Item[],
  excludedIds: ReadonlySet<string>,
  score: (index: number) => number
): Ranking {
  return sortRanking(
    items.map((item, index) => ({
      item,
      index,
      score: excludedIds.has(item.id) ? EXCLUDED_SCORE : score(index),
    }))
  );
}

/**
 * Explicit ID -> corpus index map. The first occurrence wins for duplicate IDs.
 */
export function buildIndexById(items: readonly Item[]): Map<string, number> {
  const indexById = new Map<string, number>();
  items.forEach((item, index) => {
    if (!indexById.has(item.id)) {
      indexById.set(item.id, index);
    }
  });
  return indexById;
}

/**
 * Distinct IDs from the ranking, in order, skipping excluded ones.
 */
export function eligibleIds(ranking: Ranking, excludedIds: ReadonlySet<string>): string[] {
  const seen = new Set<string>();
  const ids: string[] = [];
  for (const { item } of ranking) {
    if (excludedIds.has(item.id) || seen.has(item.id)) continue;
    seen.add(item.id);
    ids.push(item.id);
  }
  return ids;
}
