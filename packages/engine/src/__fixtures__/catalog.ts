import type { Item } from '@shelfwise/shared';

export function makeItem(id: string, title: string, author = '', topic = ''): Item {
  return { id, title, author, topic };
}

/**
 * Three-item catalog whose titles carry the whole document text, so title matching
 * and TF-IDF see the same words.
 */
export const DUNE_CATALOG: Item[] = [
  makeItem('A', 'Dune Frank Herbert scifi'),
  makeItem('B', 'Dune Messiah Frank Herbert scifi'),
  makeItem('C', 'Emma Jane Austen romance'),
];

export const SHELF: Item[] = [
  makeItem('1', 'Dune', 'Frank Herbert', 'scifi'),
  makeItem('2', 'Dune Messiah', 'Frank Herbert', 'scifi'),
  makeItem('3', 'Emma', 'Jane Austen', 'romance'),
  makeItem('4', 'Persuasion', 'Jane Austen', 'romance'),
  makeItem('5', 'Foundation', 'Isaac Asimov', 'scifi'),
  makeItem('6', 'The Hobbit', 'J.R.R. Tolkien', 'fantasy'),
];

/** Every subset of the given IDs, the empty set included. */
export function allSubsets(ids: string[]): Set<string>[] {
  const subsets: Set<string>[] = [];
  for (let mask = 0; mask < 1 << ids.length; mask++) {
    subsets.push(new Set(ids.filter((_, bit) => mask & (1 << bit))));
  }
  return subsets;
}
