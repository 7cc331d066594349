import { vi } from 'vitest';
import { err, ok, type CatalogSnapshot, type HistoryEntry, type Item } from '@shelfwise/shared';
import type { CatalogSource, ItemFetchOutcome } from '../catalog/source.js';
import type { SnapshotCache } from '../catalog/snapshot-cache.js';
import type { HistoryStore } from '../history/history-store.js';
import type { Logger } from '../utils/logger.js';
import type { CliServices } from '../utils/services.js';

export function book(id: string, title: string, author = '', topic = ''): Item {
  return { id, title, author, topic };
}

export const LIBRARY: Item[] = [
  book('1', 'Dune', 'Frank Herbert', 'scifi'),
  book('2', 'Dune Messiah', 'Frank Herbert', 'scifi'),
  book('3', 'Emma', 'Jane Austen', 'romance'),
];

export class MemorySource implements CatalogSource {
  readonly fetched: string[] = [];
  readonly broken = new Set<string>();

  constructor(public items: Item[]) {}

  async listIds(): Promise<string[]> {
    return this.items.map(item => item.id);
  }

  async fetchItem(id: string): Promise<ItemFetchOutcome> {
    this.fetched.push(id);
    if (this.broken.has(id)) {
      throw new Error(`connection reset while fetching ${id}`);
    }
    const item = this.items.find(candidate => candidate.id === id);
    return item ? ok(item) : err({ id, reason: 'not-found', message: `unknown id ${id}` });
  }
}

export class MemorySnapshotCache implements SnapshotCache {
  saves = 0;

  constructor(public snapshot: CatalogSnapshot | null = null) {}

  async load(): Promise<CatalogSnapshot | null> {
    return this.snapshot;
  }

  async save(snapshot: CatalogSnapshot): Promise<void> {
    this.saves++;
    this.snapshot = snapshot;
  }
}

export class MemoryHistoryStore implements HistoryStore {
  constructor(public recorded: HistoryEntry[] = []) {}

  async entries(): Promise<HistoryEntry[]> {
    return [...this.recorded];
  }

  async pastIds(): Promise<Set<string>> {
    return new Set(this.recorded.map(entry => entry.itemId));
  }

  async append(ids: readonly string[], date: string): Promise<void> {
    for (const itemId of ids) {
      this.recorded.push({ recommendedOn: date, itemId });
    }
  }

  async clear(): Promise<void> {
    this.recorded = [];
  }
}

export function silentLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function fakeServices(items: Item[] = LIBRARY) {
  const source = new MemorySource(items);
  const snapshotCache = new MemorySnapshotCache();
  const history = new MemoryHistoryStore();
  const logger = silentLogger();
  const services: CliServices = {
    logger,
    catalogSource: () => source,
    snapshotCache,
    history,
  };
  return { services, source, snapshotCache, history, logger };
}

export function capture() {
  const lines: string[] = [];
  return { lines, print: (line: string) => { lines.push(line); } };
}
