import { describe, it, expect } from 'vitest';
import { syncCatalog } from './sync.js';
import { LIBRARY, MemorySnapshotCache, MemorySource, book, silentLogger } from '../__fixtures__/fakes.js';

const NOW = () => new Date('2024-03-01T10:00:00.000Z');

describe('syncCatalog', () => {
  it('fetches everything when nothing is cached', async () => {
    const source = new MemorySource(LIBRARY);
    const cache = new MemorySnapshotCache();

    const report = await syncCatalog(source, cache, { logger: silentLogger(), now: NOW });

    expect(report).toEqual({
      items: LIBRARY,
      syncedAt: '2024-03-01T10:00:00.000Z',
      refreshed: true,
      failures: [],
    });
    expect(cache.snapshot).toEqual({ syncedAt: '2024-03-01T10:00:00.000Z', items: LIBRARY });
  });

  it('reuses the snapshot when the id set is unchanged', async () => {
    const cached = { syncedAt: '2024-02-01T00:00:00.000Z', items: [...LIBRARY].reverse() };
    const source = new MemorySource(LIBRARY);
    const cache = new MemorySnapshotCache(cached);

    const report = await syncCatalog(source, cache, { logger: silentLogger(), now: NOW });

    expect(report.refreshed).toBe(false);
    expect(report.items).toEqual(cached.items);
    expect(report.syncedAt).toBe('2024-02-01T00:00:00.000Z');
    expect(source.fetched).toEqual([]);
    expect(cache.saves).toBe(0);
  });

  it('replaces the snapshot when an item was added', async () => {
    const cache = new MemorySnapshotCache({ syncedAt: '2024-02-01T00:00:00.000Z', items: LIBRARY.slice(0, 2) });
    const source = new MemorySource(LIBRARY);

    const report = await syncCatalog(source, cache, { logger: silentLogger(), now: NOW });

    expect(report.refreshed).toBe(true);
    expect(source.fetched).toEqual(['1', '2', '3']);
    expect(cache.snapshot?.items).toEqual(LIBRARY);
  });

  it('replaces the snapshot when an item was removed', async () => {
    const cache = new MemorySnapshotCache({ syncedAt: '2024-02-01T00:00:00.000Z', items: LIBRARY });
    const source = new MemorySource(LIBRARY.slice(1));

    const report = await syncCatalog(source, cache, { logger: silentLogger(), now: NOW });

    expect(report.items.map(item => item.id)).toEqual(['2', '3']);
  });

  it('refetches everything when forced', async () => {
    const cache = new MemorySnapshotCache({ syncedAt: '2024-02-01T00:00:00.000Z', items: LIBRARY });
    const source = new MemorySource(LIBRARY);

    const report = await syncCatalog(source, cache, { logger: silentLogger(), force: true, now: NOW });

    expect(report.refreshed).toBe(true);
    expect(source.fetched).toEqual(['1', '2', '3']);
  });

  it('reports items that fail to load and keeps the rest', async () => {
    const source = new MemorySource([...LIBRARY, book('4', 'Persuasion')]);
    source.broken.add('2');
    const logger = silentLogger();

    const report = await syncCatalog(source, new MemorySnapshotCache(), { logger, now: NOW });

    expect(report.items.map(item => item.id)).toEqual(['1', '3', '4']);
    expect(report.failures).toEqual([
      { id: '2', reason: 'error', message: 'connection reset while fetching 2' },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('Failed loading details for 2', {
      reason: 'error',
      message: 'connection reset while fetching 2',
    });
  });
});
