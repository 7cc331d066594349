import {
  err,
  type CatalogSnapshot,
  type Item,
  type ItemFetchFailure,
  type RecommendationLogger,
} from '@shelfwise/shared';
import type { CatalogSource, ItemFetchOutcome } from './source.js';
import type { SnapshotCache } from './snapshot-cache.js';

export interface SyncReport {
  items: Item[];
  syncedAt: string;
  /** False when the cached snapshot was reused as is */
  refreshed: boolean;
  /** Items the source listed but could not deliver; they are left out of the snapshot */
  failures: ItemFetchFailure[];
}

export interface SyncOptions {
  logger: RecommendationLogger;
  /** Ignore the cached snapshot and fetch everything */
  force?: boolean;
  now?: () => Date;
}

function sameIdSet(upstreamIds: string[], snapshot: CatalogSnapshot): boolean {
  const upstream = new Set(upstreamIds);
  const cached = new Set(snapshot.items.map(item => item.id));
  if (upstream.size !== cached.size) return false;
  for (const id of upstream) {
    if (!cached.has(id)) return false;
  }
  return true;
}

async function fetchOutcome(source: CatalogSource, id: string): Promise<ItemFetchOutcome> {
  try {
    return await source.fetchItem(id);
  } catch (error) {
    return err({ id, reason: 'error', message: error instanceof Error ? error.message : String(error) });
  }
}

/**
 * Bring the local snapshot in line with the source.
 *
 * Reuses the cached snapshot verbatim when the upstream ID set is unchanged; on any
 * difference every item is fetched again and the snapshot is replaced.
 */
export async function syncCatalog(
  source: CatalogSource,
  cache: SnapshotCache,
  options: SyncOptions
): Promise<SyncReport> {
  const { logger, force = false, now = () => new Date() } = options;

  const upstreamIds = await source.listIds();
  logger.debug('Listed upstream catalog', { items: upstreamIds.length });

  const cached = force ? null : await cache.load();
  if (cached && sameIdSet(upstreamIds, cached)) {
    logger.debug('Catalog unchanged, using cached snapshot', { items: cached.items.length });
    return { items: cached.items, syncedAt: cached.syncedAt, refreshed: false, failures: [] };
  }

  logger.info('Refreshing catalog snapshot', {
    upstream: upstreamIds.length,
    cached: cached?.items.length ?? 0,
  });

  const items: Item[] = [];
  const failures: ItemFetchFailure[] = [];
  for (const id of upstreamIds) {
    const outcome = await fetchOutcome(source, id);
    if (outcome.ok) {
      items.push(outcome.value);
    } else {
      logger.warn(`Failed loading details for ${id}`, {
        reason: outcome.error.reason,
        message: outcome.error.message,
      });
      failures.push(outcome.error);
    }
  }

  const snapshot: CatalogSnapshot = { syncedAt: now().toISOString(), items };
  await cache.save(snapshot);
  logger.debug(`Caching ${items.length} items`);

  return { items, syncedAt: snapshot.syncedAt, refreshed: true, failures };
}
