// Catalog types shared between the engine and the catalog collaborators

/**
 * A single catalog entry. Immutable for the duration of a session.
 */
export interface Item {
  id: string;
  title: string;
  author: string;
  topic: string;
}

/**
 * Snapshot of the catalog as last synced from the upstream library.
 */
export interface CatalogSnapshot {
  syncedAt: string;                // ISO 8601
  items: Item[];
}

export type ItemFetchFailureReason = 'not-found' | 'invalid' | 'error';

export interface ItemFetchFailure {
  id: string;
  reason: ItemFetchFailureReason;
  message: string;
}
