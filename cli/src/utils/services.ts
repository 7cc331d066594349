import type { AppConfig } from '../config/config.js';
import { requireExportFile } from '../config/config.js';
import { ExportFileSource, type CatalogSource } from '../catalog/source.js';
import { JsonSnapshotCache, type SnapshotCache } from '../catalog/snapshot-cache.js';
import { JsonHistoryStore, type HistoryStore } from '../history/history-store.js';
import { createLogger, type Logger } from './logger.js';

/**
 * Collaborators the commands work against. Tests pass in-memory fakes.
 */
export interface CliServices {
  logger: Logger;
  /** Resolved on demand so commands that never sync do not need an export file */
  catalogSource(): CatalogSource;
  snapshotCache: SnapshotCache;
  history: HistoryStore;
}

export function createServices(config: AppConfig): CliServices {
  return {
    logger: createLogger({ level: config.logLevel }),
    catalogSource: () => new ExportFileSource(requireExportFile(config)),
    snapshotCache: new JsonSnapshotCache(config.snapshotFile),
    history: new JsonHistoryStore(config.historyFile),
  };
}
