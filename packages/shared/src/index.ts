export * from './types/index.js';
export {
  StrategySchema,
  ItemSchema,
  CatalogSnapshotSchema,
  HistoryEntrySchema,
  HistoryFileSchema,
  RecommendationParamsSchema,
  formatIssues,
} from './schemas.js';
export type { RecommendationParams } from './schemas.js';
