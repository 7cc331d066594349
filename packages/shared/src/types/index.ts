// Catalog types
export type {
  Item,
  CatalogSnapshot,
  ItemFetchFailure,
  ItemFetchFailureReason,
} from './catalog.js';

// Recommendation types
export type {
  Strategy,
  RecommendationRequest,
  RankedItem,
  Ranking,
  StrategyFallback,
  RecommendationResult,
  HistoryEntry,
  RecommendationLogger,
} from './recommendation.js';
export { STRATEGIES } from './recommendation.js';

// Outcome type
export type { Result } from './result.js';
export { ok, err } from './result.js';
