import type { Item } from './catalog.js';

export const STRATEGIES = ['content', 'query', 'fuzzy'] as const;

export type Strategy = typeof STRATEGIES[number];

export interface RecommendationRequest {
  items: readonly Item[];
  pastIds: ReadonlySet<string>;
  count: number;
  query?: string;
  strategy: Strategy;
}

export interface RankedItem {
  item: Item;
  index: number;                   // Position in the corpus the ranking was built from
  score: number;
}

export type Ranking = RankedItem[];

export interface StrategyFallback {
  from: Strategy;
  to: Strategy;
  reason: string;
}

export interface RecommendationResult {
  ids: string[];
  strategy: Strategy;              // What the caller asked for
  resolvedStrategy: Strategy;      // What actually produced `ids`
  fallback?: StrategyFallback;
  candidates: number;              // Eligible candidates before trimming to `count`
}

/**
 * One recorded recommendation, keyed by the day it was made.
 */
export interface HistoryEntry {
  recommendedOn: string;           // YYYY-MM-DD
  itemId: string;
}

/**
 * Minimal logging surface the engine writes diagnostics to.
 */
export interface RecommendationLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}
