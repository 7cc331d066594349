import type {
  Item,
  RecommendationLogger,
  RecommendationRequest,
  RecommendationResult,
  Strategy,
  StrategyFallback,
} from '@shelfwise/shared';
import { FUZZY_CANDIDATE_MULTIPLIER, FUZZY_SCORE_FLOOR, rankByTitle } from './fuzzy-matcher.js';
import { buildIndexById, eligibleIds } from './ranking.js';
import { rankByNorm, rankByProfile, rankByQuery } from './similarity.js';
import { validateRequest } from './validation.js';
import { vectorizeCorpus, type VectorizedCorpus } from './vectorizer.js';

export interface RecommendOptions {
  logger?: RecommendationLogger;
}

const NOOP_LOGGER: RecommendationLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

/**
 * Everything one recommendation call works from. Nothing here outlives the call.
 */
interface RecommendationContext {
  items: readonly Item[];
  pastIds: ReadonlySet<string>;
  indexById: Map<string, number>;
  count: number;
  logger: RecommendationLogger;
  corpus(): VectorizedCorpus;
}

interface StrategyOutcome {
  ids: string[];
  candidates: number;
  resolvedStrategy: Strategy;
  fallback?: StrategyFallback;
}

function createContext(
  request: RecommendationRequest,
  count: number,
  logger: RecommendationLogger
): RecommendationContext {
  let corpus: VectorizedCorpus | null = null;

  return {
    items: request.items,
    pastIds: request.pastIds,
    indexById: buildIndexById(request.items),
    count,
    logger,
    corpus() {
      // Built on first use so the fuzzy strategy only vectorizes when it falls back
      if (!corpus) {
        corpus = vectorizeCorpus(request.items);
        logger.debug('Vectorized corpus', {
          documents: corpus.rows.length,
          vocabulary: corpus.vocabulary.size,
        });
      }
      return corpus;
    },
  };
}

function take(context: RecommendationContext, ranked: string[]): { ids: string[]; candidates: number } {
  return { ids: ranked.slice(0, context.count), candidates: ranked.length };
}

function recommendByContent(context: RecommendationContext): StrategyOutcome {
  const { items, pastIds, indexById, logger } = context;

  const profileIndices = [...pastIds]
    .map(id => indexById.get(id))
    .filter((index): index is number => index !== undefined)
    .sort((a, b) => a - b);

  const ranking = profileIndices.length > 0
    ? rankByProfile(context.corpus(), items, profileIndices, pastIds)
    : rankByNorm(context.corpus(), items, pastIds);

  const { ids, candidates } = take(context, eligibleIds(ranking, pastIds));
  logger.info(`Content top${context.count} recommended IDs`, {
    ids,
    mode: profileIndices.length > 0 ? 'profile' : 'norm',
    profileSize: profileIndices.length,
  });

  return { ids, candidates, resolvedStrategy: 'content' };
}

function recommendByQuery(context: RecommendationContext, query: string | undefined): StrategyOutcome {
  if (!query?.trim()) {
    context.logger.debug('No query text supplied, using content ranking');
    return recommendByContent(context);
  }

  const ranking = rankByQuery(context.corpus(), context.items, query, context.pastIds);
  const { ids, candidates } = take(context, eligibleIds(ranking, context.pastIds));
  context.logger.info(`Query top${context.count} '${query}' recommended IDs`, { ids });

  return { ids, candidates, resolvedStrategy: 'query' };
}

function recommendByFuzzyTitle(context: RecommendationContext, query: string): StrategyOutcome {
  const { items, pastIds, count, logger } = context;

  const matches = rankByTitle(items, query)
    .slice(0, count * FUZZY_CANDIDATE_MULTIPLIER)
    .filter(match => match.score >= FUZZY_SCORE_FLOOR);
  const { ids, candidates } = take(context, eligibleIds(matches, pastIds));

  if (ids.length === 0) {
    logger.warn(`No fuzzy matches for '${query}', falling back to query ranking`, {
      floor: FUZZY_SCORE_FLOOR,
      matchesAboveFloor: matches.length,
    });
    const outcome = recommendByQuery(context, query);
    return {
      ...outcome,
      fallback: { from: 'fuzzy', to: 'query', reason: 'no-candidates-above-threshold' },
    };
  }

  logger.info(`Fuzzy top${count} '${query}' recommended IDs`, { ids });
  return { ids, candidates, resolvedStrategy: 'fuzzy' };
}

function runStrategy(
  context: RecommendationContext,
  strategy: Strategy,
  query: string | undefined
): StrategyOutcome {
  switch (strategy) {
    case 'content':
      return recommendByContent(context);
    case 'query':
      return recommendByQuery(context, query);
    case 'fuzzy':
      return recommendByFuzzyTitle(context, query ?? '');
  }
}

/**
 * Recommend up to `count` items, never repeating an ID from `pastIds`.
 *
 * Throws InvalidRequestError for a non-positive count or an unknown strategy. An empty
 * corpus yields an empty result.
 */
export function recommend(
  request: RecommendationRequest,
  options: RecommendOptions = {}
): RecommendationResult {
  const { count, strategy, query } = validateRequest({
    count: request.count,
    strategy: request.strategy,
    query: request.query,
  });
  const logger = options.logger ?? NOOP_LOGGER;

  if (request.items.length === 0) {
    logger.debug('Corpus is empty, nothing to recommend');
    return { ids: [], strategy, resolvedStrategy: strategy, candidates: 0 };
  }

  const outcome = runStrategy(createContext(request, count, logger), strategy, query);

  return {
    ids: outcome.ids,
    strategy,
    resolvedStrategy: outcome.resolvedStrategy,
    ...(outcome.fallback ? { fallback: outcome.fallback } : {}),
    candidates: outcome.candidates,
  };
}
