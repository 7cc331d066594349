// Recommendation policy
export { recommend } from './recommend.js';
export type { RecommendOptions } from './recommend.js';
export { validateRequest } from './validation.js';
export { InvalidRequestError } from './errors.js';

// Vectorizing
export { vectorizeCorpus, projectQuery, buildDocument, tokenize } from './vectorizer.js';
export type { SparseVector, VectorizedCorpus } from './vectorizer.js';

// Scoring
export {
  cosineSimilarity,
  meanVector,
  rankByProfile,
  rankByQuery,
  rankByNorm,
} from './similarity.js';
export {
  tokenSetRatio,
  rankByTitle,
  FUZZY_SCORE_FLOOR,
  FUZZY_CANDIDATE_MULTIPLIER,
} from './fuzzy-matcher.js';
export { EXCLUDED_SCORE, sortRanking } from './ranking.js';
