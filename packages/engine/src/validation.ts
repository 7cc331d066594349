import {
  RecommendationParamsSchema,
  formatIssues,
  type RecommendationParams,
} from '@shelfwise/shared';
import { InvalidRequestError } from './errors.js';

/**
 * Check count, strategy and query before any vectorizing or scoring.
 */
export function validateRequest(params: {
  count: unknown;
  strategy: unknown;
  query?: unknown;
}): RecommendationParams {
  const parsed = RecommendationParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new InvalidRequestError(
      `Invalid recommendation request: ${formatIssues(parsed.error)}`,
      parsed.error.issues.map(issue => issue.message)
    );
  }
  return parsed.data;
}
