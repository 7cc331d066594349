import { z } from 'zod';
import { STRATEGIES } from './types/recommendation.js';

export const StrategySchema = z.enum(STRATEGIES);

export const ItemSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  author: z.string(),
  topic: z.string(),
});

export const CatalogSnapshotSchema = z.object({
  syncedAt: z.string(),
  items: z.array(ItemSchema),
});

export const HistoryEntrySchema = z.object({
  recommendedOn: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  itemId: z.string().min(1),
});

export const HistoryFileSchema = z.object({
  entries: z.array(HistoryEntrySchema),
});

/**
 * Caller-supplied recommendation parameters, checked before any scoring work.
 */
export const RecommendationParamsSchema = z.object({
  count: z.number().int().positive(),
  strategy: StrategySchema,
  query: z.string().optional(),
});

export type RecommendationParams = z.infer<typeof RecommendationParamsSchema>;

/**
 * Flatten zod issues into a single readable line.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
