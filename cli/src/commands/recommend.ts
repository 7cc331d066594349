import { Command } from 'commander';
import { recommend, validateRequest } from '@shelfwise/engine';
import type { Item, RecommendationResult } from '@shelfwise/shared';
import { loadConfig } from '../config/config.js';
import { toIsoDate } from '../history/history-store.js';
import { runTask } from '../utils/errors.js';
import { describeItem } from '../utils/format.js';
import { createServices, type CliServices } from '../utils/services.js';
import { syncFromSource, type GlobalOptions, type Print } from './sync.js';

export interface RecommendCommandOptions {
  method: string;
  top: string;
  dryRun?: boolean;
}

export interface RecommendParams {
  query?: string;
  method: string;
  count: number;
  /** Skip recording the picks in history */
  dryRun: boolean;
  today: string;
}

/**
 * Recommend from the synced catalog, print the picks and record them for `today`.
 */
export async function runRecommend(
  services: CliServices,
  params: RecommendParams,
  print: Print = console.log
): Promise<RecommendationResult> {
  // Validate before touching the catalog so a bad flag fails fast
  const { count, strategy, query } = validateRequest({
    count: params.count,
    strategy: params.method,
    query: params.query,
  });

  const { items } = await syncFromSource(services);
  const pastIds = await services.history.pastIds();
  const result = recommend({ items, pastIds, count, query, strategy }, { logger: services.logger });

  const byId = new Map<string, Item>();
  for (const item of items) {
    if (!byId.has(item.id)) byId.set(item.id, item);
  }

  if (result.ids.length === 0) {
    print('No recommendations available.');
    return result;
  }

  print(query?.trim() ? `Top ${count} for '${query}':` : `Top ${count} recommendations today:`);
  for (const id of result.ids) {
    const item = byId.get(id);
    print(` - ${item ? describeItem(item) : id}`);
  }

  if (params.dryRun) {
    services.logger.debug('Dry run, history left unchanged', { ids: result.ids });
  } else {
    await services.history.append(result.ids, params.today);
  }
  return result;
}

export const recommendCommand = new Command('recommend')
  .description('Recommend items you have not been recommended before')
  .argument('[query]', 'Free text to match against (query and fuzzy methods)')
  .option('-m, --method <method>', 'Ranking method: content, query or fuzzy', 'content')
  .option('-n, --top <count>', 'Number of items to recommend', '1')
  .option('--dry-run', 'Do not record the recommendations in history')
  .action(async (query: string | undefined, options: RecommendCommandOptions, command: Command) => {
    await runTask('recommend', async () => {
      const services = createServices(loadConfig(process.env, command.optsWithGlobals<GlobalOptions>()));
      await runRecommend(services, {
        query,
        method: options.method,
        count: Number(options.top),
        dryRun: options.dryRun ?? false,
        today: toIsoDate(new Date()),
      });
    });
  });
