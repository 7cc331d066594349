import { Command } from 'commander';
import type { HistoryEntry } from '@shelfwise/shared';
import { loadConfig } from '../config/config.js';
import { runTask } from '../utils/errors.js';
import { createServices, type CliServices } from '../utils/services.js';
import type { GlobalOptions, Print } from './sync.js';

export async function runHistory(
  services: CliServices,
  options: { clear?: boolean },
  print: Print = console.log
): Promise<HistoryEntry[]> {
  const entries = await services.history.entries();

  if (options.clear) {
    await services.history.clear();
    print(`Cleared ${entries.length} recorded recommendations.`);
    return [];
  }

  if (entries.length === 0) {
    print('No recommendations recorded.');
    return entries;
  }

  // Titles come from the last snapshot; history is not tied to a fresh sync
  const snapshot = await services.snapshotCache.load();
  const titles = new Map(snapshot?.items.map(item => [item.id, item.title]) ?? []);
  for (const entry of entries) {
    const title = titles.get(entry.itemId);
    print(`${entry.recommendedOn}  ${entry.itemId}${title ? `  ${title}` : ''}`);
  }
  return entries;
}

export const historyCommand = new Command('history')
  .description('Show or clear recorded recommendations')
  .option('--clear', 'Forget every recorded recommendation')
  .action(async (options: { clear?: boolean }, command: Command) => {
    await runTask('read the recommendation history', async () => {
      const services = createServices(loadConfig(process.env, command.optsWithGlobals<GlobalOptions>()));
      await runHistory(services, options);
    });
  });
