import { Command } from 'commander';
import type { Item } from '@shelfwise/shared';
import { loadConfig } from '../config/config.js';
import { runTask } from '../utils/errors.js';
import { formatCatalogLine } from '../utils/format.js';
import { createServices, type CliServices } from '../utils/services.js';
import { syncFromSource, type GlobalOptions, type Print } from './sync.js';

export async function runList(services: CliServices, print: Print = console.log): Promise<Item[]> {
  const { items } = await syncFromSource(services);
  if (items.length === 0) {
    print('The catalog is empty.');
    return items;
  }
  for (const item of items) {
    print(formatCatalogLine(item));
  }
  return items;
}

export const listCommand = new Command('list')
  .description('List every item in the catalog')
  .action(async (_options: unknown, command: Command) => {
    await runTask('list the catalog', async () => {
      const services = createServices(loadConfig(process.env, command.optsWithGlobals<GlobalOptions>()));
      await runList(services);
    });
  });
