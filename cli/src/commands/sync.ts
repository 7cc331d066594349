import { Command } from 'commander';
import { syncCatalog, type SyncReport } from '../catalog/sync.js';
import { loadConfig } from '../config/config.js';
import { runTask } from '../utils/errors.js';
import { createServices, type CliServices } from '../utils/services.js';

export type Print = (line: string) => void;

export type GlobalOptions = {
  debug?: boolean;
};

/**
 * Sync the snapshot from the configured source.
 */
export function syncFromSource(services: CliServices, force = false): Promise<SyncReport> {
  return syncCatalog(services.catalogSource(), services.snapshotCache, {
    logger: services.logger,
    force,
  });
}

export async function runSync(
  services: CliServices,
  options: { force?: boolean },
  print: Print = console.log
): Promise<SyncReport> {
  const report = await syncFromSource(services, options.force);

  const state = report.refreshed ? 'refreshed' : 'unchanged';
  print(`Catalog ${state}: ${report.items.length} items (synced ${report.syncedAt})`);
  if (report.failures.length > 0) {
    print(`${report.failures.length} items could not be loaded:`);
    for (const failure of report.failures) {
      print(` ! ${failure.id} (${failure.reason}): ${failure.message}`);
    }
  }
  return report;
}

export const syncCommand = new Command('sync')
  .description('Refresh the local catalog snapshot from the library export')
  .option('-f, --force', 'Fetch every item even if the catalog is unchanged')
  .action(async (options: { force?: boolean }, command: Command) => {
    await runTask('sync the catalog', async () => {
      const services = createServices(loadConfig(process.env, command.optsWithGlobals<GlobalOptions>()));
      await runSync(services, options);
    });
  });
