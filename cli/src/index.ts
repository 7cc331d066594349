import 'dotenv/config';
import { Command } from 'commander';
import { syncCommand } from './commands/sync.js';
import { listCommand } from './commands/list.js';
import { recommendCommand } from './commands/recommend.js';
import { historyCommand } from './commands/history.js';

const program = new Command();

program
  .name('shelfwise')
  .description('Recommend books from your library that you have not been recommended yet')
  .version('1.0.0')
  .option('-d, --debug', 'Print debug diagnostics to stderr');

// Catalog
program.addCommand(syncCommand);
program.addCommand(listCommand);

// Recommendations
program.addCommand(recommendCommand);
program.addCommand(historyCommand);

process.on('unhandledRejection', (err) => {
  console.error('Unhandled rejection:', err);
  process.exit(1);
});

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
