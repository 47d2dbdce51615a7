import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const stateCommand = new Command('state')
  .description('Inspect or reset the learned router state');

stateCommand
  .command('show')
  .description('Print the persisted router weights')
  .option('--db <path>', 'SQLite file (sqlite backend only)')
  .action(async (options) => {
    await executeHandler('state:show', options);
  });

stateCommand
  .command('reset')
  .description('Zero the router weights')
  .option('--db <path>', 'SQLite file (sqlite backend only)')
  .option('--lr <rate>', 'Learning rate to store (default: 0.25)')
  .action(async (options) => {
    await executeHandler('state:reset', options);
  });
