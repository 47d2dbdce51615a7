import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const evalCommand = new Command('eval')
  .description('Score every strategy on the labeled queries and update router weights')
  .option('-k, --k <n>', 'Top-k passages', '5')
  .option('--db <path>', 'SQLite file (sqlite backend only)')
  .option('--corpus <path>', 'Corpus JSON-lines file (default: data/corpus.jsonl)')
  .option('--labels <path>', 'Labels JSON-lines file (default: data/labels.jsonl)')
  .action(async (options) => {
    await executeHandler('eval', options);
  });
