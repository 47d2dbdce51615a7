import { Command } from 'commander';
import { executeHandler } from '../types.js';

export const runCommand = new Command('run')
  .description('Route one query to a retrieval strategy, answer it and log the run')
  .argument('<query>', 'User query')
  .option('-k, --k <n>', 'Top-k passages', '5')
  .option('--db <path>', 'SQLite file (sqlite backend only)')
  .option('--corpus <path>', 'Corpus JSON-lines file (default: data/corpus.jsonl)')
  .option('--labels <path>', 'Labels JSON-lines file (default: data/labels.jsonl)')
  .action(async (query, options) => {
    await executeHandler('run', { query, ...options });
  });
