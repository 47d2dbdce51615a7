import { createLogger } from '../../core/log';
import { evaluateAll, runOnce } from '../../core/pipeline';
import type { CLIError, CLIResult } from '../types';
import { success } from '../types';
import { openRouterContext, toCLIError, type RouterContext } from '../helpers';

export async function handleRunQuery(input: {
  query: string;
  k: number;
  db?: string;
  corpus?: string;
  labels?: string;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'run' });
  const startedAt = Date.now();
  let ctx: RouterContext | null = null;
  try {
    ctx = await openRouterContext(input);
    const out = await runOnce({ query: input.query, k: input.k, ...ctx });
    log.info('run_query', {
      ok: true,
      strategy: out.strategy,
      k: input.k,
      run_id: out.runId,
      duration_ms: Date.now() - startedAt,
    });
    return success({ ...out });
  } catch (e) {
    log.error('run_query', { ok: false, duration_ms: Date.now() - startedAt, err: e instanceof Error ? e.message : String(e) });
    return toCLIError(e, 'run_failed');
  } finally {
    await ctx?.store.close();
  }
}

export async function handleEvaluate(input: {
  k: number;
  db?: string;
  corpus?: string;
  labels?: string;
}): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'eval' });
  const startedAt = Date.now();
  let ctx: RouterContext | null = null;
  try {
    ctx = await openRouterContext(input);
    const out = await evaluateAll({ k: input.k, ...ctx });
    log.info('evaluate', { ok: true, n: out.n, mean_score: out.meanScore, duration_ms: Date.now() - startedAt });
    return success({ ...out });
  } catch (e) {
    log.error('evaluate', { ok: false, duration_ms: Date.now() - startedAt, err: e instanceof Error ? e.message : String(e) });
    return toCLIError(e, 'eval_failed');
  } finally {
    await ctx?.store.close();
  }
}
