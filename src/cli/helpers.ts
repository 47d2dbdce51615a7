import { loadCorpus, loadLabels } from '../core/data';
import { buildEngine, createRouter, type RetrievalEngine } from '../core/pipeline';
import type { AdaptiveRouter } from '../core/routing';
import { ConfigError, createTelemetryStore, telemetryConfigFromEnv, type TelemetryStore } from '../core/telemetry';
import type { QueryLabel } from '../core/types';
import { error, ErrorHints, ErrorReasons, type CLIError } from './types';

export interface StoreOptions {
  db?: string;
}

export interface CorpusOptions extends StoreOptions {
  corpus?: string;
  labels?: string;
}

export interface RouterContext {
  engine: RetrievalEngine;
  labels: QueryLabel[];
  store: TelemetryStore;
  router: AdaptiveRouter;
}

/**
 * Open the telemetry store selected by the environment.
 *
 * @param options - `db` overrides the SQLite path
 */
export function openStore(options: StoreOptions): TelemetryStore {
  return createTelemetryStore(telemetryConfigFromEnv(process.env, { sqlitePath: options.db }));
}

/**
 * Load corpus and labels, build the retrievers and open the store.
 * The caller owns `store` and must close it.
 */
export async function openRouterContext(options: CorpusOptions): Promise<RouterContext> {
  const docs = await loadCorpus(options.corpus);
  const labels = await loadLabels(options.labels);
  const engine = buildEngine(docs);
  const store = openStore(options);
  return { engine, labels, store, router: createRouter(engine, store) };
}

function errnoCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

/**
 * Map a thrown error onto an agent-readable CLI error.
 */
export function toCLIError(e: unknown, fallbackReason: string): CLIError {
  if (e instanceof ConfigError) {
    return error(ErrorReasons.CONFIG_ERROR, { message: e.message, issues: e.issues, hint: ErrorHints.CONFIG_ERROR });
  }
  if (errnoCode(e) === 'ENOENT') {
    return error(ErrorReasons.DATA_LOAD_FAILED, {
      message: e instanceof Error ? e.message : String(e),
      hint: ErrorHints.DATA_LOAD_FAILED,
    });
  }
  return error(fallbackReason, { message: e instanceof Error ? e.message : String(e) });
}
