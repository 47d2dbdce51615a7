import { createLogger } from '../log';
import { parseTelemetryConfig } from './config';
import { PostgresTelemetryStore, type PgPoolLike } from './postgres';
import { SqliteTelemetryStore } from './sqlite';
import type { TelemetryStore } from './types';

export * from './types';
export * from './config';
export { SqliteTelemetryStore } from './sqlite';
export { PostgresTelemetryStore, wrapPgPool } from './postgres';
export type { PgClientLike, PgPoolLike, PgQueryable, PgRows } from './postgres';

export interface TelemetryDeps {
  /** Replaces the pool the postgres backend would open. */
  pgPool?: PgPoolLike;
}

/** Validates `config` and opens the selected backend. Throws ConfigError on bad input. */
export function createTelemetryStore(config: unknown, deps: TelemetryDeps = {}): TelemetryStore {
  const parsed = parseTelemetryConfig(config);
  createLogger({ component: 'telemetry' }).debug('telemetry_backend', { backend: parsed.backend });
  switch (parsed.backend) {
    case 'sqlite':
      return new SqliteTelemetryStore(parsed);
    case 'postgres':
      return new PostgresTelemetryStore(parsed, deps.pgPool);
  }
}
