import { Pool } from 'pg';
import { z } from 'zod';
import { createLogger, serializeError } from '../log';
import type { PostgresConfig } from './config';
import { nowUnix, type RunInput, type TelemetryStore } from './types';

const log = createLogger({ component: 'telemetry', backend: 'postgres' });

export interface PgRows {
  rows: Record<string, unknown>[];
}

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<PgRows>;
}

export interface PgClientLike extends PgQueryable {
  /** Passing an error destroys the connection instead of returning it to the pool. */
  release(err?: Error): void;
}

/** The slice of `pg.Pool` the store uses; tests substitute an in-process fake. */
export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

export function wrapPgPool(pool: Pool): PgPoolLike {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}

const RunIdRow = z.object({ run_id: z.coerce.number().int() });
// pg decodes JSONB columns itself.
const StateRow = z.object({ value_json: z.unknown() });

/** Networked transactional store backed by PostgreSQL. */
export class PostgresTelemetryStore implements TelemetryStore {
  readonly backend = 'postgres' as const;
  private pool: PgPoolLike;
  private runsTable: string;
  private stateTable: string;
  private schemaReady: Promise<void> | null = null;

  constructor(config: Pick<PostgresConfig, 'connectionString' | 'runsTable' | 'stateTable'>, pool?: PgPoolLike) {
    this.pool = pool ?? wrapPgPool(new Pool({ connectionString: config.connectionString }));
    this.runsTable = config.runsTable;
    this.stateTable = config.stateTable;
  }

  async logRun(input: RunInput): Promise<number> {
    await this.ensureSchema();
    const res = await this.pool.query(
      `INSERT INTO ${this.runsTable}(ts_unix, query, strategy, score, meta_json) VALUES ($1, $2, $3, $4, $5::jsonb) RETURNING run_id`,
      [input.tsUnix ?? nowUnix(), input.query, input.strategy, input.score, JSON.stringify(input.meta)]
    );
    return RunIdRow.parse(res.rows[0]).run_id;
  }

  async getState(key: string, defaultValue: unknown): Promise<unknown> {
    await this.ensureSchema();
    const res = await this.pool.query(`SELECT value_json FROM ${this.stateTable} WHERE key = $1`, [key]);
    const row = res.rows[0];
    if (!row) return defaultValue;
    return StateRow.parse(row).value_json;
  }

  async setState(key: string, value: unknown): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `INSERT INTO ${this.stateTable}(key, value_json) VALUES ($1, $2::jsonb) ` +
        'ON CONFLICT (key) DO UPDATE SET value_json = EXCLUDED.value_json',
      [key, JSON.stringify(value)]
    );
  }

  async updateState<T>(key: string, defaultValue: unknown, mutate: (current: unknown) => T): Promise<T> {
    await this.ensureSchema();
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      // Seed the row so FOR UPDATE has something to lock on first write.
      await client.query(
        `INSERT INTO ${this.stateTable}(key, value_json) VALUES ($1, $2::jsonb) ON CONFLICT (key) DO NOTHING`,
        [key, JSON.stringify(defaultValue)]
      );
      const res = await client.query(`SELECT value_json FROM ${this.stateTable} WHERE key = $1 FOR UPDATE`, [key]);
      const row = res.rows[0];
      const current = row ? StateRow.parse(row).value_json : defaultValue;
      const next = mutate(current);
      await client.query(`UPDATE ${this.stateTable} SET value_json = $2::jsonb WHERE key = $1`, [key, JSON.stringify(next)]);
      await client.query('COMMIT');
      return next;
    } catch (e) {
      broken = await this.rollback(client);
      throw e;
    } finally {
      client.release(broken);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /** Resolves with the rollback failure, if any; the caller's error stays the one thrown. */
  private async rollback(client: PgClientLike): Promise<Error | undefined> {
    try {
      await client.query('ROLLBACK');
      return undefined;
    } catch (rollbackErr) {
      log.warn('postgres_rollback_failed', { state_table: this.stateTable, err: serializeError(rollbackErr) });
      return rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
    }
  }

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((e: unknown) => {
        this.schemaReady = null;
        throw e;
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.runsTable} (
  run_id BIGSERIAL PRIMARY KEY,
  ts_unix DOUBLE PRECISION NOT NULL,
  query TEXT NOT NULL,
  strategy TEXT NOT NULL,
  score DOUBLE PRECISION NOT NULL,
  meta_json JSONB NOT NULL
)`);
    await this.pool.query(`
CREATE TABLE IF NOT EXISTS ${this.stateTable} (
  key TEXT PRIMARY KEY,
  value_json JSONB NOT NULL
)`);
    log.debug('postgres_schema_ready', { runs_table: this.runsTable, state_table: this.stateTable });
  }
}
