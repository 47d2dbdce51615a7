import Database from 'better-sqlite3';
import fs from 'fs-extra';
import path from 'path';
import { createLogger } from '../log';
import { defaultSqlitePath } from '../paths';
import type { SqliteConfig } from './config';
import { nowUnix, type RunInput, type TelemetryStore } from './types';

const log = createLogger({ component: 'telemetry', backend: 'sqlite' });

function schemaSql(runsTable: string, stateTable: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${runsTable} (
  run_id INTEGER PRIMARY KEY AUTOINCREMENT,
  ts_unix REAL NOT NULL,
  query TEXT NOT NULL,
  strategy TEXT NOT NULL,
  score REAL NOT NULL,
  meta_json TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS ${stateTable} (
  key TEXT PRIMARY KEY,
  value_json TEXT NOT NULL
);
`;
}

interface StateRow {
  value_json: string;
}

/** Embedded on-disk store; `:memory:` keeps everything in process. */
export class SqliteTelemetryStore implements TelemetryStore {
  readonly backend = 'sqlite' as const;
  readonly path: string;
  private db: Database.Database;
  private insertRun: Database.Statement<[number, string, string, number, string]>;
  private selectState: Database.Statement<[string], StateRow>;
  private upsertState: Database.Statement<[string, string]>;

  constructor(config: Pick<SqliteConfig, 'path' | 'runsTable' | 'stateTable'>) {
    this.path = config.path ?? defaultSqlitePath();
    if (this.path !== ':memory:') fs.ensureDirSync(path.dirname(this.path));
    this.db = new Database(this.path);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(schemaSql(config.runsTable, config.stateTable));
    this.insertRun = this.db.prepare<[number, string, string, number, string]>(
      `INSERT INTO ${config.runsTable}(ts_unix, query, strategy, score, meta_json) VALUES (?, ?, ?, ?, ?)`
    );
    this.selectState = this.db.prepare<[string], StateRow>(`SELECT value_json FROM ${config.stateTable} WHERE key = ?`);
    this.upsertState = this.db.prepare<[string, string]>(
      `INSERT INTO ${config.stateTable}(key, value_json) VALUES (?, ?) ` +
        'ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json'
    );
    log.debug('sqlite_open', { path: this.path, runs_table: config.runsTable, state_table: config.stateTable });
  }

  async logRun(input: RunInput): Promise<number> {
    const info = this.insertRun.run(
      input.tsUnix ?? nowUnix(),
      input.query,
      input.strategy,
      input.score,
      JSON.stringify(input.meta)
    );
    return Number(info.lastInsertRowid);
  }

  async getState(key: string, defaultValue: unknown): Promise<unknown> {
    return this.readState(key, defaultValue);
  }

  async setState(key: string, value: unknown): Promise<void> {
    this.upsertState.run(key, JSON.stringify(value));
  }

  async updateState<T>(key: string, defaultValue: unknown, mutate: (current: unknown) => T): Promise<T> {
    const tx = this.db.transaction(() => {
      const next = mutate(this.readState(key, defaultValue));
      this.upsertState.run(key, JSON.stringify(next));
      return next;
    });
    return tx.immediate();
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private readState(key: string, defaultValue: unknown): unknown {
    const row = this.selectState.get(key);
    if (!row) return defaultValue;
    return JSON.parse(row.value_json);
  }
}
