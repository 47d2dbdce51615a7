import type { Strategy } from '../types';

export type TelemetryBackend = 'sqlite' | 'postgres';

export interface RunInput {
  query: string;
  strategy: Strategy;
  score: number;
  meta: Record<string, unknown>;
  /** Seconds since the epoch; defaults to now. */
  tsUnix?: number;
}

/**
 * Durable run log plus key/value state.
 *
 * `updateState` runs read, mutate and write inside one transaction. A plain
 * `getState` followed by `setState` is not atomic: concurrent writers may
 * lose a delta (last write wins).
 */
export interface TelemetryStore {
  readonly backend: TelemetryBackend;
  /** Appends one run and resolves with the store-assigned run id. */
  logRun(input: RunInput): Promise<number>;
  /** Stored value for `key`, or `defaultValue` when absent. Never creates the key. */
  getState(key: string, defaultValue: unknown): Promise<unknown>;
  setState(key: string, value: unknown): Promise<void>;
  updateState<T>(key: string, defaultValue: unknown, mutate: (current: unknown) => T): Promise<T>;
  close(): Promise<void>;
}

export function nowUnix(): number {
  return Date.now() / 1000;
}
