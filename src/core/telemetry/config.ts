import { z } from 'zod';

export const DEFAULT_SQLITE_TABLES = { runsTable: 'runs', stateTable: 'router_state' } as const;
export const DEFAULT_POSTGRES_TABLES = {
  runsTable: 'adaptive_retriever_runs',
  stateTable: 'adaptive_retriever_router_state',
} as const;

const tableName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/, 'Table name must be an identifier, optionally schema-qualified');

export const SqliteConfigSchema = z.object({
  backend: z.literal('sqlite'),
  path: z.string().min(1).optional(),
  runsTable: tableName.default(DEFAULT_SQLITE_TABLES.runsTable),
  stateTable: tableName.default(DEFAULT_SQLITE_TABLES.stateTable),
});

export const PostgresConfigSchema = z.object({
  backend: z.literal('postgres'),
  connectionString: z
    .string({ required_error: 'postgres backend requires a connectionString' })
    .min(1, 'postgres backend requires a connectionString'),
  runsTable: tableName.default(DEFAULT_POSTGRES_TABLES.runsTable),
  stateTable: tableName.default(DEFAULT_POSTGRES_TABLES.stateTable),
});

export const TelemetryConfigSchema = z.discriminatedUnion('backend', [SqliteConfigSchema, PostgresConfigSchema]);

export type TelemetryConfigInput = z.input<typeof TelemetryConfigSchema>;
export type TelemetryConfig = z.output<typeof TelemetryConfigSchema>;
export type SqliteConfig = z.output<typeof SqliteConfigSchema>;
export type PostgresConfig = z.output<typeof PostgresConfigSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function parseTelemetryConfig(input: unknown): TelemetryConfig {
  const res = TelemetryConfigSchema.safeParse(input);
  if (res.success) return res.data;
  const issues = res.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
  throw new ConfigError('Invalid telemetry configuration', issues);
}

export interface EnvOverrides {
  sqlitePath?: string;
}

/**
 * Reads RETRIEVER_TELEMETRY, RETRIEVER_PG_URL, RETRIEVER_SQLITE_PATH,
 * RETRIEVER_RUNS_TABLE and RETRIEVER_STATE_TABLE from `env`.
 */
export function telemetryConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: EnvOverrides = {}
): TelemetryConfig {
  const raw = String(env.RETRIEVER_TELEMETRY ?? 'sqlite').trim().toLowerCase();
  const backend = raw === 'pg' || raw === 'postgresql' ? 'postgres' : raw;
  const tables = {
    ...(env.RETRIEVER_RUNS_TABLE ? { runsTable: env.RETRIEVER_RUNS_TABLE } : {}),
    ...(env.RETRIEVER_STATE_TABLE ? { stateTable: env.RETRIEVER_STATE_TABLE } : {}),
  };
  if (backend === 'postgres') {
    return parseTelemetryConfig({ backend, connectionString: env.RETRIEVER_PG_URL, ...tables });
  }
  const sqlitePath = overrides.sqlitePath ?? env.RETRIEVER_SQLITE_PATH;
  return parseTelemetryConfig({ backend, ...(sqlitePath ? { path: sqlitePath } : {}), ...tables });
}
