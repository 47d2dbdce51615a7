import { z, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger, serializeError } from '../core/log';

/**
 * Standard CLI result interface for successful operations
 *
 * Agent-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error interface
 *
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

/**
 * CLI handler function signature
 * @template TInput - Validated input type (from Zod schema)
 */
export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/**
 * A handler bound to the schema that validates its raw Commander input.
 */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(
  schema: ZodType<TInput, ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): HandlerRegistration {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

/**
 * Execute a CLI handler with validation and error handling
 *
 * @param commandKey - Unique command identifier (e.g., 'run', 'state:show')
 * @param rawInput - Raw input from Commander.js (arguments + options)
 *
 * @example
 * ```typescript
 * .action(async (query, options) => {
 *   await executeHandler('run', { query, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry.js');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = cliHandlers[commandKey];
  if (!handler) {
    console.error(JSON.stringify(
      {
        ok: false,
        reason: 'unknown_command',
        command: commandKey,
        timestamp,
        hint: 'Run "adaptive-retriever --help" to see available commands',
      },
      null,
      2
    ));
    process.exit(1);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const duration_ms = Date.now() - startedAt;
    const envelope = { ...result, command: commandKey, timestamp, duration_ms };

    if (result.ok) {
      console.log(JSON.stringify(envelope, null, 2));
      process.exit(0);
    } else {
      process.stderr.write(JSON.stringify(envelope, null, 2) + '\n');
      process.exit(2);
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err: z.ZodIssue) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));

      console.error(JSON.stringify(
        {
          ok: false,
          reason: ErrorReasons.VALIDATION_ERROR,
          message: 'Invalid command arguments',
          command: commandKey,
          timestamp,
          duration_ms,
          errors,
          hint: ErrorHints.VALIDATION_ERROR,
        },
        null,
        2
      ));
      process.exit(1);
      return;
    }

    log.error(commandKey, { ok: false, err: serializeError(e) });

    console.error(JSON.stringify(
      {
        ok: false,
        reason: ErrorReasons.INTERNAL_ERROR,
        message: e instanceof Error ? e.message : String(e),
        command: commandKey,
        timestamp,
        duration_ms,
        hint: 'An unexpected error occurred. Check logs for details.',
      },
      null,
      2
    ));
    process.exit(1);
  }
}

/**
 * Create a success result with agent-readable metadata
 */
export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

/**
 * Create an error result with agent-readable metadata
 */
export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

/**
 * Common error reasons for consistent agent handling
 */
export const ErrorReasons = {
  CONFIG_ERROR: 'config_error',
  DATA_LOAD_FAILED: 'data_load_failed',
  STORAGE_FAILED: 'storage_failed',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  CONFIG_ERROR: 'Set RETRIEVER_TELEMETRY=sqlite, or provide RETRIEVER_PG_URL for the postgres backend',
  DATA_LOAD_FAILED: 'Check --corpus / --labels point at JSON-lines files',
  VALIDATION_ERROR: 'Check command syntax with --help',
} as const;
