import { defineHandler, type HandlerRegistration } from './types';
import { EvaluateSchema, RunQuerySchema } from './schemas/runSchemas';
import { StateResetSchema, StateShowSchema } from './schemas/stateSchemas';
import { handleEvaluate, handleRunQuery } from './handlers/runHandlers';
import { handleStateReset, handleStateShow } from './handlers/stateHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Command keys follow the pattern:
 * - Top-level commands: 'run', 'eval'
 * - Subcommands: 'state:show', 'state:reset'
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  'run': defineHandler(RunQuerySchema, handleRunQuery),
  'eval': defineHandler(EvaluateSchema, handleEvaluate),
  'state:show': defineHandler(StateShowSchema, handleStateShow),
  'state:reset': defineHandler(StateResetSchema, handleStateReset),
};
