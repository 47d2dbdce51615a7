import { z } from 'zod';
import { STRATEGIES, type Strategy } from '../types';
import type { QueryFeatures } from './features';

export interface RouterState {
  weightVector: number;
  weightKeyword: number;
  weightHybrid: number;
  lr: number;
}

export const DEFAULT_LR = 0.25;

export function defaultRouterState(lr = DEFAULT_LR): RouterState {
  return { weightVector: 0, weightKeyword: 0, weightHybrid: 0, lr };
}

const StoredRouterStateSchema = z.object({
  weight_vector: z.number().finite().default(0),
  weight_keyword: z.number().finite().default(0),
  weight_hybrid: z.number().finite().default(0),
  lr: z.number().finite().positive().default(DEFAULT_LR),
});

export type StoredRouterState = z.input<typeof StoredRouterStateSchema>;

export function routerStateToJson(state: RouterState): Required<StoredRouterState> {
  return {
    weight_vector: state.weightVector,
    weight_keyword: state.weightKeyword,
    weight_hybrid: state.weightHybrid,
    lr: state.lr,
  };
}

export function routerStateFromJson(value: unknown): RouterState {
  const parsed = StoredRouterStateSchema.parse(value ?? {});
  return {
    weightVector: parsed.weight_vector,
    weightKeyword: parsed.weight_keyword,
    weightHybrid: parsed.weight_hybrid,
    lr: parsed.lr,
  };
}

/** Throws a ZodError unless `state` would read back unchanged. */
export function assertRouterState(state: RouterState): RouterState {
  return routerStateFromJson(StoredRouterStateSchema.parse(routerStateToJson(state)));
}

export function weightFor(state: RouterState, strategy: Strategy): number {
  if (strategy === 'vector') return state.weightVector;
  if (strategy === 'keyword') return state.weightKeyword;
  return state.weightHybrid;
}

function withWeight(state: RouterState, strategy: Strategy, value: number): RouterState {
  if (strategy === 'vector') return { ...state, weightVector: value };
  if (strategy === 'keyword') return { ...state, weightKeyword: value };
  return { ...state, weightHybrid: value };
}

export type HeuristicScores = Record<Strategy, number>;

export function heuristicScores(f: QueryFeatures): HeuristicScores {
  const keyword = 1.25 * f.digitRatio + 1.0 * f.oovRatio + 1.25 * f.rareRatio + (f.nTokens <= 3 ? 0.1 : 0);
  const vector = 0.5 * (1 - Math.min(1, f.oovRatio + f.rareRatio));
  const hybrid = 0.35 * keyword + 0.35 * vector + 0.15 * (1 - Math.abs(f.oovRatio - f.rareRatio));
  return { keyword, vector, hybrid };
}

export const StrategyFeedbackSchema = z
  .object({
    keyword: z.number().min(0).max(1).optional(),
    vector: z.number().min(0).max(1).optional(),
    hybrid: z.number().min(0).max(1).optional(),
  })
  .strict();

export type StrategyFeedback = z.infer<typeof StrategyFeedbackSchema>;

/**
 * Strategy with the strictly highest observed quality, or null when the
 * feedback carries no signal (empty, or every value equal). Ties among the
 * maxima go to the lexicographically smallest name.
 */
export function pickWinner(feedback: StrategyFeedback): Strategy | null {
  const entries: Array<[Strategy, number]> = [];
  for (const s of STRATEGIES) {
    const v = feedback[s];
    if (v !== undefined) entries.push([s, v]);
  }
  if (entries.length === 0) return null;
  const values = entries.map(([, v]) => v);
  const max = Math.max(...values);
  if (values.every((v) => v === max)) return null;
  const top = entries.filter(([, v]) => v === max).map(([s]) => s).sort();
  return top[0] ?? null;
}

/**
 * Fixed-step additive nudge: the winner gains `lr`, the other strategies in
 * the feedback share a loss of `lr`, so total weight mass is conserved.
 */
export function applyFeedback(state: RouterState, feedback: StrategyFeedback): RouterState {
  const winner = pickWinner(feedback);
  if (!winner) return state;
  const losers = STRATEGIES.filter((s) => s !== winner && feedback[s] !== undefined);
  let next = withWeight(state, winner, weightFor(state, winner) + state.lr);
  const share = state.lr / losers.length;
  for (const s of losers) next = withWeight(next, s, weightFor(next, s) - share);
  return next;
}
