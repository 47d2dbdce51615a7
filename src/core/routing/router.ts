import { createLogger } from '../log';
import type { TelemetryStore } from '../telemetry/types';
import type { Strategy } from '../types';
import { featurizeQuery, type QueryFeatures } from './features';
import {
  applyFeedback,
  assertRouterState,
  defaultRouterState,
  heuristicScores,
  pickWinner,
  routerStateFromJson,
  routerStateToJson,
  StrategyFeedbackSchema,
  weightFor,
  type RouterState,
} from './weights';

export const ROUTER_STATE_KEY = 'router_state:v2';
/** Two-strategy state written by earlier releases; read once to seed v2. */
export const LEGACY_ROUTER_STATE_KEY = 'router_state:v1';

export interface StrategyTrace {
  heuristic: number;
  weight: number;
  score: number;
}

export type DecisionTrace = Record<Strategy, StrategyTrace>;

export interface RouteDecision {
  strategy: Strategy;
  features: QueryFeatures;
  trace: DecisionTrace;
}

export interface AdaptiveRouterOptions {
  vocab: ReadonlySet<string>;
  rareTerms: ReadonlySet<string>;
  store: TelemetryStore;
  stateKey?: string;
}

/** Tie priority when scores are equal: the safe default first. */
const TIE_PRIORITY: readonly Strategy[] = ['hybrid', 'keyword', 'vector'];

/**
 * Heuristic routing signal plus learned per-strategy biases.
 *
 * State is re-read from the store on every call; nothing is cached between
 * decisions so a concurrent update is visible to the next `choose`.
 */
export class AdaptiveRouter {
  readonly vocab: ReadonlySet<string>;
  readonly rareTerms: ReadonlySet<string>;
  readonly stateKey: string;
  private store: TelemetryStore;
  private log = createLogger({ component: 'router' });

  constructor(options: AdaptiveRouterOptions) {
    this.vocab = options.vocab;
    this.rareTerms = options.rareTerms;
    this.store = options.store;
    this.stateKey = options.stateKey ?? ROUTER_STATE_KEY;
  }

  async loadState(): Promise<RouterState> {
    const stored = await this.store.getState(this.stateKey, null);
    if (stored !== null) return routerStateFromJson(stored);
    if (this.stateKey !== ROUTER_STATE_KEY) return defaultRouterState();
    const legacy = await this.store.getState(LEGACY_ROUTER_STATE_KEY, null);
    return legacy === null ? defaultRouterState() : routerStateFromJson(legacy);
  }

  /** Rejects a state its own reader would refuse: non-finite weights or `lr <= 0`. */
  async saveState(state: RouterState): Promise<void> {
    await this.store.setState(this.stateKey, routerStateToJson(assertRouterState(state)));
  }

  async resetState(lr?: number): Promise<RouterState> {
    const state = defaultRouterState(lr);
    await this.saveState(state);
    return state;
  }

  async choose(query: string): Promise<RouteDecision> {
    const features = featurizeQuery(query, this.vocab, this.rareTerms);
    const state = await this.loadState();
    const heuristics = heuristicScores(features);

    const entry = (s: Strategy): StrategyTrace => {
      const weight = weightFor(state, s);
      return { heuristic: heuristics[s], weight, score: heuristics[s] + weight };
    };
    const trace: DecisionTrace = { keyword: entry('keyword'), vector: entry('vector'), hybrid: entry('hybrid') };

    let strategy: Strategy = 'hybrid';
    for (const s of TIE_PRIORITY) {
      if (trace[s].score > trace[strategy].score) strategy = s;
    }

    this.log.debug('route_choose', { strategy, features, trace });
    return { strategy, features, trace };
  }

  /**
   * Nudges the learned weights toward the best-scoring strategy and persists
   * the result. Feedback without signal leaves the stored state untouched.
   */
  async update(scores: Partial<Record<Strategy, number>>): Promise<RouterState> {
    const feedback = StrategyFeedbackSchema.parse(scores);
    const winner = pickWinner(feedback);
    if (!winner) {
      this.log.debug('route_update_noop', { feedback });
      return this.loadState();
    }

    const seed = routerStateToJson(await this.loadState());
    const next = await this.store.updateState(this.stateKey, seed, (current) =>
      routerStateToJson(assertRouterState(applyFeedback(routerStateFromJson(current), feedback)))
    );
    const state = routerStateFromJson(next);
    this.log.debug('route_update', { winner, feedback, state });
    return state;
  }
}
