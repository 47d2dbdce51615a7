export { featurizeQuery, EMPTY_FEATURES } from './features';
export type { QueryFeatures } from './features';
export {
  applyFeedback,
  assertRouterState,
  defaultRouterState,
  heuristicScores,
  pickWinner,
  routerStateFromJson,
  routerStateToJson,
  StrategyFeedbackSchema,
  DEFAULT_LR,
} from './weights';
export type { RouterState, StrategyFeedback, HeuristicScores } from './weights';
export { AdaptiveRouter, ROUTER_STATE_KEY, LEGACY_ROUTER_STATE_KEY } from './router';
export type { AdaptiveRouterOptions, DecisionTrace, RouteDecision, StrategyTrace } from './router';
