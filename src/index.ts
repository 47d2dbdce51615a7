export * from './core/types';
export { tokenize, termFreq, stableTopK, joinTopSentences } from './core/text';
export { buildCorpusStats, smoothedIdf } from './core/corpus';
export type { CorpusStats, CorpusStatsOptions } from './core/corpus';
export * from './core/retrieval';
export * from './core/routing';
export * from './core/telemetry';
export { loadCorpus, loadLabels, parseCorpus, parseLabels } from './core/data';
export { buildContext, generateAnswer, NO_CONTEXT_ANSWER } from './core/answer';
export type { Answer } from './core/answer';
export { evaluateRun, scoreAnswer, scoreRetrieval } from './core/evaluator';
export type { EvalScores } from './core/evaluator';
export { buildEngine, createRouter, evaluateAll, runOnce } from './core/pipeline';
export type { EngineOptions, EvaluateAllOutput, RetrievalEngine, RunOnceOutput } from './core/pipeline';
export { createLogger } from './core/log';
export type { Logger } from './core/log';
