import { buildContext, generateAnswer } from './answer';
import { buildCorpusStats, type CorpusStats, type CorpusStatsOptions } from './corpus';
import { evaluateRun, type EvalScores } from './evaluator';
import { createLogger } from './log';
import { HybridRetriever, KeywordRetriever, VectorRetriever, type HybridOptions } from './retrieval';
import { AdaptiveRouter, type DecisionTrace, type QueryFeatures, type RouterState } from './routing';
import type { TelemetryStore } from './telemetry/types';
import type { Document, QueryLabel, RetrievalResult, Retriever, Strategy } from './types';

export interface RetrievalEngine {
  docs: readonly Document[];
  stats: CorpusStats;
  retrievers: Record<Strategy, Retriever>;
}

export interface EngineOptions extends CorpusStatsOptions {
  hybrid?: Partial<HybridOptions>;
}

export function buildEngine(docs: readonly Document[], options: EngineOptions = {}): RetrievalEngine {
  const stats = buildCorpusStats(docs, options);
  const keyword = KeywordRetriever.build(docs, stats);
  const vector = VectorRetriever.build(docs);
  const hybrid = new HybridRetriever(docs, keyword, vector, options.hybrid);
  return { docs, stats, retrievers: { keyword, vector, hybrid } };
}

export function createRouter(engine: RetrievalEngine, store: TelemetryStore): AdaptiveRouter {
  return new AdaptiveRouter({ vocab: engine.stats.vocab, rareTerms: engine.stats.rareTerms, store });
}

function docIds(results: readonly RetrievalResult[]): string[] {
  return results.map((r) => r.doc.docId);
}

export interface RunOnceInput {
  query: string;
  k?: number;
  engine: RetrievalEngine;
  router: AdaptiveRouter;
  store: TelemetryStore;
  labels?: readonly QueryLabel[];
}

export interface RunOnceOutput {
  runId: number;
  query: string;
  strategy: Strategy;
  features: QueryFeatures;
  trace: DecisionTrace;
  topK: Array<{ docId: string; title: string; score: number }>;
  answer: string;
  citations: string[];
  score: number;
  labeled: boolean;
  expectedDocId?: string;
}

export async function runOnce(input: RunOnceInput): Promise<RunOnceOutput> {
  const k = input.k ?? 5;
  const log = createLogger({ component: 'pipeline', op: 'run' });
  return log.span('run_once', { k }, async () => {
    const { strategy, features, trace } = await input.router.choose(input.query);
    const topK = input.engine.retrievers[strategy].search(input.query, k);
    const context = buildContext(topK);
    const answer = generateAnswer(input.query, topK);

    const label = input.labels?.find((l) => l.query === input.query);
    const score = label
      ? evaluateRun({ topK, answerText: answer.text, expectedDocId: label.expectedDocId, expectedAnswer: label.expectedAnswer }).total
      : 0;

    const runId = await input.store.logRun({
      query: input.query,
      strategy,
      score,
      meta: {
        k,
        features,
        route_meta: trace,
        top_doc_ids: docIds(topK),
        context_preview: context.slice(0, 240),
      },
    });

    return {
      runId,
      query: input.query,
      strategy,
      features,
      trace,
      topK: topK.map((r) => ({ docId: r.doc.docId, title: r.doc.title, score: r.score })),
      answer: answer.text,
      citations: answer.citations,
      score,
      labeled: label !== undefined,
      ...(label ? { expectedDocId: label.expectedDocId } : {}),
    };
  });
}

export interface EvaluateAllInput {
  k?: number;
  engine: RetrievalEngine;
  router: AdaptiveRouter;
  store: TelemetryStore;
  labels: readonly QueryLabel[];
}

export interface QueryEvaluation {
  queryId: string;
  query: string;
  chosen: Strategy;
  chosenScore: number;
  scores: Record<Strategy, number>;
}

interface StrategyEval {
  topK: RetrievalResult[];
  scores: EvalScores;
}

export interface EvaluateAllOutput {
  meanScore: number;
  n: number;
  routerState: RouterState;
  perQuery: QueryEvaluation[];
}

/**
 * Scores every strategy on each labeled query, records what the router would
 * have picked, then feeds all three scores back as router feedback.
 */
export async function evaluateAll(input: EvaluateAllInput): Promise<EvaluateAllOutput> {
  const k = input.k ?? 5;
  const log = createLogger({ component: 'pipeline', op: 'evaluate' });
  const perQuery: QueryEvaluation[] = [];
  let total = 0;

  for (const label of input.labels) {
    const evaluate = (s: Strategy): StrategyEval => {
      const topK = input.engine.retrievers[s].search(label.query, k);
      const answer = generateAnswer(label.query, topK);
      return {
        topK,
        scores: evaluateRun({ topK, answerText: answer.text, expectedDocId: label.expectedDocId, expectedAnswer: label.expectedAnswer }),
      };
    };
    const evals: Record<Strategy, StrategyEval> = {
      keyword: evaluate('keyword'),
      vector: evaluate('vector'),
      hybrid: evaluate('hybrid'),
    };

    const { strategy, features, trace } = await input.router.choose(label.query);
    const chosenScore = evals[strategy].scores.total;
    total += chosenScore;

    const scores: Record<Strategy, number> = {
      keyword: evals.keyword.scores.total,
      vector: evals.vector.scores.total,
      hybrid: evals.hybrid.scores.total,
    };
    const state = await input.router.update(scores);
    log.child({ query_id: label.queryId }).debug('evaluate_query', { chosen: strategy, chosen_score: chosenScore, scores, state });

    const perStrategy = (s: Strategy) => ({
      score_total: evals[s].scores.total,
      hit_at_k: evals[s].scores.hitAtK,
      exact_match: evals[s].scores.exactMatch,
      top_doc_ids: docIds(evals[s].topK),
    });
    await input.store.logRun({
      query: label.query,
      strategy,
      score: chosenScore,
      meta: {
        eval: true,
        query_id: label.queryId,
        expected_doc_id: label.expectedDocId,
        features,
        route_meta: trace,
        keyword: perStrategy('keyword'),
        vector: perStrategy('vector'),
        hybrid: perStrategy('hybrid'),
      },
    });

    perQuery.push({ queryId: label.queryId, query: label.query, chosen: strategy, chosenScore, scores });
  }

  const meanScore = total / Math.max(1, input.labels.length);
  const routerState = await input.router.loadState();
  log.info('evaluate_all', { n: input.labels.length, mean_score: meanScore });
  return { meanScore, n: input.labels.length, routerState, perQuery };
}
