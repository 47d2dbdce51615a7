import test from 'node:test';
import assert from 'node:assert/strict';
import { buildContext, generateAnswer, NO_CONTEXT_ANSWER } from '../src/core/answer';
import { loadCorpus, loadLabels, parseCorpus, parseLabels } from '../src/core/data';
import { evaluateRun, scoreAnswer, scoreRetrieval } from '../src/core/evaluator';
import { buildEngine, createRouter, evaluateAll, runOnce, type RetrievalEngine } from '../src/core/pipeline';
import { ROUTER_STATE_KEY } from '../src/core/routing';
import { SqliteTelemetryStore, type RunInput, type TelemetryStore } from '../src/core/telemetry';
import type { Document, QueryLabel, RetrievalResult, Retriever } from '../src/core/types';
import { EXAMPLE_DOCS, EXAMPLE_QUERY } from './fixtures';

const CACHE_DOC: Document = { docId: 'd1', title: 'Cache', text: 'Cache stampede mitigation for INC-49217.' };
const GUIDE_DOC: Document = { docId: 'd2', title: 'Guide', text: 'How to write clear documentation.' };

const CACHE_LABEL: QueryLabel = {
  queryId: 'q1',
  query: EXAMPLE_QUERY,
  expectedDocId: 'd1',
  expectedAnswer: 'Enable request coalescing.',
};

/** Delegates to an in-memory sqlite store and keeps every logged run. */
class RecordingStore implements TelemetryStore {
  readonly backend = 'sqlite' as const;
  readonly runs: RunInput[] = [];
  readonly inner = new SqliteTelemetryStore({ path: ':memory:', runsTable: 'runs', stateTable: 'router_state' });

  async logRun(input: RunInput): Promise<number> {
    this.runs.push(input);
    return this.inner.logRun(input);
  }

  getState(key: string, defaultValue: unknown): Promise<unknown> {
    return this.inner.getState(key, defaultValue);
  }

  setState(key: string, value: unknown): Promise<void> {
    return this.inner.setState(key, value);
  }

  updateState<T>(key: string, defaultValue: unknown, mutate: (current: unknown) => T): Promise<T> {
    return this.inner.updateState(key, defaultValue, mutate);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

function fixed(doc: Document): Retriever {
  return { search: (): RetrievalResult[] => [{ doc, score: 1 }] };
}

test('parseCorpus maps records and skips blank lines', () => {
  const docs = parseCorpus('{"doc_id":"a","title":"A","text":"alpha"}\n\n  \n{"doc_id":"b","title":"B","text":"beta"}\n');
  assert.deepEqual(docs, [
    { docId: 'a', title: 'A', text: 'alpha' },
    { docId: 'b', title: 'B', text: 'beta' },
  ]);
});

test('parseCorpus reports the offending line', () => {
  assert.throws(
    () => parseCorpus('{"doc_id":"a","title":"A","text":"alpha"}\n\nnot json', 'c.jsonl'),
    /^Error: c\.jsonl:3: invalid JSON/
  );
  assert.throws(() => parseCorpus('{"doc_id":"a","title":"A"}', 'c.jsonl'), {
    message: 'c.jsonl:1: text Required',
  });
  assert.throws(
    () => parseCorpus('{"doc_id":"a","title":"A","text":"x"}\n{"doc_id":"a","title":"B","text":"y"}', 'c.jsonl'),
    { message: 'c.jsonl: duplicate doc_id a' }
  );
});

test('parseLabels maps records to labels', () => {
  const labels = parseLabels('{"query_id":"q","query":"what","expected_doc_id":"a","expected_answer":"x"}');
  assert.deepEqual(labels, [{ queryId: 'q', query: 'what', expectedDocId: 'a', expectedAnswer: 'x' }]);
});

test('bundled corpus and labels load and agree', async () => {
  const docs = await loadCorpus();
  const labels = await loadLabels();
  assert.equal(docs.length, 10);
  assert.equal(docs[0]?.docId, 'd01');
  assert.equal(labels.length, 8);
  const ids = new Set(docs.map((d) => d.docId));
  for (const l of labels) assert.ok(ids.has(l.expectedDocId), l.queryId);
});

test('generateAnswer templates the top result', () => {
  const answer = generateAnswer(EXAMPLE_QUERY, [
    { doc: CACHE_DOC, score: 2 },
    { doc: GUIDE_DOC, score: 1 },
  ]);
  assert.equal(
    answer.text,
    "Based on the retrieved context, here's the best match:\n\nCache\nCache stampede mitigation for INC-49217.\n\n(Query: INC-49217 cache stampede)"
  );
  assert.deepEqual(answer.citations, ['d1']);
});

test('generateAnswer without results returns the fixed answer', () => {
  assert.deepEqual(generateAnswer('anything', []), { text: NO_CONTEXT_ANSWER, citations: [] });
});

test('buildContext stops at the character budget', () => {
  const results = [
    { doc: CACHE_DOC, score: 2 },
    { doc: GUIDE_DOC, score: 1 },
  ];
  const first = '[d1] Cache: Cache stampede mitigation for INC-49217.';
  const second = '[d2] Guide: How to write clear documentation.';
  assert.equal(buildContext(results), `${first}\n${second}`);
  assert.equal(buildContext(results, 60), first);
  assert.equal(buildContext(results, 10), '');
});

test('evaluator weighs hit@k and exact match', () => {
  const topK = [{ doc: CACHE_DOC, score: 1 }];
  assert.equal(scoreRetrieval(topK, 'd1'), 1);
  assert.equal(scoreRetrieval(topK, 'd2'), 0);
  assert.equal(scoreAnswer('  Enable   Request\ncoalescing ', 'enable request coalescing'), 1);
  assert.equal(scoreAnswer('enable coalescing', 'enable request coalescing'), 0);
  assert.deepEqual(evaluateRun({ topK, answerText: 'x', expectedDocId: 'd1', expectedAnswer: 'x' }), {
    hitAtK: 1,
    exactMatch: 1,
    total: 1,
  });
  assert.equal(evaluateRun({ topK, answerText: 'x', expectedDocId: 'd2', expectedAnswer: 'X' }).total, 0.3);
});

test('runOnce routes, answers, scores a labeled query and logs one run', async () => {
  const engine = buildEngine(EXAMPLE_DOCS);
  const store = new RecordingStore();
  const router = createRouter(engine, store);

  const out = await runOnce({ query: EXAMPLE_QUERY, k: 2, engine, router, store, labels: [CACHE_LABEL] });
  assert.equal(out.runId, 1);
  assert.equal(out.strategy, 'keyword');
  assert.equal(out.topK[0]?.docId, 'd1');
  assert.deepEqual(out.citations, ['d1']);
  assert.equal(out.score, 0.7);
  assert.equal(out.labeled, true);
  assert.equal(out.expectedDocId, 'd1');

  const run = store.runs[0];
  assert.equal(store.runs.length, 1);
  assert.equal(run?.strategy, 'keyword');
  assert.equal(run?.score, 0.7);
  assert.equal(run?.meta.k, 2);
  assert.deepEqual(run?.meta.top_doc_ids, ['d1', 'd2']);
  assert.deepEqual(run?.meta.route_meta, out.trace);

  const unlabeled = await runOnce({ query: 'documentation', engine, router, store });
  assert.equal(unlabeled.runId, 2);
  assert.equal(unlabeled.score, 0);
  assert.equal(unlabeled.labeled, false);
  assert.equal('expectedDocId' in unlabeled, false);
  await store.close();
});

test('runOnce over an empty corpus answers without context', async () => {
  const engine = buildEngine([]);
  const store = new RecordingStore();
  const out = await runOnce({ query: 'anything at all', engine, router: createRouter(engine, store), store });
  assert.deepEqual(out.topK, []);
  assert.equal(out.answer, NO_CONTEXT_ANSWER);
  assert.deepEqual(out.citations, []);
  await store.close();
});

test('evaluateAll scores every strategy and teaches the router', async () => {
  const built = buildEngine(EXAMPLE_DOCS);
  const engine: RetrievalEngine = {
    ...built,
    retrievers: { keyword: fixed(CACHE_DOC), vector: fixed(GUIDE_DOC), hybrid: fixed(GUIDE_DOC) },
  };
  const store = new RecordingStore();
  const router = createRouter(engine, store);
  const second: QueryLabel = { ...CACHE_LABEL, queryId: 'q2' };

  const result = await evaluateAll({ engine, router, store, labels: [CACHE_LABEL, second] });
  assert.equal(result.n, 2);
  assert.equal(result.meanScore, 0.7);
  assert.deepEqual(
    result.perQuery.map((r) => [r.queryId, r.chosen, r.chosenScore]),
    [
      ['q1', 'keyword', 0.7],
      ['q2', 'keyword', 0.7],
    ]
  );
  assert.deepEqual(result.perQuery[0]?.scores, { keyword: 0.7, vector: 0, hybrid: 0 });
  assert.deepEqual(result.routerState, { weightVector: -0.25, weightKeyword: 0.5, weightHybrid: -0.25, lr: 0.25 });
  assert.deepEqual(await store.getState(ROUTER_STATE_KEY, null), {
    weight_vector: -0.25,
    weight_keyword: 0.5,
    weight_hybrid: -0.25,
    lr: 0.25,
  });

  assert.equal(store.runs.length, 2);
  const meta = store.runs[1]?.meta;
  assert.equal(meta?.eval, true);
  assert.equal(meta?.query_id, 'q2');
  assert.deepEqual(meta?.vector, { score_total: 0, hit_at_k: 0, exact_match: 0, top_doc_ids: ['d2'] });
  await store.close();
});

test('evaluateAll with no labels leaves the router untouched', async () => {
  const engine = buildEngine(EXAMPLE_DOCS);
  const store = new RecordingStore();
  const result = await evaluateAll({ engine, router: createRouter(engine, store), store, labels: [] });
  assert.equal(result.meanScore, 0);
  assert.equal(result.n, 0);
  assert.equal(await store.getState(ROUTER_STATE_KEY, 'absent'), 'absent');
  await store.close();
});
