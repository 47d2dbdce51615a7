import test from 'node:test';
import assert from 'node:assert/strict';
import { buildCorpusStats } from '../src/core/corpus';
import { charNgrams, fuseResults, HybridRetriever, KeywordRetriever, VectorRetriever } from '../src/core/retrieval';
import type { Document, RetrievalResult } from '../src/core/types';
import { EXAMPLE_DOCS, EXAMPLE_QUERY, RUNBOOK_DOCS } from './fixtures';

function build(docs: Document[]) {
  const stats = buildCorpusStats(docs);
  const keyword = KeywordRetriever.build(docs, stats);
  const vector = VectorRetriever.build(docs);
  const hybrid = new HybridRetriever(docs, keyword, vector);
  return { keyword, vector, hybrid };
}

function ids(results: RetrievalResult[]): string[] {
  return results.map((r) => r.doc.docId);
}

function assertNonIncreasing(results: RetrievalResult[]): void {
  for (let i = 1; i < results.length; i++) {
    assert.ok(results[i - 1]!.score >= results[i]!.score);
  }
}

test('keyword search ranks the identifier document first with BM25 score', () => {
  const { keyword } = build(EXAMPLE_DOCS);
  const res = keyword.search(EXAMPLE_QUERY, 1);
  assert.deepEqual(ids(res), ['d1']);
  // dl == avgDl, so each term scores idf * f * 2.5 / (f + 1.5); "cache" appears twice.
  const expected = Math.log(2) * (1 + 1 + 5 / 3.5);
  assert.ok(Math.abs(res[0]!.score - expected) < 1e-9);
});

test('keyword search ignores repeated query tokens and unknown terms', () => {
  const { keyword } = build(EXAMPLE_DOCS);
  assert.equal(keyword.search('cache cache', 1)[0]!.score, keyword.search('cache', 1)[0]!.score);
  const unknown = keyword.search('nonexistent', 2);
  assert.deepEqual(unknown.map((r) => r.score), [0, 0]);
  assert.deepEqual(ids(unknown), ['d1', 'd2']);
});

test('keyword search handles k edge cases', () => {
  const { keyword } = build(RUNBOOK_DOCS);
  assert.deepEqual(keyword.search('failover', 0), []);
  const all = keyword.search('failover', 10);
  assert.equal(all.length, RUNBOOK_DOCS.length);
  assert.deepEqual(ids(all), ['r1', 'r2', 'r3', 'r4']);
  assertNonIncreasing(all);
  assert.throws(() => keyword.search('failover', -1), RangeError);
});

test('keyword and vector search are deterministic across calls', () => {
  const { keyword, vector } = build(RUNBOOK_DOCS);
  assert.deepEqual(keyword.search('database replica limits', 3), keyword.search('database replica limits', 3));
  assert.deepEqual(vector.search('database replica limits', 3), vector.search('database replica limits', 3));
});

test('charNgrams normalizes whitespace and degrades for short input', () => {
  assert.deepEqual(charNgrams('abcde'), ['abcd', 'bcde']);
  assert.deepEqual(charNgrams('Ab  C'), ['ab c']);
  assert.deepEqual(charNgrams('abc'), ['abc']);
  assert.deepEqual(charNgrams('   '), []);
});

test('vector search favors the document sharing substrings with the query', () => {
  const { vector } = build(EXAMPLE_DOCS);
  const res = vector.search(EXAMPLE_QUERY, 2);
  assert.deepEqual(ids(res), ['d1', 'd2']);
  assert.ok(res[0]!.score > 0);
  assert.equal(res[1]!.score, 0);
});

test('vector search tolerates typos', () => {
  const { vector } = build(EXAMPLE_DOCS);
  assert.deepEqual(ids(vector.search('documentaton', 1)), ['d2']);
});

test('vector search matches a query shorter than the n-gram size', () => {
  const { vector } = build([
    { docId: 'a', title: '', text: 'ok' },
    { docId: 'b', title: 'Other', text: 'words here' },
  ]);
  const [top] = vector.search('OK', 1);
  assert.equal(top?.doc.docId, 'a');
  assert.ok(Math.abs((top?.score ?? 0) - 1) < 1e-12);
});

test('hybrid search agrees when both engines agree', () => {
  const { hybrid } = build(EXAMPLE_DOCS);
  const res = hybrid.search(EXAMPLE_QUERY, 2);
  assert.deepEqual(ids(res), ['d1', 'd2']);
  assert.equal(res[0]!.score, 1);
  assert.equal(res[1]!.score, 0);
});

/** Weighted mean of each engine's max-normalised score, over the engines with evidence. */
function expectedHybridScores(keyword: KeywordRetriever, vector: VectorRetriever, query: string): number[] {
  const kw = keyword.scoreAll(query);
  const vec = vector.scoreAll(query);
  const kwMax = Math.max(...kw, 0.0001);
  const vecMax = Math.max(...vec, 0.0001);
  return kw.map((k, i) => {
    const v = vec[i] ?? 0;
    const parts: number[] = [];
    if (k > 0) parts.push(k / kwMax);
    if (v > 0) parts.push(v / vecMax);
    return parts.length === 0 ? 0 : parts.reduce((a, b) => a + b, 0) / parts.length;
  });
}

test('hybrid search blends engines that disagree', () => {
  const { keyword, vector, hybrid } = build(RUNBOOK_DOCS);
  const query = 'failover escalatoin';
  // Only r1 matches a keyword; the misspelling still reaches r2 through n-grams.
  assert.deepEqual(keyword.scoreAll(query).map((s) => s > 0), [true, false, false, false]);
  assert.ok((vector.scoreAll(query)[1] ?? 0) > 0);

  const res = hybrid.search(query, 4);
  const expected = expectedHybridScores(keyword, vector, query);
  assert.deepEqual(ids(res).slice(0, 2).sort(), ['r1', 'r2']);
  assert.deepEqual(ids(res).slice(2), ['r3', 'r4']);
  for (const r of res) {
    const i = RUNBOOK_DOCS.findIndex((d) => d.docId === r.doc.docId);
    assert.ok(Math.abs(r.score - (expected[i] ?? NaN)) < 1e-12, r.doc.docId);
  }
  assertNonIncreasing(res);
});

test('hybrid ranking does not depend on corpus position beyond the pool', () => {
  const docs: Document[] = Array.from({ length: 60 }, (_, i) => ({ docId: `f${i}`, title: 'Note', text: 'plain words only' }));
  const strong: Document = { docId: 'strong', title: 'Runbook', text: 'Cache stampede.' };
  const weak: Document = { docId: 'weak', title: 'Hobby', text: 'Stamp collecting.' };
  docs[5] = strong;
  docs[59] = weak;
  const { keyword, vector, hybrid } = build(docs);
  assert.equal(hybrid.poolSize(2), 50);
  assert.ok(keyword.scoreAll('stampedes').every((s) => s === 0));

  const res = hybrid.search('stampedes', 4);
  assert.deepEqual(ids(res), ['strong', 'weak', 'f0', 'f1']);
  assert.equal(res[0]!.score, 1);
  assert.ok(res[1]!.score > 0 && res[1]!.score < 1);
  assert.deepEqual(res.slice(2).map((r) => r.score), [0, 0]);

  const swapped = [...docs];
  swapped[5] = weak;
  swapped[59] = strong;
  assert.deepEqual(ids(build(swapped).hybrid.search('stampedes', 2)), ['strong', 'weak']);
});

test('hybrid search returns empty on empty corpus or k = 0', () => {
  const empty = build([]);
  assert.deepEqual(empty.hybrid.search('anything', 5), []);
  const { hybrid } = build(EXAMPLE_DOCS);
  assert.deepEqual(hybrid.search(EXAMPLE_QUERY, 0), []);
});

test('hybrid pool widens k and is capped by corpus size', () => {
  const docs = RUNBOOK_DOCS;
  const stats = buildCorpusStats(docs);
  const keyword = KeywordRetriever.build(docs, stats);
  const vector = VectorRetriever.build(docs);
  assert.equal(new HybridRetriever(docs, keyword, vector).poolSize(1), 4);
  assert.equal(new HybridRetriever(docs, keyword, vector, { poolFactor: 2, minPool: 1 }).poolSize(1), 2);
});

test('fuseResults falls back to the single available engine score', () => {
  const fused = fuseResults(
    [
      { source: 'keyword', index: 0, score: 2 },
      { source: 'keyword', index: 1, score: 1 },
      { source: 'vector', index: 1, score: 0.5 },
    ],
    { keywordWeight: 0.5, vectorWeight: 0.5 }
  );
  assert.deepEqual(fused.map((f) => [f.index, f.fusedScore]), [[0, 1], [1, 0.75]]);
});

test('fuseResults breaks ties by corpus index', () => {
  const fused = fuseResults(
    [
      { source: 'vector', index: 2, score: 1 },
      { source: 'vector', index: 0, score: 1 },
    ],
    { keywordWeight: 0.5, vectorWeight: 0.5 }
  );
  assert.deepEqual(fused.map((f) => f.index), [0, 2]);
});
