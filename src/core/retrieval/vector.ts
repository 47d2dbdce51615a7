import { documentText, smoothedIdf } from '../corpus';
import { assertTopK, stableTopK, termFreq } from '../text';
import type { Document, RetrievalResult, Retriever } from '../types';

export const DEFAULT_NGRAM_SIZE = 4;

type SparseVector = Map<string, number>;

/**
 * Overlapping character n-grams of the lowercased, whitespace-collapsed text.
 * Shorter input degrades to one gram holding the whole string.
 */
export function charNgrams(text: string, n = DEFAULT_NGRAM_SIZE): string[] {
  const chars = Array.from(String(text ?? '').toLowerCase().replace(/\s+/g, ' ').trim());
  if (chars.length === 0) return [];
  if (chars.length < n) return [chars.join('')];
  const out: string[] = [];
  for (let i = 0; i + n <= chars.length; i++) out.push(chars.slice(i, i + n).join(''));
  return out;
}

function dot(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let s = 0;
  for (const [k, v] of small) s += v * (large.get(k) ?? 0);
  return s;
}

function l2norm(v: SparseVector): number {
  let s = 0;
  for (const x of v.values()) s += x * x;
  return Math.sqrt(s);
}

function weigh(grams: string[], idf: ReadonlyMap<string, number>): SparseVector {
  const vec: SparseVector = new Map();
  for (const [g, c] of termFreq(grams)) {
    const w = idf.get(g);
    if (w === undefined) continue;
    vec.set(g, (1 + Math.log(c)) * w);
  }
  return vec;
}

/**
 * Character n-gram TF-IDF cosine similarity, a dependency-free stand-in for
 * dense vector search. Its IDF table is separate from the BM25 token space.
 */
export class VectorRetriever implements Retriever {
  readonly docs: readonly Document[];
  readonly ngramSize: number;
  private idf: Map<string, number>;
  private docVecs: SparseVector[];
  private docNorms: number[];

  private constructor(docs: readonly Document[], ngramSize: number, idf: Map<string, number>, docVecs: SparseVector[]) {
    this.docs = docs;
    this.ngramSize = ngramSize;
    this.idf = idf;
    this.docVecs = docVecs;
    this.docNorms = docVecs.map((v) => l2norm(v) || 1);
  }

  static build(docs: readonly Document[], ngramSize = DEFAULT_NGRAM_SIZE): VectorRetriever {
    const nDocs = Math.max(1, docs.length);
    const perDoc = docs.map((d) => charNgrams(documentText(d), ngramSize));
    const df = new Map<string, number>();
    for (const grams of perDoc) {
      for (const g of new Set(grams)) df.set(g, (df.get(g) ?? 0) + 1);
    }
    const idf = new Map<string, number>();
    for (const [g, c] of df) idf.set(g, smoothedIdf(nDocs, c));
    return new VectorRetriever(docs, ngramSize, idf, perDoc.map((grams) => weigh(grams, idf)));
  }

  scoreAll(query: string): number[] {
    const q = weigh(charNgrams(query, this.ngramSize), this.idf);
    const qn = l2norm(q) || 1;
    return this.docVecs.map((dv, i) => dot(q, dv) / (qn * this.docNorms[i]!));
  }

  search(query: string, k = 5): RetrievalResult[] {
    assertTopK(k);
    const scores = this.scoreAll(query);
    return stableTopK(scores, k).map((i) => ({ doc: this.docs[i]!, score: scores[i]! }));
  }
}
