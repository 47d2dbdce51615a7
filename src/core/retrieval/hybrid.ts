import { assertTopK } from '../text';
import type { Document, RetrievalResult, Retriever } from '../types';
import { fuseResults, type FusionCandidate, type FusionWeights } from './fuser';
import type { KeywordRetriever } from './keyword';
import type { VectorRetriever } from './vector';

export interface HybridOptions extends FusionWeights {
  /** Candidate pool is `k * poolFactor`, never below `minPool`. */
  poolFactor: number;
  minPool: number;
}

export function defaultHybridOptions(): HybridOptions {
  return {
    keywordWeight: 0.5,
    vectorWeight: 0.5,
    poolFactor: 3,
    minPool: 50,
  };
}

export class HybridRetriever implements Retriever {
  readonly docs: readonly Document[];
  private keyword: KeywordRetriever;
  private vector: VectorRetriever;
  private options: HybridOptions;
  private indexById: Map<string, number>;

  constructor(docs: readonly Document[], keyword: KeywordRetriever, vector: VectorRetriever, options: Partial<HybridOptions> = {}) {
    this.docs = docs;
    this.keyword = keyword;
    this.vector = vector;
    this.options = { ...defaultHybridOptions(), ...options };
    this.indexById = new Map(docs.map((d, i) => [d.docId, i]));
  }

  poolSize(k: number): number {
    const { poolFactor, minPool } = this.options;
    return Math.min(this.docs.length, Math.max(k, k * poolFactor, minPool));
  }

  search(query: string, k = 5): RetrievalResult[] {
    assertTopK(k);
    if (k === 0 || this.docs.length === 0) return [];
    const pool = this.poolSize(k);

    const candidates: FusionCandidate[] = [];
    const collect = (source: FusionCandidate['source'], results: RetrievalResult[]) => {
      for (const r of results) {
        // A zero score is padding from top-k, not evidence.
        if (r.score <= 0) continue;
        const index = this.indexById.get(r.doc.docId);
        if (index === undefined) continue;
        candidates.push({ source, index, score: r.score });
      }
    };
    collect('keyword', this.keyword.search(query, pool));
    collect('vector', this.vector.search(query, pool));

    const fused = fuseResults(candidates, this.options, k);
    const out = fused.map((f) => ({ doc: this.docs[f.index]!, score: f.fusedScore }));
    if (out.length < k) {
      const taken = new Set(fused.map((f) => f.index));
      for (let i = 0; i < this.docs.length && out.length < k; i++) {
        if (!taken.has(i)) out.push({ doc: this.docs[i]!, score: 0 });
      }
    }
    return out;
  }
}
