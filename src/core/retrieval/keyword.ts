import { documentText, type CorpusStats } from '../corpus';
import { assertTopK, stableTopK, termFreq, tokenize } from '../text';
import type { Document, RetrievalResult, Retriever } from '../types';

export interface Bm25Params {
  k1: number;
  b: number;
}

export const DEFAULT_BM25: Readonly<Bm25Params> = Object.freeze({ k1: 1.5, b: 0.75 });

/** BM25 over the indexed corpus. No positional or phrase information. */
export class KeywordRetriever implements Retriever {
  readonly docs: readonly Document[];
  private stats: CorpusStats;
  private docTfs: Map<string, number>[];
  private params: Bm25Params;

  private constructor(docs: readonly Document[], stats: CorpusStats, docTfs: Map<string, number>[], params: Bm25Params) {
    this.docs = docs;
    this.stats = stats;
    this.docTfs = docTfs;
    this.params = params;
  }

  static build(docs: readonly Document[], stats: CorpusStats, params: Bm25Params = DEFAULT_BM25): KeywordRetriever {
    const docTfs = docs.map((d) => termFreq(tokenize(documentText(d))));
    return new KeywordRetriever(docs, stats, docTfs, { ...params });
  }

  scoreAll(query: string): number[] {
    const { k1, b } = this.params;
    const qTerms = [...new Set(tokenize(query))];
    const avgDl = this.stats.avgDl || 1;
    return this.docs.map((d, i) => {
      const tf = this.docTfs[i]!;
      const dl = this.stats.docLen.get(d.docId) ?? 0;
      const norm = k1 * (1 - b + b * (dl / avgDl));
      let s = 0;
      for (const t of qTerms) {
        const idf = this.stats.idf.get(t);
        if (idf === undefined) continue;
        const f = tf.get(t) ?? 0;
        if (f <= 0) continue;
        s += idf * (f * (k1 + 1)) / (f + norm);
      }
      return s;
    });
  }

  search(query: string, k = 5): RetrievalResult[] {
    assertTopK(k);
    const scores = this.scoreAll(query);
    return stableTopK(scores, k).map((i) => ({ doc: this.docs[i]!, score: scores[i]! }));
  }
}
