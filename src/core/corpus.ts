import { tokenize } from './text';
import type { Document } from './types';

export interface CorpusStats {
  readonly vocab: ReadonlySet<string>;
  readonly df: ReadonlyMap<string, number>;
  readonly idf: ReadonlyMap<string, number>;
  readonly avgDl: number;
  readonly docLen: ReadonlyMap<string, number>;
  readonly rareTerms: ReadonlySet<string>;
}

export interface CorpusStatsOptions {
  /** Tokens with document frequency at or below this are rare. */
  rareDfThreshold?: number;
}

/** BM25-style smoothed IDF, shared by the token and n-gram spaces. */
export function smoothedIdf(nDocs: number, df: number): number {
  return Math.log(1 + (nDocs - df + 0.5) / (df + 0.5));
}

export function documentText(doc: Document): string {
  return `${doc.title} ${doc.text}`;
}

export function buildCorpusStats(docs: readonly Document[], options: CorpusStatsOptions = {}): CorpusStats {
  const rareDfThreshold = options.rareDfThreshold ?? 1;
  const df = new Map<string, number>();
  const docLen = new Map<string, number>();
  let totalLen = 0;

  for (const d of docs) {
    const toks = tokenize(documentText(d));
    docLen.set(d.docId, toks.length);
    totalLen += toks.length;
    for (const t of new Set(toks)) df.set(t, (df.get(t) ?? 0) + 1);
  }

  const nDocs = Math.max(1, docs.length);
  const idf = new Map<string, number>();
  const rareTerms = new Set<string>();
  for (const [t, c] of df) {
    idf.set(t, smoothedIdf(nDocs, c));
    if (c <= rareDfThreshold) rareTerms.add(t);
  }

  return Object.freeze({
    vocab: new Set(df.keys()),
    df,
    idf,
    avgDl: totalLen / nDocs,
    docLen,
    rareTerms,
  });
}
