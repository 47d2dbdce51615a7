export type FusionSource = 'keyword' | 'vector';

export interface FusionCandidate {
  source: FusionSource;
  /** Position of the document in corpus order. */
  index: number;
  score: number;
}

export interface FusionWeights {
  keywordWeight: number;
  vectorWeight: number;
}

export interface FusedResult {
  index: number;
  fusedScore: number;
  normalized: Partial<Record<FusionSource, number>>;
}

function normalizeScores(candidates: FusionCandidate[]): Map<string, number> {
  const bySource = new Map<FusionSource, FusionCandidate[]>();
  for (const c of candidates) {
    const items = bySource.get(c.source) ?? [];
    items.push(c);
    bySource.set(c.source, items);
  }

  const normalized = new Map<string, number>();
  for (const [source, items] of bySource.entries()) {
    const max = Math.max(...items.map((i) => i.score), 0.0001);
    for (const item of items) {
      normalized.set(`${source}:${item.index}`, item.score / max);
    }
  }
  return normalized;
}

function weightOf(source: FusionSource, weights: FusionWeights): number {
  return source === 'keyword' ? weights.keywordWeight : weights.vectorWeight;
}

/**
 * Per-source max normalisation, then a weighted mean over the sources that
 * actually returned the document. Ties fall back to corpus order.
 *
 * Candidates are positive-evidence hits only; a document missing from one
 * source is scored on the other alone.
 */
export function fuseResults(candidates: FusionCandidate[], weights: FusionWeights, limit = 50): FusedResult[] {
  if (candidates.length === 0 || limit <= 0) return [];
  const normalized = normalizeScores(candidates);

  const byIndex = new Map<number, FusedResult>();
  for (const c of candidates) {
    const entry = byIndex.get(c.index) ?? { index: c.index, fusedScore: 0, normalized: {} };
    entry.normalized[c.source] = normalized.get(`${c.source}:${c.index}`) ?? 0;
    byIndex.set(c.index, entry);
  }

  const out = [...byIndex.values()].map((entry) => {
    let num = 0;
    let den = 0;
    for (const source of ['keyword', 'vector'] as const) {
      const n = entry.normalized[source];
      if (n === undefined) continue;
      const w = weightOf(source, weights);
      num += w * n;
      den += w;
    }
    return { ...entry, fusedScore: den > 0 ? num / den : 0 };
  });

  out.sort((a, b) => b.fusedScore - a.fusedScore || a.index - b.index);
  return out.slice(0, limit);
}
