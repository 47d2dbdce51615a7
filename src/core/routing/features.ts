import { hasDigits, tokenize } from '../text';

export interface QueryFeatures {
  nTokens: number;
  digitRatio: number;
  oovRatio: number;
  rareRatio: number;
}

export const EMPTY_FEATURES: Readonly<QueryFeatures> = Object.freeze({
  nTokens: 0,
  digitRatio: 0,
  oovRatio: 0,
  rareRatio: 0,
});

export function featurizeQuery(query: string, vocab: ReadonlySet<string>, rareTerms: ReadonlySet<string>): QueryFeatures {
  const toks = tokenize(query);
  const n = toks.length;
  if (n === 0) return { ...EMPTY_FEATURES };

  let digits = 0;
  let oov = 0;
  let rare = 0;
  for (const t of toks) {
    if (hasDigits(t)) digits += 1;
    if (!vocab.has(t)) oov += 1;
    if (rareTerms.has(t)) rare += 1;
  }
  return {
    nTokens: n,
    digitRatio: digits / n,
    oovRatio: oov / n,
    rareRatio: rare / n,
  };
}
