const TOKEN_PATTERN = /[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*/g;
const DIGIT_PATTERN = /[0-9]/;

/**
 * Lowercase tokenization tuned for engineering text.
 *
 * Hyphen/underscore joined runs stay whole (`inc-49217`, `user_id`);
 * any other punctuation is a delimiter.
 */
export function tokenize(text: string): string[] {
  const matches = String(text ?? '').match(TOKEN_PATTERN);
  if (!matches) return [];
  return matches.map((t) => t.toLowerCase());
}

export function hasDigits(text: string): boolean {
  return DIGIT_PATTERN.test(text);
}

export function termFreq(tokens: Iterable<string>): Map<string, number> {
  const tf = new Map<string, number>();
  for (const t of tokens) tf.set(t, (tf.get(t) ?? 0) + 1);
  return tf;
}

/** Indices of the top-k scores; ties keep ascending index order. */
export function stableTopK(scores: readonly number[], k: number): number[] {
  if (k <= 0) return [];
  const idxs = scores.map((_, i) => i);
  idxs.sort((a, b) => scores[b]! - scores[a]! || a - b);
  return idxs.slice(0, k);
}

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k < 0) throw new RangeError(`k must be a non-negative integer, got ${k}`);
}

export function joinTopSentences(text: string, maxSentences = 2): string {
  const parts = String(text ?? '')
    .split(/[.!?]\s+/)
    .map((p) => p.trim())
    .filter(Boolean);
  if (parts.length === 0) return '';
  const out = parts.slice(0, maxSentences).join('. ').trim();
  return /[.!?]$/.test(out) ? out : `${out}.`;
}
