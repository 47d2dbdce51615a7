import type { RetrievalResult } from './types';

export interface EvalScores {
  hitAtK: number;
  exactMatch: number;
  /** 0.7 * hitAtK + 0.3 * exactMatch */
  total: number;
}

export function scoreRetrieval(topK: readonly RetrievalResult[], expectedDocId: string): number {
  return topK.some((r) => r.doc.docId === expectedDocId) ? 1 : 0;
}

function normalizeAnswer(s: string): string {
  return s.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

export function scoreAnswer(answer: string, expected: string): number {
  return normalizeAnswer(answer) === normalizeAnswer(expected) ? 1 : 0;
}

export function evaluateRun(input: {
  topK: readonly RetrievalResult[];
  answerText: string;
  expectedDocId: string;
  expectedAnswer: string;
}): EvalScores {
  const hitAtK = scoreRetrieval(input.topK, input.expectedDocId);
  const exactMatch = scoreAnswer(input.answerText, input.expectedAnswer);
  return { hitAtK, exactMatch, total: 0.7 * hitAtK + 0.3 * exactMatch };
}
