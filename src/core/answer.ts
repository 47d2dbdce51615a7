import { joinTopSentences } from './text';
import type { RetrievalResult } from './types';

export interface Answer {
  text: string;
  citations: string[];
}

export const NO_CONTEXT_ANSWER = "I couldn't find relevant context in the corpus.";

export function buildContext(topK: readonly RetrievalResult[], maxChars = 900): string {
  const chunks: string[] = [];
  let used = 0;
  for (const r of topK) {
    const block = `[${r.doc.docId}] ${r.doc.title}: ${joinTopSentences(r.doc.text, 2)}`;
    if (used + block.length > maxChars) break;
    chunks.push(block);
    used += block.length;
  }
  return chunks.join('\n');
}

export function generateAnswer(query: string, topK: readonly RetrievalResult[]): Answer {
  const top = topK[0]?.doc;
  if (!top) return { text: NO_CONTEXT_ANSWER, citations: [] };
  const snippet = joinTopSentences(top.text, 2);
  return {
    text: `Based on the retrieved context, here's the best match:\n\n${top.title}\n${snippet}\n\n(Query: ${query})`,
    citations: [top.docId],
  };
}
