export const STRATEGIES = ['keyword', 'vector', 'hybrid'] as const;

export type Strategy = (typeof STRATEGIES)[number];

export interface Document {
  readonly docId: string;
  readonly title: string;
  readonly text: string;
}

export interface RetrievalResult {
  doc: Document;
  score: number;
}

export interface QueryLabel {
  queryId: string;
  query: string;
  expectedDocId: string;
  expectedAnswer: string;
}

export interface Retriever {
  search(query: string, k?: number): RetrievalResult[];
}
