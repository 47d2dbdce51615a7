export { KeywordRetriever, DEFAULT_BM25 } from './keyword';
export type { Bm25Params } from './keyword';
export { VectorRetriever, charNgrams, DEFAULT_NGRAM_SIZE } from './vector';
export { HybridRetriever, defaultHybridOptions } from './hybrid';
export type { HybridOptions } from './hybrid';
export { fuseResults } from './fuser';
export type { FusionCandidate, FusionSource, FusionWeights, FusedResult } from './fuser';
