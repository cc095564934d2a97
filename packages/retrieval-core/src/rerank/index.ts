/**
 * FILE PURPOSE: Barrel export for the reranker
 */

export { rerank, rerankDetailed, rerankGroups } from './reranker.js';
export type { RerankOptions, RerankResult } from './reranker.js';
