/**
 * FILE PURPOSE: Barrel export for the knowledge-base retrieval client
 */

export { createKnowledgeBaseClient, buildRetrieveRequest } from './client.js';
export type { KnowledgeBaseClient } from './client.js';
export { toPassage, toPassages } from './mapper.js';
export type { RetrieveOptions, RetrieveRequest } from './types.js';
