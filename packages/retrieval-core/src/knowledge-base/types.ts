/**
 * FILE PURPOSE: Request/option types for the knowledge-base retrieval service
 */

export interface RetrieveOptions {
  /** Results to request. Default: config.resultCount. */
  numberOfResults?: number;
  /** Restrict results to one site domain (metadata key 'domain'). */
  domain?: string;
}

/** Request body sent to `${baseUrl}/retrieve`. Hybrid = lexical + semantic. */
export interface RetrieveRequest {
  knowledgeBaseId: string;
  retrievalQuery: { text: string };
  retrievalConfiguration: {
    vectorSearchConfiguration: {
      numberOfResults: number;
      overrideSearchType: 'HYBRID';
      filter?: { equals: { key: string; value: string } };
    };
  };
}
