/**
 * Rerankers re-score a retrieved candidate list against the query.
 * Higher scores are better.
 */

import type { Document, DocumentSet } from '../types.js';
import { tokenize } from './tokenize.js';

export interface ScoredDocument {
  document: Document;
  score: number;
}

export interface Reranker {
  rerank(query: string, documents: DocumentSet): Promise<ScoredDocument[]>;
}

/**
 * Scores each document by the share of distinct query tokens it contains.
 */
export class LexicalReranker implements Reranker {
  async rerank(query: string, documents: DocumentSet): Promise<ScoredDocument[]> {
    const queryTokens = new Set(tokenize(query));
    return documents.map((document) => {
      if (queryTokens.size === 0) {
        return { document, score: 0 };
      }
      const docTokens = new Set(tokenize(document.content));
      let hits = 0;
      for (const token of queryTokens) {
        if (docTokens.has(token)) hits++;
      }
      return { document, score: hits / queryTokens.size };
    });
  }
}
