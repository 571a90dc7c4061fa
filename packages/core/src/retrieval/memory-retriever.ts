/**
 * In-Memory Retriever
 *
 * Lexical retriever over a corpus held in memory. Documents are scored by
 * query term frequency; documents sharing no term with the query are never
 * returned. Equal scores keep corpus order.
 *
 * @module @docqa/core/retrieval/memory-retriever
 */

import type { Document, DocumentSet, RetrieveOptions, Retriever } from '../types.js';
import { wrapCapabilityError } from '../errors.js';
import { getLogger, type Logger } from '../telemetry/logger.js';
import type { Reranker, ScoredDocument } from './reranker.js';
import { tokenize } from './tokenize.js';

export interface InMemoryRetrieverOptions {
  /** Applied to the first `rerankTopK` results when the call asks for it */
  reranker?: Reranker;
  logger?: Logger;
}

interface IndexedDocument {
  document: Document;
  termCounts: Map<string, number>;
}

export class InMemoryRetriever implements Retriever {
  private readonly index: IndexedDocument[];
  private readonly reranker: Reranker | undefined;
  private readonly logger: Logger;

  constructor(documents: DocumentSet, options: InMemoryRetrieverOptions = {}) {
    this.index = documents.map((document) => {
      const termCounts = new Map<string, number>();
      for (const token of tokenize(document.content)) {
        termCounts.set(token, (termCounts.get(token) ?? 0) + 1);
      }
      return { document, termCounts };
    });
    this.reranker = options.reranker;
    this.logger = options.logger ?? getLogger();
  }

  get size(): number {
    return this.index.length;
  }

  async retrieve(query: string, options: RetrieveOptions): Promise<DocumentSet> {
    const queryTokens = tokenize(query);

    const candidates: ScoredDocument[] = [];
    for (const entry of this.index) {
      let score = 0;
      for (const token of queryTokens) {
        score += entry.termCounts.get(token) ?? 0;
      }
      if (score > 0) {
        candidates.push({ document: entry.document, score });
      }
    }

    // Array.prototype.sort is stable, ties stay in corpus order
    const top = candidates.sort((a, b) => b.score - a.score).slice(0, options.nResults);

    this.logger.debug('Retrieved documents', {
      candidates: candidates.length,
      returned: top.length,
    });

    if (this.reranker && options.rerankTopK !== undefined && top.length > 0) {
      const head = top.slice(0, options.rerankTopK).map((c) => c.document);
      let reranked: ScoredDocument[];
      try {
        reranked = await this.reranker.rerank(query, head);
      } catch (error) {
        throw wrapCapabilityError('retriever', error, { stage: 'rerank' });
      }
      return reranked.sort((a, b) => b.score - a.score).map((c) => c.document);
    }

    return top.map((c) => c.document);
  }
}
