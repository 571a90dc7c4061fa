import { describe, it, expect } from 'vitest';
import { InMemoryRetriever } from '../memory-retriever.js';
import { LexicalReranker, type Reranker } from '../reranker.js';
import { tokenize } from '../tokenize.js';
import { CapabilityError } from '../../errors.js';
import { createLogger } from '../../telemetry/logger.js';
import type { Document } from '../../types.js';

const logger = createLogger('test', { minSeverity: 'CRITICAL' });

const doc = (id: string, content: string): Document => ({ content, metadata: { id } });

const corpus: Document[] = [
  doc('a', 'Solar panels convert sunlight into electricity.'),
  doc('b', 'Wind turbines generate electricity from wind. Wind farms use many turbines.'),
  doc('c', 'The history of bread baking.'),
  doc('d', 'Electricity storage uses batteries.'),
];

const ids = (docs: readonly Document[]) => docs.map((d) => d.metadata.id);

describe('tokenize', () => {
  it('should lowercase and drop stopwords and punctuation', () => {
    expect(tokenize('What is the Capital of France?')).toEqual(['capital', 'france']);
  });
});

describe('InMemoryRetriever', () => {
  it('should rank by term frequency and exclude non-matching documents', async () => {
    const retriever = new InMemoryRetriever(corpus, { logger });

    // b: wind x3 + electricity x1 = 4; a: electricity = 1; d: electricity = 1
    const result = await retriever.retrieve('wind electricity', { nResults: 5 });

    expect(ids(result)).toEqual(['b', 'a', 'd']);
  });

  it('should truncate to nResults', async () => {
    const retriever = new InMemoryRetriever(corpus, { logger });
    const result = await retriever.retrieve('electricity', { nResults: 2 });
    expect(ids(result)).toEqual(['a', 'b']);
  });

  it('should return an empty set when nothing matches', async () => {
    const retriever = new InMemoryRetriever(corpus, { logger });
    expect(await retriever.retrieve('quantum chromodynamics', { nResults: 5 })).toEqual([]);
    expect(await retriever.retrieve('what is the', { nResults: 5 })).toEqual([]);
  });

  it('should ignore rerankTopK without a reranker', async () => {
    const retriever = new InMemoryRetriever(corpus, { logger });
    const result = await retriever.retrieve('electricity', { nResults: 5, rerankTopK: 1 });
    expect(ids(result)).toEqual(['a', 'b', 'd']);
  });

  it('should rerank the first rerankTopK results, higher score first', async () => {
    const reversing: Reranker = {
      rerank: async (_query, documents) =>
        documents.map((document, i) => ({ document, score: i })),
    };
    const retriever = new InMemoryRetriever(corpus, { reranker: reversing, logger });

    const result = await retriever.retrieve('electricity', { nResults: 5, rerankTopK: 2 });

    expect(ids(result)).toEqual(['b', 'a']);
  });

  it('should wrap reranker failures as retriever CapabilityErrors', async () => {
    const failing: Reranker = {
      rerank: async () => {
        throw new Error('reranker offline');
      },
    };
    const retriever = new InMemoryRetriever(corpus, { reranker: failing, logger });

    const error = await retriever
      .retrieve('electricity', { nResults: 5, rerankTopK: 2 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CapabilityError);
    if (error instanceof CapabilityError) {
      expect(error.capability).toBe('retriever');
    }
  });
});

describe('LexicalReranker', () => {
  it('should score by the share of query tokens present', async () => {
    const scored = await new LexicalReranker().rerank('solar electricity batteries', [
      corpus[0],
      corpus[3],
      corpus[2],
    ]);

    expect(scored.map((s) => [s.document.metadata.id, s.score])).toEqual([
      ['a', 2 / 3],
      ['d', 2 / 3],
      ['c', 0],
    ]);
  });
});
