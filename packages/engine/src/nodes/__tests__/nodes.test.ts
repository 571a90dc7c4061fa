/**
 * Workflow Node Tests
 */

import { describe, it, expect } from 'vitest';
import {
  CapabilityError,
  StructuredOutputError,
  type Retriever,
  type WebSearcher,
} from '@docqa/core';
import {
  ANSWER_SYSTEM_PROMPT,
  NO_RELEVANT_DOCUMENTS_ANSWER,
  WEB_SEARCH_SOURCE,
  createConfidenceNode,
  createDecideEnd,
  createEnrichmentNode,
  createGenerateNode,
  createGradeNode,
  createRetrieveNode,
  createRewriteNode,
  createWebSearchNode,
  decideToGenerate,
  RelevanceGrade,
} from '../index.js';
import {
  StubGenerator,
  StubRetriever,
  StubWebSearcher,
  doc,
  quietLogger,
} from '../../__tests__/stubs.js';

describe('retrieve', () => {
  it('should query with the question and default limits', async () => {
    const retriever = new StubRetriever([doc('alpha')]);

    const update = await createRetrieveNode(retriever)({ question: 'what is alpha' });

    expect(update).toEqual({ documents: [doc('alpha')] });
    expect(retriever.calls).toEqual([
      { query: 'what is alpha', options: { nResults: 5, rerankTopK: 3 } },
    ]);
  });

  it('should pass configured limits', async () => {
    const retriever = new StubRetriever();

    await createRetrieveNode(retriever, { nResults: 8, rerankTopK: 2 })({ question: 'q' });

    expect(retriever.calls[0].options).toEqual({ nResults: 8, rerankTopK: 2 });
  });

  it('should wrap retriever failures', async () => {
    const failing: Retriever = {
      retrieve: async () => {
        throw new Error('index offline');
      },
    };

    const error = await createRetrieveNode(failing)({ question: 'q' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CapabilityError);
    if (error instanceof CapabilityError) {
      expect(error.capability).toBe('retriever');
      expect(error.message).toBe('retriever call failed: index offline');
    }
  });
});

describe('grade', () => {
  it('should grade relevant documents', async () => {
    const generator = new StubGenerator({ grade: [{ binaryScore: 'yes' }] });

    const update = await createGradeNode(generator, quietLogger)({
      question: 'q',
      documents: [doc('one'), doc('two')],
    });

    expect(update).toEqual({ relevance: 'relevant' });
    expect(generator.callsOf('grade')[0].messages[1].content).toBe(
      'Documents:\none\n\ntwo\n\nQuestion: q'
    );
  });

  it('should grade not_relevant on a no', async () => {
    const generator = new StubGenerator({ grade: [{ binaryScore: 'no' }] });

    const update = await createGradeNode(generator, quietLogger)({
      question: 'q',
      documents: [doc('one')],
    });

    expect(update).toEqual({ relevance: 'not_relevant' });
  });

  it('should not call the generator without documents', async () => {
    const generator = new StubGenerator();

    const update = await createGradeNode(generator, quietLogger)({ question: 'q', documents: [] });

    expect(update).toEqual({ relevance: 'not_relevant' });
    expect(generator.calls).toEqual([]);
  });

  it('should surface a malformed verdict as StructuredOutputError', async () => {
    const generator = new StubGenerator({ grade: [{ binaryScore: 'maybe' }] });

    await expect(
      createGradeNode(generator, quietLogger)({ question: 'q', documents: [doc('one')] })
    ).rejects.toBeInstanceOf(StructuredOutputError);
  });

  it('should normalize case and whitespace in the verdict', () => {
    expect(RelevanceGrade.parse({ binaryScore: ' YES ' })).toEqual({ binaryScore: 'yes' });
  });
});

describe('generate', () => {
  it('should answer from the joined document context', async () => {
    const generator = new StubGenerator({ answer: ['Alpha is first. thanks for asking!'] });

    const update = await createGenerateNode(generator)({
      question: 'what is alpha',
      documents: [doc('Alpha is first.'), doc('Beta is second.')],
    });

    expect(update).toEqual({ answer: 'Alpha is first. thanks for asking!' });
    expect(generator.calls[0].messages).toEqual([
      { role: 'system', content: ANSWER_SYSTEM_PROMPT },
      {
        role: 'user',
        content: 'Context:\nAlpha is first.\n\nBeta is second.\n\nQuestion: what is alpha',
      },
    ]);
  });

  it('should generate with an empty context when there are no documents', async () => {
    const generator = new StubGenerator();

    await createGenerateNode(generator)({ question: 'q' });

    expect(generator.calls[0].messages[1].content).toBe('Context:\n\n\nQuestion: q');
  });
});

describe('web search', () => {
  it('should replace documents with one joined web document', async () => {
    const searcher = new StubWebSearcher(['first hit', 'second hit']);

    const update = await createWebSearchNode(searcher)({
      question: 'latest release',
      documents: [doc('stale')],
    });

    expect(searcher.queries).toEqual(['latest release']);
    expect(update).toEqual({
      documents: [{ content: 'first hit\nsecond hit', metadata: { source: WEB_SEARCH_SOURCE } }],
    });
  });

  it('should produce an empty document when search finds nothing', async () => {
    const update = await createWebSearchNode(new StubWebSearcher([]))({ question: 'q' });

    expect(update.documents).toEqual([{ content: '', metadata: { source: 'web_search' } }]);
  });

  it('should wrap search failures', async () => {
    const failing: WebSearcher = {
      search: async () => {
        throw new Error('quota exceeded');
      },
    };

    await expect(createWebSearchNode(failing)({ question: 'q' })).rejects.toThrow(
      'web_search call failed: quota exceeded'
    );
  });
});

describe('suggest enrichment', () => {
  it('should return the placeholder answer with suggestions', async () => {
    const generator = new StubGenerator({
      enrichment: [{ suggestions: ['Add release notes'], missingInfo: ['Release dates'] }],
    });

    const update = await createEnrichmentNode(generator)({ question: 'when was v2 released' });

    expect(update).toEqual({
      answer: NO_RELEVANT_DOCUMENTS_ANSWER,
      suggestions: ['Add release notes'],
      missingInfo: ['Release dates'],
      confidence: 0,
    });
    expect(generator.calls[0].messages[1].content).toBe('Question: when was v2 released');
  });
});

describe('check confidence', () => {
  it('should score the answer against the context', async () => {
    const generator = new StubGenerator({
      confidence: [{ confidence: 0.75, missingInfo: ['m'], suggestions: ['s'] }],
    });

    const update = await createConfidenceNode(generator)({
      question: 'q',
      documents: [doc('ctx')],
      answer: 'a',
    });

    expect(update).toEqual({ confidence: 0.75, missingInfo: ['m'], suggestions: ['s'] });
    expect(generator.calls[0].messages[1].content).toBe('Context:\nctx\n\nQuestion: q\n\nAnswer: a');
  });

  it('should reject a score outside [0, 1]', async () => {
    const generator = new StubGenerator({
      confidence: [{ confidence: 1.5, missingInfo: [], suggestions: [] }],
    });

    await expect(
      createConfidenceNode(generator)({ question: 'q', answer: 'a' })
    ).rejects.toBeInstanceOf(StructuredOutputError);
  });
});

describe('query rewrite', () => {
  it('should replace the question with the trimmed rewrite', async () => {
    const generator = new StubGenerator({ rewrite: [{ query: '  alpha release date  ' }] });

    const update = await createRewriteNode(generator, quietLogger)({
      question: 'when alpha',
      suggestions: ['s1', 's2'],
      missingInfo: ['m1'],
    });

    expect(update).toEqual({ question: 'alpha release date' });
    expect(generator.calls[0].messages[1].content).toBe(
      [
        'Here is the initial question:\nwhen alpha',
        'Suggestions:\ns1\ns2',
        'Missing information:\nm1',
        'Formulate an improved question.',
      ].join('\n\n')
    );
  });

  it('should reject an empty rewrite', async () => {
    const generator = new StubGenerator({ rewrite: [{ query: '   ' }] });

    await expect(
      createRewriteNode(generator, quietLogger)({ question: 'q' })
    ).rejects.toBeInstanceOf(StructuredOutputError);
  });
});

describe('routers', () => {
  it('should route on relevance', () => {
    expect(decideToGenerate({ question: 'q', relevance: 'relevant' })).toBe('relevant');
    expect(decideToGenerate({ question: 'q', relevance: 'not_relevant' })).toBe('not_relevant');
    expect(decideToGenerate({ question: 'q' })).toBe('not_relevant');
  });

  it('should finish only above the threshold', () => {
    const decideEnd = createDecideEnd();

    expect(decideEnd({ question: 'q', confidence: 0.95 })).toBe('complete');
    expect(decideEnd({ question: 'q', confidence: 0.9 })).toBe('incomplete');
    expect(decideEnd({ question: 'q' })).toBe('incomplete');
  });

  it('should honor a custom threshold', () => {
    expect(createDecideEnd(0.5)({ question: 'q', confidence: 0.6 })).toBe('complete');
  });
});
