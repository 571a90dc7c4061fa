/**
 * Chat Service Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, ValidationError, getCurrentContext } from '@docqa/core';
import { ChatService } from '../chat-service.js';
import {
  StubGenerator,
  StubRetriever,
  StubWebSearcher,
  doc,
  quietLogger,
} from '../../__tests__/stubs.js';

const corpus = [doc('The office opens at 9am.')];

describe('ChatService', () => {
  it('should offer every mode when a web searcher is configured', () => {
    const service = new ChatService(
      {
        retriever: new StubRetriever(corpus),
        generator: new StubGenerator(),
        webSearcher: new StubWebSearcher(),
      },
      { logger: quietLogger }
    );

    expect(service.availableModes()).toEqual(['basic', 'suggestion', 'search']);
  });

  it('should disable search without a web searcher', async () => {
    const service = new ChatService(
      { retriever: new StubRetriever(corpus), generator: new StubGenerator() },
      { logger: quietLogger }
    );

    expect(service.availableModes()).toEqual(['basic', 'suggestion']);
    await expect(service.chat('hello', 'search')).rejects.toThrow('Mode search is not available');
    await expect(service.chat('hello', 'search')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should answer and record the exchange', async () => {
    const service = new ChatService(
      {
        retriever: new StubRetriever(corpus),
        generator: new StubGenerator({ answer: ['At 9am. thanks for asking!'] }),
      },
      { logger: quietLogger }
    );

    const result = await service.chat(' When does the office open? ', 'basic');

    expect(result.answer).toBe('At 9am. thanks for asking!');
    expect(
      service.getHistory().map(({ role, content, mode }) => ({ role, content, mode }))
    ).toEqual([
      { role: 'user', content: 'When does the office open?', mode: 'basic' },
      { role: 'assistant', content: 'At 9am. thanks for asking!', mode: 'basic' },
    ]);
  });

  it('should run each chat in a service context', async () => {
    const sources: Array<string | undefined> = [];
    const service = new ChatService(
      { retriever: new StubRetriever(corpus), generator: new StubGenerator() },
      {
        logger: quietLogger,
        hooks: [
          {
            name: 'context-probe',
            onRunEnd: async () => {
              const ctx = getCurrentContext();
              sources.push(`${ctx?.source}:${ctx?.mode}`);
            },
          },
        ],
      }
    );

    await service.chat('q', 'basic');

    expect(sources).toEqual(['service:basic']);
  });

  it('should validate the message and mode', async () => {
    const service = new ChatService(
      { retriever: new StubRetriever(corpus), generator: new StubGenerator() },
      { logger: quietLogger }
    );

    await expect(service.chat('  ', 'basic')).rejects.toBeInstanceOf(ValidationError);
    await expect(service.chat('q', 'agentic')).rejects.toThrow('Unknown mode: agentic');
    expect(service.getHistory()).toEqual([]);
  });

  it('should keep only the most recent history entries', async () => {
    const service = new ChatService(
      { retriever: new StubRetriever(corpus), generator: new StubGenerator() },
      { logger: quietLogger, historyLimit: 3 }
    );

    await service.chat('first', 'basic');
    await service.chat('second', 'basic');

    expect(service.getHistory().map((entry) => entry.content)).toEqual([
      'stub answer. thanks for asking!',
      'second',
      'stub answer. thanks for asking!',
    ]);

    service.clearHistory();
    expect(service.getHistory()).toEqual([]);
  });
});
