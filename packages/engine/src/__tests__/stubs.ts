/**
 * In-process capability stubs for engine tests.
 */

import type { z } from 'zod';
import {
  StructuredOutputError,
  createLogger,
  type ChatMessage,
  type Document,
  type DocumentSet,
  type Generator,
  type RetrieveOptions,
  type Retriever,
  type WebSearcher,
} from '@docqa/core';
import {
  ENRICHMENT_SYSTEM_PROMPT,
  EVALUATOR_SYSTEM_PROMPT,
  GRADER_SYSTEM_PROMPT,
  REWRITE_SYSTEM_PROMPT,
} from '../nodes/prompts.js';

export const quietLogger = createLogger('test', { minSeverity: 'CRITICAL' });

export const doc = (content: string, source = 'kb'): Document => ({
  content,
  metadata: { source },
});

export type CallKind = 'answer' | 'grade' | 'enrichment' | 'confidence' | 'rewrite';

/**
 * Replies per call kind. The n-th call gets the n-th reply; the last
 * reply repeats once the list is used up.
 */
export interface StubReplies {
  answer?: string[];
  grade?: unknown[];
  enrichment?: unknown[];
  confidence?: unknown[];
  rewrite?: unknown[];
}

export interface StubCall {
  kind: CallKind;
  messages: ChatMessage[];
}

function kindOf(messages: readonly ChatMessage[]): CallKind {
  const system = messages.find((m) => m.role === 'system')?.content;
  switch (system) {
    case GRADER_SYSTEM_PROMPT:
      return 'grade';
    case ENRICHMENT_SYSTEM_PROMPT:
      return 'enrichment';
    case EVALUATOR_SYSTEM_PROMPT:
      return 'confidence';
    case REWRITE_SYSTEM_PROMPT:
      return 'rewrite';
    default:
      return 'answer';
  }
}

function pick<T>(replies: readonly T[] | undefined, index: number, kind: CallKind): T {
  if (!replies || replies.length === 0) {
    throw new Error(`No stub reply configured for ${kind}`);
  }
  return replies[Math.min(index, replies.length - 1)];
}

export class StubGenerator implements Generator {
  readonly calls: StubCall[] = [];

  constructor(private readonly replies: StubReplies = {}) {}

  callsOf(kind: CallKind): StubCall[] {
    return this.calls.filter((c) => c.kind === kind);
  }

  async invoke(messages: readonly ChatMessage[]): Promise<string> {
    const index = this.callsOf('answer').length;
    this.calls.push({ kind: 'answer', messages: [...messages] });
    return pick(this.replies.answer ?? ['stub answer. thanks for asking!'], index, 'answer');
  }

  async invokeStructured<T extends z.ZodTypeAny>(
    messages: readonly ChatMessage[],
    schema: T
  ): Promise<z.infer<T>> {
    const kind = kindOf(messages);
    const index = this.callsOf(kind).length;
    this.calls.push({ kind, messages: [...messages] });

    const raw = kind === 'answer' ? undefined : pick(this.replies[kind], index, kind);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new StructuredOutputError('Stub reply did not match schema', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }
}

export class StubRetriever implements Retriever {
  readonly calls: Array<{ query: string; options: RetrieveOptions }> = [];

  constructor(private readonly documents: DocumentSet = []) {}

  async retrieve(query: string, options: RetrieveOptions): Promise<DocumentSet> {
    this.calls.push({ query, options });
    return this.documents;
  }
}

export class StubWebSearcher implements WebSearcher {
  readonly queries: string[] = [];

  constructor(private readonly results: string[] = ['web result']) {}

  async search(query: string): Promise<string[]> {
    this.queries.push(query);
    return this.results;
  }
}
