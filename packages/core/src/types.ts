/**
 * Capability Contracts
 *
 * The three narrow collaborators the workflow engine consumes:
 * a Retriever over the private corpus, a Generator (free text and
 * structured output), and a WebSearcher. The engine depends on these
 * interfaces only; concrete providers live beside them in this package.
 *
 * Capability handles are built once and shared read-only across
 * concurrent workflow invocations, so implementations must not keep
 * per-call mutable state.
 *
 * @module @docqa/core/types
 */

import type { z } from 'zod';

// =============================================================================
// Documents
// =============================================================================

/**
 * A unit of evidence produced by a capability provider
 */
export interface Document {
  /** Text content */
  content: string;
  /** Provider metadata (source file, chunk index, origin, ...) */
  metadata: Record<string, string>;
}

/**
 * Ordered documents, most relevant first. May be empty.
 */
export type DocumentSet = readonly Document[];

// =============================================================================
// Messages
// =============================================================================

/**
 * Message role in a generator conversation
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * Chat message sent to a Generator
 */
export interface ChatMessage {
  role: MessageRole;
  content: string;
}

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Options for a retrieval call
 */
export interface RetrieveOptions {
  /** Number of results to fetch */
  nResults: number;
  /** Re-score the first K results with a reranker (when one is configured) */
  rerankTopK?: number;
}

/**
 * Retrieves documents from the private corpus
 */
export interface Retriever {
  retrieve(query: string, options: RetrieveOptions): Promise<DocumentSet>;
}

/**
 * Text generation capability
 */
export interface Generator {
  /** Free-text completion */
  invoke(messages: readonly ChatMessage[]): Promise<string>;

  /**
   * Structured completion decoded against a zod schema.
   *
   * @throws {StructuredOutputError} when the response does not conform
   */
  invokeStructured<T extends z.ZodTypeAny>(
    messages: readonly ChatMessage[],
    schema: T
  ): Promise<z.infer<T>>;
}

/**
 * External web search capability
 */
export interface WebSearcher {
  /** Returns result snippets in provider ranking order */
  search(query: string): Promise<string[]>;
}

/**
 * The capability handles a workflow is built from
 */
export interface Capabilities {
  retriever: Retriever;
  generator: Generator;
  webSearcher?: WebSearcher;
}
