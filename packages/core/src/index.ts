/**
 * @docqa/core - Capabilities and ambient services for docqa
 *
 * This module provides:
 * - Capability contracts: Retriever, Generator, WebSearcher
 * - Providers: LLM-backed Generator, Tavily web search, in-memory retriever
 * - Error taxonomy, structured logging and configuration
 */

export type {
  Document,
  DocumentSet,
  MessageRole,
  ChatMessage,
  RetrieveOptions,
  Retriever,
  Generator,
  WebSearcher,
  Capabilities,
} from './types.js';

export * from './errors.js';
export * from './telemetry/index.js';
export * from './config.js';
export * from './llm/index.js';
export * from './search/index.js';
export * from './retrieval/index.js';
