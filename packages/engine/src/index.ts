/**
 * docqa - Workflow Engine
 *
 * This package provides the question-answering workflows. It includes:
 *
 * - State graph builder and executor with bounded loops
 * - Hook system for graph lifecycle events
 * - Workflow state and merge rules
 * - Node primitives, prompts and structured output schemas
 * - Basic, Suggestion and Search workflows
 * - Chat service dispatching by mode
 *
 * @module @docqa/engine
 */

export * from './graph/index.js';
export * from './hooks/index.js';
export * from './state/index.js';
export * from './nodes/index.js';
export * from './workflows/index.js';
export * from './service/index.js';
