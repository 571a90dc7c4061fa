/**
 * Workflow State
 *
 * The record threaded through one workflow invocation. A run starts
 * with only the question; each node returns a partial update that is
 * merged before routing.
 *
 * Merge rules:
 * - a field present in the update replaces the current value
 * - a field absent from the update (or undefined) is kept
 * - lists are replaced, never appended
 * - the question is replaced wholesale; earlier questions are not kept
 *
 * @module @docqa/engine/state/workflow-state
 */

import type { DocumentSet } from '@docqa/core';
import type { GraphRunResult, GraphRunStatus } from '../graph/types.js';

// =============================================================================
// State Types
// =============================================================================

/**
 * Grader verdict over the retrieved documents
 */
export type RelevanceVerdict = 'relevant' | 'not_relevant';

export interface WorkflowState {
  question: string;
  documents?: DocumentSet;
  relevance?: RelevanceVerdict;
  answer?: string;
  /** Answer confidence in [0, 1] */
  confidence?: number;
  suggestions?: readonly string[];
  missingInfo?: readonly string[];
}

/**
 * Partial update returned by a node
 */
export type WorkflowStateUpdate = Partial<WorkflowState>;

/**
 * Result handed back to callers
 */
export interface FinalState {
  question: string;
  answer: string;
  confidence?: number;
  suggestions?: readonly string[];
  missingInfo?: readonly string[];
  documents: DocumentSet;
  relevance?: RelevanceVerdict;
  status: GraphRunStatus;
  /** Nodes executed, in order */
  path: string[];
  /** Rewrite-loop iterations taken */
  iterations: number;
}

// =============================================================================
// Operations
// =============================================================================

export function createInitialState(question: string): WorkflowState {
  return { question };
}

/**
 * Merge a node update into the state, returning a new state
 */
export function mergeState(state: WorkflowState, update: WorkflowStateUpdate): WorkflowState {
  const next: WorkflowState = { ...state };

  if (update.question !== undefined) next.question = update.question;
  if (update.documents !== undefined) next.documents = update.documents;
  if (update.relevance !== undefined) next.relevance = update.relevance;
  if (update.answer !== undefined) next.answer = update.answer;
  if (update.confidence !== undefined) next.confidence = update.confidence;
  if (update.suggestions !== undefined) next.suggestions = update.suggestions;
  if (update.missingInfo !== undefined) next.missingInfo = update.missingInfo;

  return next;
}

/**
 * Project a graph run onto the caller-facing result
 */
export function toFinalState<N extends string>(result: GraphRunResult<WorkflowState, N>): FinalState {
  const { state } = result;
  const final: FinalState = {
    question: state.question,
    answer: state.answer ?? '',
    documents: state.documents ?? [],
    status: result.status,
    path: [...result.path],
    iterations: result.iterations,
  };

  if (state.confidence !== undefined) final.confidence = state.confidence;
  if (state.suggestions !== undefined) final.suggestions = state.suggestions;
  if (state.missingInfo !== undefined) final.missingInfo = state.missingInfo;
  if (state.relevance !== undefined) final.relevance = state.relevance;

  return final;
}
