/**
 * Workflow Types
 *
 * @module @docqa/engine/workflows/types
 */

import type { Logger } from '@docqa/core';
import type { GraphHook } from '../hooks/types.js';
import type { FinalState, WorkflowState } from '../state/workflow-state.js';

/**
 * Workflow variants
 *
 * - basic: retrieve, then generate
 * - suggestion: grade; enrichment suggestions when nothing is relevant
 * - search: grade; web search fallback and a confidence-driven rewrite loop
 */
export type WorkflowMode = 'basic' | 'suggestion' | 'search';

export const WORKFLOW_MODES: readonly WorkflowMode[] = ['basic', 'suggestion', 'search'];

export function isWorkflowMode(value: string): value is WorkflowMode {
  return WORKFLOW_MODES.some((mode) => mode === value);
}

/**
 * Options shared by every workflow
 */
export interface WorkflowOptions {
  /** Documents fetched per retrieval (default 5) */
  nResults?: number;
  /** Documents kept after reranking (default 3) */
  rerankTopK?: number;
  /** Score an answer must exceed to finish (default 0.9) */
  confidenceThreshold?: number;
  /** Rewrite-loop bound (default 3) */
  maxIterations?: number;
  /** Node execution cap per run (default 50) */
  maxSteps?: number;
  /**
   * Suggestion variant: score generated answers with the evaluator
   * (default true)
   */
  scoreAnswers?: boolean;
  /** Lifecycle hooks run around every node */
  hooks?: GraphHook<WorkflowState>[];
  logger?: Logger;
}

/**
 * A runnable question-answering workflow
 */
export interface Workflow {
  readonly mode: WorkflowMode;

  /**
   * Answer one question
   *
   * @throws {ValidationError} for an empty question
   * @throws {CapabilityError} when a capability call fails
   * @throws {StructuredOutputError} when a structured response does not conform
   */
  execute(question: string): Promise<FinalState>;

  /** Text rendering of the workflow graph */
  describe(): string;
}
