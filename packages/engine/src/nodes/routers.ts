import type { WorkflowState } from '../state/workflow-state.js';

export type RelevanceRoute = 'relevant' | 'not_relevant';
export type ConfidenceRoute = 'complete' | 'incomplete';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.9;

/**
 * Generate from relevant documents, otherwise take the fallback branch
 */
export function decideToGenerate(state: Readonly<WorkflowState>): RelevanceRoute {
  return state.relevance === 'relevant' ? 'relevant' : 'not_relevant';
}

/**
 * Finish when confidence exceeds the threshold. Missing confidence counts as 0.
 */
export function createDecideEnd(
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): (state: Readonly<WorkflowState>) => ConfidenceRoute {
  return (state) => ((state.confidence ?? 0) > threshold ? 'complete' : 'incomplete');
}
