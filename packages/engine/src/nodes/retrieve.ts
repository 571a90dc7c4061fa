import { wrapCapabilityError, type Retriever } from '@docqa/core';
import type { WorkflowNode } from './types.js';

export interface RetrieveNodeOptions {
  /** @default 5 */
  nResults?: number;
  /** @default 3 */
  rerankTopK?: number;
}

/**
 * Fetch documents for the current question
 */
export function createRetrieveNode(
  retriever: Retriever,
  options: RetrieveNodeOptions = {}
): WorkflowNode {
  const nResults = options.nResults ?? 5;
  const rerankTopK = options.rerankTopK ?? 3;

  return async (state) => {
    try {
      return { documents: await retriever.retrieve(state.question, { nResults, rerankTopK }) };
    } catch (error) {
      throw wrapCapabilityError('retriever', error);
    }
  };
}
