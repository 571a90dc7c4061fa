import { wrapCapabilityError, type Generator } from '@docqa/core';
import { answerPrompt, formatContext } from './prompts.js';
import type { WorkflowNode } from './types.js';

/**
 * Answer the question from the current documents
 */
export function createGenerateNode(generator: Generator): WorkflowNode {
  return async (state) => {
    try {
      const answer = await generator.invoke(
        answerPrompt(state.question, formatContext(state.documents))
      );
      return { answer };
    } catch (error) {
      throw wrapCapabilityError('generator', error);
    }
  };
}
