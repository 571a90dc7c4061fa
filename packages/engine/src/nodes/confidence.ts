import { wrapCapabilityError, type Generator } from '@docqa/core';
import { evaluatorPrompt, formatContext } from './prompts.js';
import { ConfidenceScore } from './schemas.js';
import type { WorkflowNode } from './types.js';

/**
 * Score the answer against its documents
 */
export function createConfidenceNode(generator: Generator): WorkflowNode {
  return async (state) => {
    let score: ConfidenceScore;
    try {
      score = await generator.invokeStructured(
        evaluatorPrompt(state.question, formatContext(state.documents), state.answer ?? ''),
        ConfidenceScore
      );
    } catch (error) {
      throw wrapCapabilityError('generator', error);
    }

    return {
      confidence: score.confidence,
      missingInfo: score.missingInfo,
      suggestions: score.suggestions,
    };
  };
}
