import { wrapCapabilityError, type Generator } from '@docqa/core';
import { enrichmentPrompt, NO_RELEVANT_DOCUMENTS_ANSWER } from './prompts.js';
import { Suggestions } from './schemas.js';
import type { WorkflowNode } from './types.js';

/**
 * Ask for enrichment suggestions instead of answering.
 * Sets the placeholder answer and zero confidence.
 */
export function createEnrichmentNode(generator: Generator): WorkflowNode {
  return async (state) => {
    let result: Suggestions;
    try {
      result = await generator.invokeStructured(enrichmentPrompt(state.question), Suggestions);
    } catch (error) {
      throw wrapCapabilityError('generator', error);
    }

    return {
      answer: NO_RELEVANT_DOCUMENTS_ANSWER,
      suggestions: result.suggestions,
      missingInfo: result.missingInfo,
      confidence: 0,
    };
  };
}
