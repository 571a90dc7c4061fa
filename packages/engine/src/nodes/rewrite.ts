import { wrapCapabilityError, type Generator, type Logger } from '@docqa/core';
import { rewritePrompt } from './prompts.js';
import { QuestionRewrite } from './schemas.js';
import type { WorkflowNode } from './types.js';

/**
 * Rewrite the question using the evaluator's feedback.
 * The new question fully replaces the old one.
 */
export function createRewriteNode(generator: Generator, logger: Logger): WorkflowNode {
  return async (state) => {
    let rewrite: QuestionRewrite;
    try {
      rewrite = await generator.invokeStructured(
        rewritePrompt(state.question, state.suggestions ?? [], state.missingInfo ?? []),
        QuestionRewrite
      );
    } catch (error) {
      throw wrapCapabilityError('generator', error);
    }

    logger.info('Question rewritten', { from: state.question, to: rewrite.query });
    return { question: rewrite.query };
  };
}
