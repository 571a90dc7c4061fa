import { wrapCapabilityError, type Generator, type Logger } from '@docqa/core';
import { formatContext, gradePrompt } from './prompts.js';
import { RelevanceGrade } from './schemas.js';
import type { WorkflowNode } from './types.js';

/**
 * Grade the retrieved documents against the question.
 *
 * An empty document set is not relevant and costs no generator call.
 */
export function createGradeNode(generator: Generator, logger: Logger): WorkflowNode {
  return async (state) => {
    const documents = state.documents ?? [];
    if (documents.length === 0) {
      logger.debug('No documents to grade');
      return { relevance: 'not_relevant' };
    }

    let grade: RelevanceGrade;
    try {
      grade = await generator.invokeStructured(
        gradePrompt(state.question, formatContext(documents)),
        RelevanceGrade
      );
    } catch (error) {
      throw wrapCapabilityError('generator', error);
    }

    const relevance = grade.binaryScore === 'yes' ? 'relevant' : 'not_relevant';
    logger.debug('Documents graded', { documents: documents.length, relevance });
    return { relevance };
  };
}
