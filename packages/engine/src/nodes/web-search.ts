import { wrapCapabilityError, type Document, type WebSearcher } from '@docqa/core';
import type { WorkflowNode } from './types.js';

export const WEB_SEARCH_SOURCE = 'web_search';

/**
 * Replace the documents with a single document built from web results
 */
export function createWebSearchNode(webSearcher: WebSearcher): WorkflowNode {
  return async (state) => {
    let results: string[];
    try {
      results = await webSearcher.search(state.question);
    } catch (error) {
      throw wrapCapabilityError('web_search', error);
    }

    const document: Document = {
      content: results.join('\n'),
      metadata: { source: WEB_SEARCH_SOURCE },
    };
    return { documents: [document] };
  };
}
