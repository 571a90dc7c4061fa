/**
 * Spinner progress hook
 *
 * Follows node transitions of a workflow run on an ora spinner.
 */

import type { GraphHook, WorkflowState } from '@docqa/engine';

/** The part of an ora spinner the hook drives */
export interface ProgressTarget {
  text: string;
}

const NODE_LABELS: Record<string, string> = {
  retrieve: 'Retrieving documents',
  grade_documents: 'Grading relevance',
  generate: 'Generating answer',
  web_search: 'Searching the web',
  suggest_enrichment: 'Suggesting corpus enrichment',
  check_confidence: 'Scoring confidence',
  query_rewrite: 'Rewriting question',
};

export function nodeLabel(node: string): string {
  return NODE_LABELS[node] ?? node;
}

export function createProgressHook(target: ProgressTarget): GraphHook<WorkflowState> {
  return {
    name: 'cli-progress',
    onNodeStart: async (ctx) => {
      const round = ctx.iteration > 0 ? ` (rewrite ${ctx.iteration})` : '';
      target.text = `${nodeLabel(ctx.node)}...${round}`;
    },
  };
}
