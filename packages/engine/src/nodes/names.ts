/**
 * Node names shared by the workflow graphs
 */
export const NODE = {
  retrieve: 'retrieve',
  grade: 'grade_documents',
  generate: 'generate',
  webSearch: 'web_search',
  suggestEnrichment: 'suggest_enrichment',
  checkConfidence: 'check_confidence',
  queryRewrite: 'query_rewrite',
} as const;

export type NodeName = (typeof NODE)[keyof typeof NODE];
