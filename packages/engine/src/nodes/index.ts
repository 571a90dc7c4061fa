export { NODE, type NodeName } from './names.js';
export type { WorkflowNode } from './types.js';
export { createRetrieveNode, type RetrieveNodeOptions } from './retrieve.js';
export { createGradeNode } from './grade.js';
export { createGenerateNode } from './generate.js';
export { createWebSearchNode, WEB_SEARCH_SOURCE } from './web-search.js';
export { createEnrichmentNode } from './enrichment.js';
export { createConfidenceNode } from './confidence.js';
export { createRewriteNode } from './rewrite.js';
export {
  decideToGenerate,
  createDecideEnd,
  DEFAULT_CONFIDENCE_THRESHOLD,
  type RelevanceRoute,
  type ConfidenceRoute,
} from './routers.js';
export * from './prompts.js';
export * from './schemas.js';
