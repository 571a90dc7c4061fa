export {
  WORKFLOW_MODES,
  isWorkflowMode,
  type WorkflowMode,
  type WorkflowOptions,
  type Workflow,
} from './types.js';
export { GraphWorkflow } from './graph-workflow.js';
export { BasicWorkflow } from './basic.js';
export { SuggestionWorkflow } from './suggestion.js';
export { SearchWorkflow } from './search.js';
export { createWorkflow } from './factory.js';
