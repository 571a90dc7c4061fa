import type { NodeHandler } from '../graph/types.js';
import type { WorkflowState, WorkflowStateUpdate } from '../state/workflow-state.js';

/**
 * A workflow node
 */
export type WorkflowNode = NodeHandler<WorkflowState, WorkflowStateUpdate>;
