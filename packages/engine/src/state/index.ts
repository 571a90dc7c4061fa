export {
  createInitialState,
  mergeState,
  toFinalState,
  type RelevanceVerdict,
  type WorkflowState,
  type WorkflowStateUpdate,
  type FinalState,
} from './workflow-state.js';
