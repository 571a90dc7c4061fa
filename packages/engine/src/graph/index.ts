export { StateGraph, CompiledGraph } from './state-graph.js';
export {
  START,
  END,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_STEPS,
  type Start,
  type End,
  type NodeHandler,
  type Router,
  type Reducer,
  type GraphEdge,
  type GraphRunStatus,
  type CompileOptions,
  type InvokeOptions,
  type GraphRunResult,
} from './types.js';
