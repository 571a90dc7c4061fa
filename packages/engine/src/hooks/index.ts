/**
 * Graph Hooks Module
 *
 * @module @docqa/engine/hooks
 */

export type {
  GraphHook,
  HookConfig,
  NodeStartContext,
  NodeEndContext,
  RunEndContext,
  RunOutcome,
} from './types.js';
export { DEFAULT_HOOK_CONFIG } from './types.js';
export { GraphHookRunner, type HookRunResult } from './runner.js';
