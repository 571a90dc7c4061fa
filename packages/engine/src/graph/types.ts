/**
 * Graph Types
 *
 * A graph is a set of named nodes joined by static and conditional
 * edges. Nodes transform a shared state; routers pick the next node
 * from the merged state.
 *
 * @module @docqa/engine/graph/types
 */

import type { Logger } from '@docqa/core';
import type { GraphHookRunner } from '../hooks/runner.js';

// =============================================================================
// Sentinels
// =============================================================================

/** Virtual entry node */
export const START = '__start__';

/** Virtual terminal node */
export const END = '__end__';

export type Start = typeof START;
export type End = typeof END;

// =============================================================================
// Node and Edge Types
// =============================================================================

/**
 * A node consumes the current state and returns a partial update
 */
export type NodeHandler<S, U> = (state: Readonly<S>) => Promise<U>;

/**
 * A router inspects the merged state and names the branch to follow
 */
export type Router<S, L extends string> = (state: Readonly<S>) => L;

/**
 * Merges a node's partial update into the state
 */
export type Reducer<S, U> = (state: S, update: U) => S;

/**
 * Outgoing edge of a node
 */
export type GraphEdge<S, N extends string> =
  | {
      kind: 'static';
      to: N | End;
    }
  | {
      kind: 'conditional';
      router: (state: Readonly<S>) => string;
      mapping: Readonly<Record<string, N | End>>;
    };

// =============================================================================
// Execution Types
// =============================================================================

/**
 * How a run ended
 *
 * - complete: reached END
 * - loop_limit: stopped by maxIterations or maxSteps
 */
export type GraphRunStatus = 'complete' | 'loop_limit';

/**
 * Options for compiling a graph
 */
export interface CompileOptions {
  /** Name used in logs, hooks and describe() */
  name?: string;

  /** Logger for node, routing and loop-limit events (default: getLogger()) */
  logger?: Logger;

  /**
   * Nodes after which the state is consistent. A run stopped at a bound
   * returns the state recorded after the last of these that ran.
   */
  checkpoints?: readonly string[];
}

/**
 * Options for a single run
 */
export interface InvokeOptions<S> {
  /**
   * Back-edge traversals allowed per run
   * @default 3
   */
  maxIterations?: number;

  /**
   * Total node executions allowed per run
   * @default 50
   */
  maxSteps?: number;

  /** Lifecycle hooks for this run */
  hooks?: GraphHookRunner<S>;
}

/**
 * Result of a graph run
 */
export interface GraphRunResult<S, N extends string> {
  /** Final state, or the last checkpoint state when a bound stopped the run */
  state: S;
  status: GraphRunStatus;
  /** Nodes executed, in order */
  path: N[];
  /** Back-edge traversals taken */
  iterations: number;
  /** Node executions */
  steps: number;
}

export const DEFAULT_MAX_ITERATIONS = 3;
export const DEFAULT_MAX_STEPS = 50;
