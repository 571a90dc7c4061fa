/**
 * Graph Hook System Types
 *
 * These types define the contract for hooks that observe a graph run:
 * before and after each node, and once when the run ends. Hooks can be
 * used for:
 * - Progress display (the CLI spinner)
 * - Custom logging or telemetry
 *
 * Hooks observe; they never change state or routing.
 *
 * @module @docqa/engine/hooks
 */

// =============================================================================
// Hook Context Types
// =============================================================================

/**
 * Context passed to hooks before a node runs
 */
export interface NodeStartContext<S = unknown> {
  /** Run ID from the active telemetry context, if any */
  runId?: string;

  /** Graph name */
  graph: string;

  /** Node about to run */
  node: string;

  /** 1-based position of this node execution within the run */
  step: number;

  /** Rewrite-loop iterations completed so far */
  iteration: number;

  /** State the node will receive */
  state: Readonly<S>;
}

/**
 * Context passed to hooks after a node's update has been merged
 */
export interface NodeEndContext<S = unknown> extends NodeStartContext<S> {
  /** Node execution time in milliseconds */
  durationMs: number;
}

/**
 * How a run ended
 */
export type RunOutcome = 'complete' | 'loop_limit' | 'failed';

/**
 * Context passed to hooks when a run ends
 */
export interface RunEndContext<S = unknown> {
  runId?: string;
  graph: string;
  outcome: RunOutcome;

  /** Nodes executed, in order */
  path: readonly string[];

  iterations: number;
  steps: number;

  /** Last merged state */
  state: Readonly<S>;

  /** Error that ended a failed run */
  error?: unknown;

  durationMs: number;
}

// =============================================================================
// Hook Interface
// =============================================================================

/**
 * Interface for graph lifecycle hooks
 *
 * All methods are optional. A hook that throws or times out is logged
 * and skipped; the run continues.
 */
export interface GraphHook<S = unknown> {
  /**
   * Unique name for this hook (for logging/debugging)
   */
  name: string;

  onNodeStart?(ctx: NodeStartContext<S>): Promise<void>;

  onNodeEnd?(ctx: NodeEndContext<S>): Promise<void>;

  onRunEnd?(ctx: RunEndContext<S>): Promise<void>;
}

// =============================================================================
// Hook Configuration
// =============================================================================

/**
 * Configuration for the hook runner
 */
export interface HookConfig {
  /**
   * Timeout for individual hook execution in ms
   * @default 5000
   */
  hookTimeoutMs: number;

  /**
   * Log hook execution for debugging
   * @default false
   */
  debug: boolean;
}

/**
 * Default hook configuration
 */
export const DEFAULT_HOOK_CONFIG: HookConfig = {
  hookTimeoutMs: 5000,
  debug: false,
};
