/**
 * Graph Hook Runner
 *
 * Manages registration and execution of graph lifecycle hooks.
 * Hooks never crash a run: failures and timeouts are logged and the
 * run continues.
 *
 * @module @docqa/engine/hooks
 */

import { getLogger, type Logger } from '@docqa/core';
import type {
  GraphHook,
  HookConfig,
  NodeStartContext,
  NodeEndContext,
  RunEndContext,
} from './types.js';
import { DEFAULT_HOOK_CONFIG } from './types.js';

/**
 * Result of a single hook execution
 */
interface HookExecutionResult {
  hookName: string;
  success: boolean;
  durationMs: number;
  error?: string;
}

/**
 * Result of running all hooks for one event
 */
export interface HookRunResult {
  totalHooks: number;
  successfulHooks: number;
  failedHooks: number;
  results: HookExecutionResult[];
  totalDurationMs: number;
}

type HookEvent = 'onNodeStart' | 'onNodeEnd' | 'onRunEnd';

/**
 * GraphHookRunner manages and executes hooks around graph nodes
 *
 * Hooks run in series, in registration order.
 *
 * Usage:
 * ```typescript
 * const runner = new GraphHookRunner<WorkflowState>();
 * runner.register({ name: 'progress', onNodeStart: async (ctx) => show(ctx.node) });
 *
 * await graph.invoke(state, { hooks: runner });
 * ```
 */
export class GraphHookRunner<S = unknown> {
  private hooks: GraphHook<S>[] = [];
  private config: HookConfig;
  private logger: Logger;

  constructor(config?: Partial<HookConfig>, logger?: Logger) {
    this.config = { ...DEFAULT_HOOK_CONFIG, ...config };
    this.logger = logger ?? getLogger();
  }

  /**
   * Register a hook
   */
  register(hook: GraphHook<S>): void {
    if (this.hooks.some((h) => h.name === hook.name)) {
      this.logger.warn(`Hook already registered: ${hook.name}, skipping duplicate`);
      return;
    }

    this.hooks.push(hook);
    if (this.config.debug) {
      this.logger.debug(`Hook registered: ${hook.name}`);
    }
  }

  async nodeStart(ctx: NodeStartContext<S>): Promise<HookRunResult> {
    return this.runAll('onNodeStart', (hook) => hook.onNodeStart?.(ctx), ctx.runId);
  }

  async nodeEnd(ctx: NodeEndContext<S>): Promise<HookRunResult> {
    return this.runAll('onNodeEnd', (hook) => hook.onNodeEnd?.(ctx), ctx.runId);
  }

  async runEnd(ctx: RunEndContext<S>): Promise<HookRunResult> {
    return this.runAll('onRunEnd', (hook) => hook.onRunEnd?.(ctx), ctx.runId);
  }

  private async runAll(
    event: HookEvent,
    call: (hook: GraphHook<S>) => Promise<void> | undefined,
    runId: string | undefined
  ): Promise<HookRunResult> {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];

    for (const hook of this.hooks) {
      if (!hook[event]) continue;
      results.push(await this.executeHookWithTimeout(hook, event, () => call(hook), runId));
    }

    const failedHooks = results.filter((r) => !r.success).length;
    if (this.config.debug && results.length > 0) {
      this.logger.debug(`Hooks completed for ${event}`, {
        results: results.map((r) => ({ name: r.hookName, success: r.success, durationMs: r.durationMs })),
      });
    }

    return {
      totalHooks: results.length,
      successfulHooks: results.length - failedHooks,
      failedHooks,
      results,
      totalDurationMs: Date.now() - startTime,
    };
  }

  /**
   * Execute a single hook method with timeout protection
   */
  private async executeHookWithTimeout(
    hook: GraphHook<S>,
    event: HookEvent,
    invoke: () => Promise<void> | undefined,
    runId: string | undefined
  ): Promise<HookExecutionResult> {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Hook timeout after ${this.config.hookTimeoutMs}ms`));
        }, this.config.hookTimeoutMs);
      });

      await Promise.race([invoke() ?? Promise.resolve(), timeoutPromise]);

      return {
        hookName: hook.name,
        success: true,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);

      this.logger.error(`Hook ${hook.name}.${event} failed: ${errorMessage}`, error, {
        hookName: hook.name,
        event,
        runId,
      });

      return {
        hookName: hook.name,
        success: false,
        durationMs: Date.now() - startTime,
        error: errorMessage,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
