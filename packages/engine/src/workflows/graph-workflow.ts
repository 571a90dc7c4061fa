/**
 * Base class for graph-backed workflows.
 *
 * Runs one question through a compiled graph inside a telemetry
 * context, so every log line of the run carries the same runId.
 *
 * @module @docqa/engine/workflows/graph-workflow
 */

import {
  ValidationError,
  createContext,
  getCurrentContext,
  getLogger,
  runWithContext,
  type Logger,
} from '@docqa/core';
import type { CompiledGraph } from '../graph/state-graph.js';
import { GraphHookRunner } from '../hooks/runner.js';
import {
  createInitialState,
  toFinalState,
  type FinalState,
  type WorkflowState,
  type WorkflowStateUpdate,
} from '../state/workflow-state.js';
import type { Workflow, WorkflowMode, WorkflowOptions } from './types.js';

export abstract class GraphWorkflow<N extends string> implements Workflow {
  abstract readonly mode: WorkflowMode;

  protected readonly logger: Logger;
  private readonly hookRunner: GraphHookRunner<WorkflowState>;
  private readonly maxIterations: number | undefined;
  private readonly maxSteps: number | undefined;

  constructor(options: WorkflowOptions) {
    this.logger = options.logger ?? getLogger();
    this.hookRunner = new GraphHookRunner<WorkflowState>({}, this.logger);
    for (const hook of options.hooks ?? []) {
      this.hookRunner.register(hook);
    }
    this.maxIterations = options.maxIterations;
    this.maxSteps = options.maxSteps;
  }

  protected abstract readonly graph: CompiledGraph<WorkflowState, WorkflowStateUpdate, N>;

  async execute(question: string): Promise<FinalState> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new ValidationError('Question must not be empty', {
        fieldErrors: { question: 'required' },
      });
    }

    const ctx = getCurrentContext() ?? createContext('internal', { mode: this.mode });
    return runWithContext({ ...ctx, mode: this.mode }, () => this.run(trimmed));
  }

  private async run(question: string): Promise<FinalState> {
    const startTime = Date.now();
    this.logger.info('Workflow started', { mode: this.mode });

    const result = await this.graph.invoke(createInitialState(question), {
      maxIterations: this.maxIterations,
      maxSteps: this.maxSteps,
      hooks: this.hookRunner,
    });

    this.logger.info('Workflow finished', {
      mode: this.mode,
      status: result.status,
      path: result.path,
      iterations: result.iterations,
      durationMs: Date.now() - startTime,
    });

    return toFinalState(result);
  }

  describe(): string {
    return this.graph.describe();
  }
}
