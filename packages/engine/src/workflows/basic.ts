/**
 * Basic workflow: retrieve, then generate. No grading, no fallback.
 */

import type { Capabilities } from '@docqa/core';
import { StateGraph, type CompiledGraph } from '../graph/state-graph.js';
import { START, END } from '../graph/types.js';
import { mergeState, type WorkflowState, type WorkflowStateUpdate } from '../state/workflow-state.js';
import { NODE } from '../nodes/names.js';
import { createRetrieveNode } from '../nodes/retrieve.js';
import { createGenerateNode } from '../nodes/generate.js';
import { GraphWorkflow } from './graph-workflow.js';
import type { WorkflowOptions } from './types.js';

type BasicNode = typeof NODE.retrieve | typeof NODE.generate;

export class BasicWorkflow extends GraphWorkflow<BasicNode> {
  readonly mode = 'basic' as const;
  protected readonly graph: CompiledGraph<WorkflowState, WorkflowStateUpdate, BasicNode>;

  constructor(capabilities: Capabilities, options: WorkflowOptions = {}) {
    super(options);
    this.graph = new StateGraph<WorkflowState, WorkflowStateUpdate, BasicNode>(mergeState)
      .addNode(NODE.retrieve, createRetrieveNode(capabilities.retriever, options))
      .addNode(NODE.generate, createGenerateNode(capabilities.generator))
      .addEdge(START, NODE.retrieve)
      .addEdge(NODE.retrieve, NODE.generate)
      .addEdge(NODE.generate, END)
      .compile({ name: this.mode, logger: this.logger });
  }
}
