/**
 * Suggestion workflow
 *
 * ```
 * START -> retrieve -> grade_documents
 *   relevant     -> generate -> check_confidence -> END
 *   not_relevant -> suggest_enrichment -> END
 * ```
 *
 * With `scoreAnswers: false`, generate goes straight to END. There is
 * no loop.
 */

import type { Capabilities } from '@docqa/core';
import { StateGraph, type CompiledGraph } from '../graph/state-graph.js';
import { START, END } from '../graph/types.js';
import { mergeState, type WorkflowState, type WorkflowStateUpdate } from '../state/workflow-state.js';
import { NODE } from '../nodes/names.js';
import { createRetrieveNode } from '../nodes/retrieve.js';
import { createGradeNode } from '../nodes/grade.js';
import { createGenerateNode } from '../nodes/generate.js';
import { createEnrichmentNode } from '../nodes/enrichment.js';
import { createConfidenceNode } from '../nodes/confidence.js';
import { decideToGenerate } from '../nodes/routers.js';
import { GraphWorkflow } from './graph-workflow.js';
import type { WorkflowOptions } from './types.js';

type SuggestionNode =
  | typeof NODE.retrieve
  | typeof NODE.grade
  | typeof NODE.generate
  | typeof NODE.suggestEnrichment
  | typeof NODE.checkConfidence;

export class SuggestionWorkflow extends GraphWorkflow<SuggestionNode> {
  readonly mode = 'suggestion' as const;
  protected readonly graph: CompiledGraph<WorkflowState, WorkflowStateUpdate, SuggestionNode>;

  constructor(capabilities: Capabilities, options: WorkflowOptions = {}) {
    super(options);
    const { retriever, generator } = capabilities;

    const builder = new StateGraph<WorkflowState, WorkflowStateUpdate, SuggestionNode>(mergeState)
      .addNode(NODE.retrieve, createRetrieveNode(retriever, options))
      .addNode(NODE.grade, createGradeNode(generator, this.logger))
      .addNode(NODE.generate, createGenerateNode(generator))
      .addNode(NODE.suggestEnrichment, createEnrichmentNode(generator))
      .addEdge(START, NODE.retrieve)
      .addEdge(NODE.retrieve, NODE.grade)
      .addConditionalEdges(NODE.grade, decideToGenerate, {
        not_relevant: NODE.suggestEnrichment,
        relevant: NODE.generate,
      })
      .addEdge(NODE.suggestEnrichment, END);

    if (options.scoreAnswers ?? true) {
      builder
        .addNode(NODE.checkConfidence, createConfidenceNode(generator))
        .addEdge(NODE.generate, NODE.checkConfidence)
        .addEdge(NODE.checkConfidence, END);
    } else {
      builder.addEdge(NODE.generate, END);
    }

    this.graph = builder.compile({ name: this.mode, logger: this.logger });
  }
}
