/**
 * Search workflow
 *
 * ```
 * START -> retrieve -> grade_documents
 *   not_relevant -> web_search
 *   relevant     -> generate
 * web_search -> generate -> check_confidence
 *   complete   -> END
 *   incomplete -> query_rewrite -> web_search (loop)
 * ```
 *
 * The loop re-queries the web, not the local corpus. Each pass through
 * query_rewrite -> web_search is one iteration. Once the bound is used
 * up the rewrite is skipped, and the run ends with status `loop_limit`
 * and the last scored round: its question, documents, answer and
 * confidence.
 */

import { ConfigurationError, type Capabilities } from '@docqa/core';
import { StateGraph, type CompiledGraph } from '../graph/state-graph.js';
import { START, END } from '../graph/types.js';
import { mergeState, type WorkflowState, type WorkflowStateUpdate } from '../state/workflow-state.js';
import { NODE } from '../nodes/names.js';
import { createRetrieveNode } from '../nodes/retrieve.js';
import { createGradeNode } from '../nodes/grade.js';
import { createGenerateNode } from '../nodes/generate.js';
import { createWebSearchNode } from '../nodes/web-search.js';
import { createConfidenceNode } from '../nodes/confidence.js';
import { createRewriteNode } from '../nodes/rewrite.js';
import { decideToGenerate, createDecideEnd } from '../nodes/routers.js';
import { GraphWorkflow } from './graph-workflow.js';
import type { WorkflowOptions } from './types.js';

type SearchNode =
  | typeof NODE.retrieve
  | typeof NODE.grade
  | typeof NODE.generate
  | typeof NODE.webSearch
  | typeof NODE.checkConfidence
  | typeof NODE.queryRewrite;

export class SearchWorkflow extends GraphWorkflow<SearchNode> {
  readonly mode = 'search' as const;
  protected readonly graph: CompiledGraph<WorkflowState, WorkflowStateUpdate, SearchNode>;

  /**
   * @throws {ConfigurationError} when no web searcher is provided
   */
  constructor(capabilities: Capabilities, options: WorkflowOptions = {}) {
    super(options);
    const { retriever, generator, webSearcher } = capabilities;
    if (!webSearcher) {
      throw new ConfigurationError('Search workflow requires a web searcher', { mode: 'search' });
    }

    this.graph = new StateGraph<WorkflowState, WorkflowStateUpdate, SearchNode>(mergeState)
      .addNode(NODE.retrieve, createRetrieveNode(retriever, options))
      .addNode(NODE.grade, createGradeNode(generator, this.logger))
      .addNode(NODE.webSearch, createWebSearchNode(webSearcher))
      .addNode(NODE.generate, createGenerateNode(generator))
      .addNode(NODE.checkConfidence, createConfidenceNode(generator))
      .addNode(NODE.queryRewrite, createRewriteNode(generator, this.logger))
      .addEdge(START, NODE.retrieve)
      .addEdge(NODE.retrieve, NODE.grade)
      // not_relevant is listed first so the walk reaches web_search before
      // generate, making query_rewrite -> web_search the loop edge
      .addConditionalEdges(NODE.grade, decideToGenerate, {
        not_relevant: NODE.webSearch,
        relevant: NODE.generate,
      })
      .addEdge(NODE.webSearch, NODE.generate)
      .addEdge(NODE.generate, NODE.checkConfidence)
      .addConditionalEdges(NODE.checkConfidence, createDecideEnd(options.confidenceThreshold), {
        complete: END,
        incomplete: NODE.queryRewrite,
      })
      .addEdge(NODE.queryRewrite, NODE.webSearch)
      .compile({
        name: this.mode,
        logger: this.logger,
        checkpoints: [NODE.checkConfidence],
      });
  }
}
