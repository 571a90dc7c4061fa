/**
 * State Graph
 *
 * Builder and executor for small state-machine graphs.
 *
 * A graph is declared with nodes, static edges and conditional edges,
 * then compiled. Compilation validates the definition and classifies
 * back edges (edges that close a cycle on the depth-first walk from
 * START, in registration order). Each traversal of a back edge is one
 * loop iteration.
 *
 * Execution is strictly sequential: one node at a time, each partial
 * update merged into the state before the next edge is chosen. Node
 * errors propagate unchanged. Exhausting the iteration or step bound is
 * not an error: the run stops with status `loop_limit`.
 *
 * A node whose only edge is a back edge opens the next iteration, so it
 * is not run once the iteration bound is used up. Nodes compiled as
 * checkpoints mark states that hang together; a run stopped by either
 * bound returns the state as of the last checkpoint, when one was reached.
 *
 * @example
 * ```typescript
 * const graph = new StateGraph<State, Update, 'a' | 'b'>(mergeState)
 *   .addNode('a', nodeA)
 *   .addNode('b', nodeB)
 *   .addEdge(START, 'a')
 *   .addConditionalEdges('a', route, { again: 'a', done: 'b' })
 *   .addEdge('b', END)
 *   .compile({ name: 'example' });
 *
 * const result = await graph.invoke(initialState, { maxIterations: 2 });
 * ```
 *
 * @module @docqa/engine/graph/state-graph
 */

import { ConfigurationError, getCurrentContext, getLogger, type Logger } from '@docqa/core';
import {
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
  type CompileOptions,
  type InvokeOptions,
  type GraphRunResult,
  type GraphRunStatus,
} from './types.js';

// =============================================================================
// Builder
// =============================================================================

interface DeclaredEdge<S, N extends string> {
  from: N | Start;
  edge: GraphEdge<S, N>;
}

/**
 * Graph builder
 *
 * @typeParam S - State type
 * @typeParam U - Partial update returned by nodes
 * @typeParam N - Node name union
 */
export class StateGraph<S, U, N extends string = string> {
  private readonly nodes = new Map<string, NodeHandler<S, U>>();
  private readonly edges: DeclaredEdge<S, N>[] = [];

  constructor(private readonly reducer: Reducer<S, U>) {}

  /**
   * Register a node
   *
   * @throws {ConfigurationError} on a duplicate or reserved name
   */
  addNode(name: N, handler: NodeHandler<S, U>): this {
    if (name === START || name === END) {
      throw new ConfigurationError(`Node name is reserved: ${name}`, { node: name });
    }
    if (this.nodes.has(name)) {
      throw new ConfigurationError(`Node already registered: ${name}`, { node: name });
    }
    this.nodes.set(name, handler);
    return this;
  }

  addEdge(from: N | Start, to: N | End): this {
    this.edges.push({ from, edge: { kind: 'static', to } });
    return this;
  }

  /**
   * Branch on a router's label. The mapping must cover every label the
   * router can return.
   */
  addConditionalEdges<L extends string>(
    from: N,
    router: Router<S, L>,
    mapping: Record<L, N | End>
  ): this {
    this.edges.push({ from, edge: { kind: 'conditional', router, mapping: { ...mapping } } });
    return this;
  }

  /**
   * Validate the definition and produce an executable graph
   *
   * @throws {ConfigurationError} listing every problem found
   */
  compile(options: CompileOptions = {}): CompiledGraph<S, U, N> {
    const name = options.name ?? 'graph';
    const problems: string[] = [];

    const isNode = (value: string): value is N => this.nodes.has(value);

    // Entry
    const entryEdges = this.edges.filter((e) => e.from === START);
    let entry: N | undefined;
    if (entryEdges.length === 0) {
      problems.push('no entry edge from START');
    } else if (entryEdges.length > 1) {
      problems.push('more than one entry edge from START');
    } else {
      const target = targetsOf(entryEdges[0].edge)[0];
      if (target === END) {
        problems.push('START cannot lead directly to END');
      } else if (isNode(target)) {
        entry = target;
      }
    }

    // Edge endpoints and one outgoing edge per node
    const outgoing = new Map<string, GraphEdge<S, N>>();
    for (const { from, edge } of this.edges) {
      for (const target of targetsOf(edge)) {
        if (target !== END && !isNode(target)) {
          problems.push(`edge from ${from} targets unknown node: ${target}`);
        }
      }
      if (from === START) continue;
      if (!isNode(from)) {
        problems.push(`edge from unknown node: ${from}`);
        continue;
      }
      const existing = outgoing.get(from);
      if (existing) {
        problems.push(
          existing.kind !== edge.kind
            ? `node ${from} has both a static and a conditional outgoing edge`
            : `node ${from} has more than one outgoing edge`
        );
        continue;
      }
      outgoing.set(from, edge);
    }

    for (const node of this.nodes.keys()) {
      if (isNode(node) && !outgoing.has(node)) {
        problems.push(`node ${node} has no outgoing edge`);
      }
    }

    const checkpoints = new Set<string>();
    for (const checkpoint of options.checkpoints ?? []) {
      if (isNode(checkpoint)) {
        checkpoints.add(checkpoint);
      } else {
        problems.push(`checkpoint names unknown node: ${checkpoint}`);
      }
    }

    // Reachability and back edges
    const { visited, backEdges } = entry
      ? walk(entry, outgoing)
      : { visited: new Set<string>(), backEdges: new Set<string>() };
    if (entry) {
      for (const node of this.nodes.keys()) {
        if (!visited.has(node)) {
          problems.push(`node ${node} is unreachable from START`);
        }
      }
    }

    if (problems.length > 0 || !entry) {
      throw new ConfigurationError(`Invalid graph ${name}: ${problems.join('; ')}`, {
        graph: name,
        problems,
      });
    }

    return new CompiledGraph<S, U, N>(
      name,
      entry,
      new Map(this.nodes),
      outgoing,
      backEdges,
      checkpoints,
      this.reducer,
      options.logger
    );
  }
}

function targetsOf<S, N extends string>(edge: GraphEdge<S, N>): Array<N | End> {
  if (edge.kind === 'static') {
    return [edge.to];
  }
  return Array.from(new Set(Object.values(edge.mapping)));
}

function edgeKey(from: string, to: string): string {
  return `${from}->${to}`;
}

/**
 * Depth-first walk from the entry node. An edge into a node that is still
 * on the current path closes a cycle and is recorded as a back edge.
 */
function walk<S, N extends string>(
  entry: N,
  outgoing: ReadonlyMap<string, GraphEdge<S, N>>
): { visited: Set<string>; backEdges: Set<string> } {
  const WHITE = 0; // Unvisited
  const GRAY = 1; // On the current path
  const BLACK = 2; // Fully processed

  const colors = new Map<string, number>();
  const backEdges = new Set<string>();

  const visit = (node: N): void => {
    colors.set(node, GRAY);
    const edge = outgoing.get(node);
    if (edge) {
      for (const target of targetsOf(edge)) {
        if (target === END) continue;
        const color = colors.get(target) ?? WHITE;
        if (color === GRAY) {
          backEdges.add(edgeKey(node, target));
        } else if (color === WHITE) {
          visit(target);
        }
      }
    }
    colors.set(node, BLACK);
  };

  visit(entry);
  return { visited: new Set(colors.keys()), backEdges };
}

// =============================================================================
// Compiled Graph
// =============================================================================

/**
 * Executable, immutable graph. Safe to share across concurrent runs;
 * each run owns its state.
 */
export class CompiledGraph<S, U, N extends string = string> {
  private readonly logger: Logger;

  constructor(
    readonly name: string,
    private readonly entry: N,
    private readonly nodes: ReadonlyMap<string, NodeHandler<S, U>>,
    private readonly outgoing: ReadonlyMap<string, GraphEdge<S, N>>,
    private readonly backEdges: ReadonlySet<string>,
    private readonly checkpoints: ReadonlySet<string>,
    private readonly reducer: Reducer<S, U>,
    logger?: Logger
  ) {
    this.logger = (logger ?? getLogger()).child({ graph: name });
  }

  /**
   * Node names in registration order
   */
  get nodeNames(): string[] {
    return Array.from(this.nodes.keys());
  }

  /**
   * Back edges as `[from, to]` pairs
   */
  get loopEdges(): Array<[string, string]> {
    return Array.from(this.backEdges).map((key) => {
      const [from, to] = key.split('->');
      return [from, to];
    });
  }

  isBackEdge(from: string, to: string): boolean {
    return this.backEdges.has(edgeKey(from, to));
  }

  /**
   * Run the graph from START to END
   *
   * @throws {ConfigurationError} when a router returns an unmapped label
   */
  async invoke(initialState: S, options: InvokeOptions<S> = {}): Promise<GraphRunResult<S, N>> {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    const hooks = options.hooks;
    const runId = getCurrentContext()?.runId;
    const startTime = Date.now();

    let state = initialState;
    let current: N | End = this.entry;
    let status: GraphRunStatus = 'complete';
    let iterations = 0;
    let steps = 0;
    let checkpoint: { node: N; step: number; state: S } | undefined;
    const path: N[] = [];

    try {
      while (current !== END) {
        const node: N = current;

        if (steps >= maxSteps) {
          status = 'loop_limit';
          this.logger.warn('Step limit reached, returning current state', {
            node,
            steps,
            maxSteps,
          });
          break;
        }

        if (iterations >= maxIterations && this.opensIteration(node)) {
          status = 'loop_limit';
          this.logger.warn('Loop limit reached, returning best available state', {
            node,
            iterations,
            maxIterations,
          });
          break;
        }

        const handler = this.nodes.get(node);
        if (!handler) {
          throw new ConfigurationError(`Unknown node: ${node}`, { graph: this.name, node });
        }

        const step = steps + 1;
        await hooks?.nodeStart({ runId, graph: this.name, node, step, iteration: iterations, state });
        this.logger.debug('Node started', { node, step, iteration: iterations });

        const nodeStart = Date.now();
        const update = await handler(state);
        state = this.reducer(state, update);
        steps = step;
        path.push(node);
        const durationMs = Date.now() - nodeStart;
        if (this.checkpoints.has(node)) {
          checkpoint = { node, step, state };
        }

        this.logger.debug('Node finished', { node, step, durationMs });
        await hooks?.nodeEnd({
          runId,
          graph: this.name,
          node,
          step,
          iteration: iterations,
          state,
          durationMs,
        });

        const next = this.nextNode(node, state);

        if (next !== END && this.isBackEdge(node, next)) {
          if (iterations >= maxIterations) {
            status = 'loop_limit';
            this.logger.warn('Loop limit reached, returning best available state', {
              from: node,
              to: next,
              iterations,
              maxIterations,
            });
            break;
          }
          iterations++;
        }

        current = next;
      }
    } catch (error) {
      await hooks?.runEnd({
        runId,
        graph: this.name,
        outcome: 'failed',
        path,
        iterations,
        steps,
        state,
        error,
        durationMs: Date.now() - startTime,
      });
      throw error;
    }

    if (status === 'loop_limit' && checkpoint && checkpoint.step < steps) {
      this.logger.info('Restoring checkpoint state', {
        checkpoint: checkpoint.node,
        checkpointStep: checkpoint.step,
        steps,
      });
      state = checkpoint.state;
    }

    await hooks?.runEnd({
      runId,
      graph: this.name,
      outcome: status,
      path,
      iterations,
      steps,
      state,
      durationMs: Date.now() - startTime,
    });

    return { state, status, path, iterations, steps };
  }

  /**
   * True when the node's only way on is a static back edge
   */
  private opensIteration(node: N): boolean {
    const edge = this.outgoing.get(node);
    return edge?.kind === 'static' && edge.to !== END && this.isBackEdge(node, edge.to);
  }

  private nextNode(node: N, state: S): N | End {
    const edge = this.outgoing.get(node);
    if (!edge) {
      throw new ConfigurationError(`Node ${node} has no outgoing edge`, { graph: this.name, node });
    }
    if (edge.kind === 'static') {
      return edge.to;
    }

    const label = edge.router(state);
    if (!Object.hasOwn(edge.mapping, label)) {
      throw new ConfigurationError(`Router for ${node} returned unmapped label: ${label}`, {
        graph: this.name,
        node,
        label,
        labels: Object.keys(edge.mapping),
      });
    }

    const next = edge.mapping[label];
    this.logger.debug('Route selected', { node, label, next: next === END ? 'END' : next });
    return next;
  }

  /**
   * Human-readable description of the graph
   */
  describe(): string {
    const show = (target: string, from: string): string => {
      if (target === END) return 'END';
      return this.isBackEdge(from, target) ? `${target} (loop)` : target;
    };

    const lines: string[] = [`Graph: ${this.name}`, '', 'Edges:', `  START -> ${this.entry}`];

    for (const node of this.nodes.keys()) {
      const edge = this.outgoing.get(node);
      if (!edge) continue;
      if (edge.kind === 'static') {
        lines.push(`  ${node} -> ${show(edge.to, node)}`);
      } else {
        const branches = Object.entries(edge.mapping).map(
          ([label, target]) => `${label}: ${show(target, node)}`
        );
        lines.push(`  ${node} -> { ${branches.join(', ')} }`);
      }
    }

    const loops = this.loopEdges;
    lines.push('');
    lines.push(
      loops.length > 0
        ? `Loop edges: ${loops.map(([from, to]) => `${from} -> ${to}`).join(', ')}`
        : 'Loop edges: (none)'
    );

    return lines.join('\n');
  }
}
