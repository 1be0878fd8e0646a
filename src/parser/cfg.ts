/**
 * Control-flow graph construction
 *
 * Builds the per-function graph over operation ids. Node 0 is the synthetic
 * entry; the synthetic exit is one past the largest operation id. Guards fan
 * out to the exit on their failing side, loops carry a back edge to their
 * header, and terminations end the path.
 */

import type {
  ControlFlowEdge,
  ControlFlowEdgeKind,
  ControlFlowGraph,
  Operation,
} from "../types/index.js";
import { flattenOperations } from "./operations.js";

// ============================================================================
// Construction
// ============================================================================

/** An edge waiting for its target: the next operation in sequence. */
interface PendingEdge {
  from: number;
  kind: ControlFlowEdgeKind;
}

class GraphBuilder {
  private readonly edges: ControlFlowEdge[] = [];
  private readonly seen = new Set<string>();

  constructor(readonly exit: number) {}

  edge(from: number, to: number, kind: ControlFlowEdgeKind): void {
    const key = `${from}>${to}:${kind}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.edges.push({ from, to, kind });
  }

  connect(pending: readonly PendingEdge[], to: number): void {
    for (const p of pending) this.edge(p.from, to, p.kind);
  }

  sequence(ops: readonly Operation[], incoming: PendingEdge[]): PendingEdge[] {
    let frontier = incoming;
    for (const op of ops) {
      this.connect(frontier, op.id);
      frontier = this.operation(op);
    }
    return frontier;
  }

  private operation(op: Operation): PendingEdge[] {
    switch (op.kind) {
      case "terminate":
        this.edge(op.id, this.exit, op.reason === "revert" ? "revert" : "return");
        return [];
      case "guard":
        this.edge(op.id, this.exit, "revert");
        return [{ from: op.id, kind: "sequential" }];
      case "branch": {
        if (op.arms.length === 0) return [{ from: op.id, kind: "sequential" }];
        const frontier: PendingEdge[] = [];
        for (const arm of op.arms) {
          frontier.push(...this.sequence(arm, [{ from: op.id, kind: "branch" }]));
        }
        return frontier;
      }
      case "loop": {
        const bodyEnd = this.sequence(op.body, [{ from: op.id, kind: "loop-body" }]);
        for (const p of bodyEnd) this.edge(p.from, op.id, "loop-back");
        return [{ from: op.id, kind: "loop-exit" }];
      }
      default:
        return [{ from: op.id, kind: "sequential" }];
    }
  }

  result(): ControlFlowEdge[] {
    return this.edges;
  }
}

export function buildControlFlow(operations: readonly Operation[]): ControlFlowGraph {
  const ids = flattenOperations(operations).map((op) => op.id);
  const exit = ids.reduce((max, id) => Math.max(max, id), 0) + 1;
  const builder = new GraphBuilder(exit);

  const frontier = builder.sequence(operations, [{ from: 0, kind: "sequential" }]);
  builder.connect(frontier, exit);

  return {
    entry: 0,
    exit,
    nodes: [0, ...ids.sort((a, b) => a - b), exit],
    edges: builder.result(),
  };
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Nodes reachable from `start` along at least one edge. `start` itself is
 * included only when it lies on a cycle.
 */
export function reachableFrom(graph: ControlFlowGraph, start: number): Set<number> {
  const successors = new Map<number, number[]>();
  for (const { from, to } of graph.edges) {
    const list = successors.get(from) ?? [];
    list.push(to);
    successors.set(from, list);
  }

  const visited = new Set<number>();
  const queue = [...(successors.get(start) ?? [])];
  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined || visited.has(node)) continue;
    visited.add(node);
    queue.push(...(successors.get(node) ?? []));
  }
  return visited;
}

/** McCabe complexity, E - N + 2, over the graph's nodes and edges. */
export function cyclomaticComplexity(graph: ControlFlowGraph): number {
  return Math.max(1, graph.edges.length - graph.nodes.length + 2);
}
