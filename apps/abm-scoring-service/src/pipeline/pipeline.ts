import { Node, NodeData } from "./node";
import { ErrorContext, ValidationError, describeError } from "../utils/errors";

// ============================================================================
// TYPES
// ============================================================================

/** Routes one node's output into another node's input */
export interface Connection {
  sourceNode: string;
  sourceOutput: string;
  targetNode: string;
  targetInput: string;
}

export type PipelineStatus = "success" | "partial_success" | "error";

export interface NodeFailure {
  node: string;
  error_type: string;
  message: string;
  timestamp: string;
}

export interface PipelineRun {
  status: PipelineStatus;
  /** Output of every node that completed, keyed by node id */
  outputs: Record<string, NodeData>;
  errors: NodeFailure[];
  order: string[];
  duration_ms: number;
}

// ============================================================================
// GRAPH HELPERS
// ============================================================================

/**
 * Order node ids so every connection's source runs before its target.
 * Kahn's algorithm; among ready nodes, registration order wins.
 */
export function topologicalOrder(nodeIds: readonly string[], connections: readonly Connection[]): string[] {
  const indegree = new Map<string, number>(nodeIds.map(id => [id, 0]));
  const edges = new Map<string, Set<string>>(nodeIds.map(id => [id, new Set<string>()]));

  for (const conn of connections) {
    const targets = edges.get(conn.sourceNode);
    if (!targets || targets.has(conn.targetNode)) continue;
    targets.add(conn.targetNode);
    indegree.set(conn.targetNode, (indegree.get(conn.targetNode) ?? 0) + 1);
  }

  const order: string[] = [];
  const done = new Set<string>();

  while (order.length < nodeIds.length) {
    const next = nodeIds.find(id => !done.has(id) && indegree.get(id) === 0);
    if (next === undefined) {
      const blocked = nodeIds.filter(id => !done.has(id));
      throw new ValidationError(`Connection graph has a cycle between: ${blocked.join(", ")}`, {
        nodes: blocked,
      });
    }

    done.add(next);
    order.push(next);
    for (const target of edges.get(next) ?? []) {
      indegree.set(target, (indegree.get(target) ?? 0) - 1);
    }
  }

  return order;
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * A directed graph of nodes executed once per trigger payload.
 * Connections are checked and ordered at construction; a bad graph never runs.
 */
export class Pipeline {
  readonly name: string;
  readonly description: string;
  readonly nodes: ReadonlyMap<string, Node>;
  readonly connections: readonly Connection[];
  readonly executionOrder: readonly string[];

  constructor(name: string, description: string, nodes: Record<string, Node>, connections: Connection[]) {
    this.name = name;
    this.description = description;
    this.nodes = new Map(Object.entries(nodes));
    this.connections = Object.freeze(connections.map(c => Object.freeze({ ...c })));

    this.validateConnections();
    this.executionOrder = Object.freeze(topologicalOrder([...this.nodes.keys()], this.connections));
  }

  /**
   * Run every node once, in dependency order.
   * A failing node is logged and recorded; the rest still run.
   */
  async execute(payload: NodeData, context: ErrorContext = {}): Promise<PipelineRun> {
    const startTime = Date.now();
    const outputs: Record<string, NodeData> = {};
    const errors: NodeFailure[] = [];

    for (const nodeId of this.executionOrder) {
      const node = this.nodes.get(nodeId);
      if (!node) continue;

      const inputs = this.collectInputs(nodeId, outputs, payload);

      try {
        node.validateInput(inputs);
        outputs[nodeId] = await node.run(inputs);
      } catch (error) {
        const report = describeError(error, { ...context, pipeline: this.name, node: nodeId });
        console.error(`[pipeline] Node '${nodeId}' failed: ${report.message}`, report.context);
        errors.push({
          node: nodeId,
          error_type: report.error_type,
          message: report.message,
          timestamp: report.context.timestamp,
        });
      }
    }

    let status: PipelineStatus = "success";
    if (errors.length > 0) {
      status = errors.length === this.executionOrder.length ? "error" : "partial_success";
    }

    return {
      status,
      outputs,
      errors,
      order: [...this.executionOrder],
      duration_ms: Date.now() - startTime,
    };
  }

  describe() {
    const nodes: Record<string, ReturnType<Node["describe"]>> = {};
    for (const [id, node] of this.nodes) {
      nodes[id] = node.describe();
    }
    return {
      name: this.name,
      description: this.description,
      nodes,
      connections: this.connections,
      execution_order: this.executionOrder,
    };
  }

  private validateConnections(): void {
    for (const conn of this.connections) {
      if (!this.nodes.has(conn.sourceNode)) {
        throw new ValidationError(`Source node '${conn.sourceNode}' not found`, { connection: conn });
      }
      if (!this.nodes.has(conn.targetNode)) {
        throw new ValidationError(`Target node '${conn.targetNode}' not found`, { connection: conn });
      }
    }
  }

  /**
   * Raw payload for entry nodes, then whatever upstream outputs are available
   */
  private collectInputs(nodeId: string, outputs: Record<string, NodeData>, payload: NodeData): NodeData {
    const incoming = this.connections.filter(c => c.targetNode === nodeId);
    const inputs: NodeData = incoming.length === 0 ? { ...payload } : {};

    for (const conn of incoming) {
      const upstream = outputs[conn.sourceNode];
      if (upstream && conn.sourceOutput in upstream) {
        inputs[conn.targetInput] = upstream[conn.sourceOutput];
      }
    }

    return inputs;
  }
}
