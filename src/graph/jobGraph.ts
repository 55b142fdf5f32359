/**
 * @fileoverview Directed trigger graph keyed by job name.
 *
 * A simple digraph (no parallel edges) that remembers node insertion
 * order. It is not required to be acyclic: the scheduler's trigger data
 * may contain cycles, which only the layout engine rejects.
 *
 * @module graph/jobGraph
 */

/**
 * A directed edge `source → target` (source triggers target).
 */
export interface JobEdge {
  readonly source: string;
  readonly target: string;
}

/**
 * Node-link serialization: explicit node list plus explicit edge list.
 * Field names follow the common node-link JSON layout so persisted
 * snapshots stay legible and diff-able.
 */
export interface NodeLinkGraph {
  directed: true;
  multigraph: false;
  nodes: Array<{ id: string }>;
  links: Array<{ source: string; target: string }>;
}

export class JobGraph {
  private readonly successorSets = new Map<string, Set<string>>();
  private readonly predecessorSets = new Map<string, Set<string>>();
  private edgeTotal = 0;

  /**
   * Add a node. Adding an existing node is a no-op.
   */
  addNode(name: string): void {
    if (this.successorSets.has(name)) return;
    this.successorSets.set(name, new Set());
    this.predecessorSets.set(name, new Set());
  }

  /**
   * Add edge `source → target`, creating either endpoint if missing.
   * Adding an existing edge is a no-op.
   */
  addEdge(source: string, target: string): void {
    this.addNode(source);
    this.addNode(target);
    const successors = this.successorsOf(source);
    if (successors.has(target)) return;
    successors.add(target);
    this.predecessorsOf(target).add(source);
    this.edgeTotal++;
  }

  hasNode(name: string): boolean {
    return this.successorSets.has(name);
  }

  hasEdge(source: string, target: string): boolean {
    return this.successorSets.get(source)?.has(target) ?? false;
  }

  /** Node names in insertion order. */
  nodes(): string[] {
    return [...this.successorSets.keys()];
  }

  /** Edges grouped by source, in node insertion order. */
  edges(): JobEdge[] {
    const result: JobEdge[] = [];
    for (const [source, targets] of this.successorSets) {
      for (const target of targets) {
        result.push({ source, target });
      }
    }
    return result;
  }

  /** Names of nodes with an edge into `name`. Unknown names have none. */
  predecessors(name: string): string[] {
    return [...(this.predecessorSets.get(name) ?? [])];
  }

  /** Names of nodes `name` triggers. Unknown names have none. */
  successors(name: string): string[] {
    return [...(this.successorSets.get(name) ?? [])];
  }

  get nodeCount(): number {
    return this.successorSets.size;
  }

  get edgeCount(): number {
    return this.edgeTotal;
  }

  toNodeLink(): NodeLinkGraph {
    return {
      directed: true,
      multigraph: false,
      nodes: this.nodes().map(id => ({ id })),
      links: this.edges().map(({ source, target }) => ({ source, target })),
    };
  }

  /**
   * Rebuild a graph from node-link form. Links may name nodes missing
   * from the node list; those nodes are created.
   */
  static fromNodeLink(data: NodeLinkGraph): JobGraph {
    const graph = new JobGraph();
    for (const node of data.nodes) {
      graph.addNode(node.id);
    }
    for (const link of data.links) {
      graph.addEdge(link.source, link.target);
    }
    return graph;
  }

  private successorsOf(name: string): Set<string> {
    let set = this.successorSets.get(name);
    if (!set) {
      set = new Set();
      this.successorSets.set(name, set);
    }
    return set;
  }

  private predecessorsOf(name: string): Set<string> {
    let set = this.predecessorSets.get(name);
    if (!set) {
      set = new Set();
      this.predecessorSets.set(name, set);
    }
    return set;
  }
}
