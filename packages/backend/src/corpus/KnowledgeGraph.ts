import type { GraphEdge, GraphNode } from "@finhop/shared";
import { contentTerms } from "../utils/text.js";

export interface AdjacentEdge {
  edge: GraphEdge;
  direction: "outgoing" | "incoming";
  neighbor: GraphNode;
}

export interface AnchorMatch {
  node: GraphNode;
  /** Share of the best-matching name's terms found in the query, in (0, 1]. */
  overlap: number;
  matchedTerms: string[];
}

export interface AnchorSearchOptions {
  minOverlap: number;
  limit: number;
}

export interface SimplePathOptions {
  maxHops: number;
  limit: number;
}

/**
 * Directed, possibly cyclic entity graph. Duplicate edges and self-loops are
 * kept; edges whose endpoints are missing are dropped at construction.
 */
export class KnowledgeGraph {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly outgoing = new Map<string, GraphEdge[]>();
  private readonly incoming = new Map<string, GraphEdge[]>();
  private readonly nameTerms = new Map<string, string[][]>();
  private readonly edgeList: GraphEdge[] = [];
  readonly danglingEdgeCount: number;

  constructor(nodes: GraphNode[], edges: GraphEdge[]) {
    for (const node of nodes) {
      this.nodes.set(node.id, node);
      this.nameTerms.set(
        node.id,
        [node.label, ...node.aliases]
          .map((name) => Array.from(new Set(contentTerms(name))))
          .filter((terms) => terms.length > 0)
      );
    }

    let dangling = 0;
    for (const edge of edges) {
      if (!this.nodes.has(edge.sourceId) || !this.nodes.has(edge.targetId)) {
        dangling += 1;
        continue;
      }
      this.edgeList.push(edge);
      appendTo(this.outgoing, edge.sourceId, edge);
      appendTo(this.incoming, edge.targetId, edge);
    }
    this.danglingEdgeCount = dangling;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  getNode(id: string): GraphNode | null {
    return this.nodes.get(id) ?? null;
  }

  /** Outgoing edges first, then incoming, each in insertion order. */
  neighbors(nodeId: string): AdjacentEdge[] {
    const adjacent: AdjacentEdge[] = [];
    for (const edge of this.outgoing.get(nodeId) ?? []) {
      const neighbor = this.nodes.get(edge.targetId);
      if (neighbor) {
        adjacent.push({ edge, direction: "outgoing", neighbor });
      }
    }
    for (const edge of this.incoming.get(nodeId) ?? []) {
      const neighbor = this.nodes.get(edge.sourceId);
      if (neighbor) {
        adjacent.push({ edge, direction: "incoming", neighbor });
      }
    }
    return adjacent;
  }

  /**
   * Nodes whose label or one of its aliases lexically matches the query. Ties
   * on overlap go to more matched terms, then PageRank, then mention frequency.
   */
  findAnchors(query: string, options: AnchorSearchOptions): AnchorMatch[] {
    const queryTerms = new Set(contentTerms(query));
    if (queryTerms.size === 0) {
      return [];
    }

    const matches: AnchorMatch[] = [];
    for (const node of this.nodes.values()) {
      let best: AnchorMatch | null = null;
      for (const terms of this.nameTerms.get(node.id) ?? []) {
        const matchedTerms = terms.filter((term) => queryTerms.has(term));
        const overlap = matchedTerms.length / terms.length;
        if (
          !best ||
          overlap > best.overlap ||
          (overlap === best.overlap && matchedTerms.length > best.matchedTerms.length)
        ) {
          best = { node, overlap, matchedTerms };
        }
      }
      if (best && best.overlap >= options.minOverlap) {
        matches.push(best);
      }
    }

    return matches
      .sort(
        (a, b) =>
          b.overlap - a.overlap ||
          b.matchedTerms.length - a.matchedTerms.length ||
          (b.node.pagerank ?? 0) - (a.node.pagerank ?? 0) ||
          (b.node.frequency ?? 0) - (a.node.frequency ?? 0) ||
          a.node.label.localeCompare(b.node.label)
      )
      .slice(0, Math.max(0, options.limit));
  }

  /** Directed simple paths from `sourceId` to `targetId`, as node id sequences. */
  simplePaths(sourceId: string, targetId: string, options: SimplePathOptions): string[][] {
    if (!this.nodes.has(sourceId) || !this.nodes.has(targetId) || sourceId === targetId) {
      return [];
    }

    const paths: string[][] = [];
    const stack: string[] = [sourceId];
    const onPath = new Set<string>([sourceId]);

    const walk = (nodeId: string): void => {
      if (paths.length >= options.limit || stack.length > options.maxHops) {
        return;
      }
      for (const edge of this.outgoing.get(nodeId) ?? []) {
        if (paths.length >= options.limit) {
          return;
        }
        const next = edge.targetId;
        if (onPath.has(next)) {
          continue;
        }
        if (next === targetId) {
          paths.push([...stack, next]);
          continue;
        }
        stack.push(next);
        onPath.add(next);
        walk(next);
        stack.pop();
        onPath.delete(next);
      }
    };

    walk(sourceId);
    return paths;
  }

  averageDegree(): number {
    if (this.nodes.size === 0) {
      return 0;
    }
    return (2 * this.edgeList.length) / this.nodes.size;
  }

  /** True when ignoring edge direction every node reaches every other. */
  isWeaklyConnected(): boolean {
    const first = this.nodes.keys().next();
    if (first.done) {
      return false;
    }

    const seen = new Set<string>([first.value]);
    const queue: string[] = [first.value];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      for (const { neighbor } of this.neighbors(current)) {
        if (!seen.has(neighbor.id)) {
          seen.add(neighbor.id);
          queue.push(neighbor.id);
        }
      }
    }
    return seen.size === this.nodes.size;
  }
}

function appendTo(index: Map<string, GraphEdge[]>, key: string, edge: GraphEdge): void {
  const list = index.get(key);
  if (list) {
    list.push(edge);
  } else {
    index.set(key, [edge]);
  }
}
