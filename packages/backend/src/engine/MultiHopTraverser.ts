import type { EngineConfig, GraphNode, PathAggregation, PathEvidence, PathHop } from "@finhop/shared";
import type { KnowledgeGraph } from "../corpus/KnowledgeGraph.js";
import { pathEvidenceId } from "./evidence.js";

type TraverserConfig = Pick<EngineConfig, "minEdgeConfidence" | "maxPaths" | "beamWidth" | "pathAggregation">;

interface PartialPath {
  start: GraphNode;
  hops: PathHop[];
  visited: Set<string>;
  confidence: number;
}

/** Both aggregations stay in [0, 1] and never increase as hops are added. */
export function aggregateConfidence(aggregation: PathAggregation, current: number, weight: number): number {
  return aggregation === "min" ? Math.min(current, weight) : current * weight;
}

function lastNode(path: PartialPath): GraphNode {
  return path.hops.length > 0 ? path.hops[path.hops.length - 1].node : path.start;
}

function outgoingCount(hops: PathHop[]): number {
  return hops.filter((hop) => hop.direction === "outgoing").length;
}

/** Same key for a path and its reversal, so X->S->Y and Y<-S<-X collapse. */
function canonicalKey(path: PartialPath): string {
  const edgeIds = path.hops.map((hop) => hop.edge.id);
  const forward = `${path.start.id}|${edgeIds.join(",")}`;
  const backward = `${lastNode(path).id}|${[...edgeIds].reverse().join(",")}`;
  return forward < backward ? forward : backward;
}

function comparePaths(a: PathEvidence, b: PathEvidence): number {
  return (
    b.confidence - a.confidence ||
    Number(b.connectsAnchors) - Number(a.connectsAnchors) ||
    a.hops.length - b.hops.length ||
    a.id.localeCompare(b.id)
  );
}

/**
 * Breadth-first expansion from the query anchors along edges in either
 * direction. A path never revisits its own nodes; different paths may share
 * nodes. Each level keeps the strongest `max(beamWidth, maxPaths)` partial
 * paths; confidence never rises along a path, so a pruned branch cannot beat
 * the paths already recorded and only the final cap drops in-bound paths.
 */
export class MultiHopTraverser {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly config: TraverserConfig
  ) {}

  traverse(seedIds: Iterable<string>, maxDepth: number): PathEvidence[] {
    const seeds = new Map<string, GraphNode>();
    for (const id of seedIds) {
      const node = this.graph.getNode(id);
      if (node) {
        seeds.set(id, node);
      }
    }
    if (seeds.size === 0 || maxDepth <= 0) {
      return [];
    }

    const found = new Map<string, PathEvidence>();
    const width = Math.max(this.config.beamWidth, this.config.maxPaths);
    let frontier: PartialPath[] = Array.from(seeds.values()).map((node) => ({
      start: node,
      hops: [],
      visited: new Set([node.id]),
      confidence: 1
    }));

    for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth += 1) {
      const next: PartialPath[] = [];

      for (const path of frontier) {
        for (const { edge, direction, neighbor } of this.graph.neighbors(lastNode(path).id)) {
          if (edge.weight < this.config.minEdgeConfidence || path.visited.has(neighbor.id)) {
            continue;
          }
          const extended: PartialPath = {
            start: path.start,
            hops: [...path.hops, { edge, direction, node: neighbor }],
            visited: new Set(path.visited).add(neighbor.id),
            confidence: aggregateConfidence(this.config.pathAggregation, path.confidence, edge.weight)
          };
          next.push(extended);
          this.record(found, extended, seeds);
        }
      }

      frontier = next
        .sort((a, b) => b.confidence - a.confidence || a.hops.length - b.hops.length)
        .slice(0, width);
    }

    return Array.from(found.values()).sort(comparePaths).slice(0, this.config.maxPaths);
  }

  private record(found: Map<string, PathEvidence>, path: PartialPath, seeds: Map<string, GraphNode>): void {
    const end = lastNode(path);
    const evidence: PathEvidence = {
      kind: "path",
      id: pathEvidenceId(
        path.start.id,
        path.hops.map((hop) => hop.edge.id)
      ),
      start: path.start,
      hops: path.hops,
      confidence: path.confidence,
      connectsAnchors: end.id !== path.start.id && seeds.has(end.id)
    };

    const key = canonicalKey(path);
    const existing = found.get(key);
    if (!existing) {
      found.set(key, evidence);
      return;
    }

    // Keep the orientation that reads along edge direction.
    const preferNew =
      outgoingCount(evidence.hops) > outgoingCount(existing.hops) ||
      (outgoingCount(evidence.hops) === outgoingCount(existing.hops) && evidence.id < existing.id);
    if (preferNew) {
      found.set(key, evidence);
    }
  }
}
