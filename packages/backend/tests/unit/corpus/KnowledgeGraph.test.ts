import { describe, expect, it } from "vitest";
import { KnowledgeGraph } from "../../../src/corpus/KnowledgeGraph.js";
import { edge, financeCorpus, node } from "../../helpers/corpusFixtures.js";

function financeGraph(): KnowledgeGraph {
  const data = financeCorpus();
  return new KnowledgeGraph(data.nodes, data.edges);
}

describe("KnowledgeGraph", () => {
  it("drops edges whose endpoints are missing and keeps self-loops", () => {
    const graph = new KnowledgeGraph(
      [node("a", "Alpha"), node("b", "Beta")],
      [edge("ab", "a", "b", "owns", 0.9), edge("aa", "a", "a", "restates", 1), edge("ghost", "a", "missing", "owns", 1)]
    );

    expect(graph.nodeCount).toBe(2);
    expect(graph.edgeCount).toBe(2);
    expect(graph.danglingEdgeCount).toBe(1);
    expect(graph.averageDegree()).toBe(2);
  });

  it("lists outgoing neighbors before incoming ones", () => {
    const neighbors = financeGraph().neighbors("x");

    expect(neighbors.map(({ edge: e, direction, neighbor }) => [e.id, direction, neighbor.id])).toEqual([
      ["e1", "outgoing", "s"],
      ["e3", "incoming", "z"]
    ]);
  });

  it("finds anchors by label or alias overlap", () => {
    const anchors = financeGraph().findAnchors("How does X Corp relate to Index Y?", { minOverlap: 0.6, limit: 5 });

    expect(anchors.map((anchor) => [anchor.node.id, anchor.overlap, anchor.matchedTerms])).toEqual([
      ["x", 1, ["x", "corp"]],
      ["y", 1, ["index", "y"]]
    ]);
  });

  it("ignores partial matches under the overlap floor", () => {
    const anchors = financeGraph().findAnchors("Which index moved most?", { minOverlap: 0.6, limit: 5 });

    expect(anchors).toEqual([]);
  });

  it("breaks overlap ties by matched terms, then pagerank", () => {
    const graph = new KnowledgeGraph(
      [
        { ...node("p", "Pine Capital"), pagerank: 0.1 },
        { ...node("q", "Pine Capital Holdings"), pagerank: 0.2 },
        { ...node("r", "Capital"), pagerank: 0.9 },
        { ...node("t", "Capital Pine"), pagerank: 0.5 }
      ],
      []
    );

    const anchors = graph.findAnchors("pine capital holdings", { minOverlap: 0.6, limit: 3 });

    expect(anchors.map((anchor) => anchor.node.id)).toEqual(["q", "t", "p"]);
  });

  it("returns no anchors for a query made only of stopwords", () => {
    expect(financeGraph().findAnchors("what is it?", { minOverlap: 0.6, limit: 5 })).toEqual([]);
  });

  it("enumerates directed simple paths up to a hop limit", () => {
    const graph = financeGraph();

    expect(graph.simplePaths("x", "y", { maxHops: 3, limit: 10 })).toEqual([["x", "s", "y"]]);
    expect(graph.simplePaths("x", "y", { maxHops: 1, limit: 10 })).toEqual([]);
    expect(graph.simplePaths("y", "x", { maxHops: 3, limit: 10 })).toEqual([]);
    expect(graph.simplePaths("x", "x", { maxHops: 3, limit: 10 })).toEqual([]);
  });

  it("reports weak connectivity ignoring edge direction", () => {
    expect(financeGraph().isWeaklyConnected()).toBe(true);
    expect(new KnowledgeGraph([node("a", "Alpha"), node("b", "Beta")], []).isWeaklyConnected()).toBe(false);
    expect(new KnowledgeGraph([], []).isWeaklyConnected()).toBe(false);
  });
});
