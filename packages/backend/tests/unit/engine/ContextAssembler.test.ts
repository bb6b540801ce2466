import type { ChunkEvidence, NodeEvidence } from "@finhop/shared";
import { describe, expect, it } from "vitest";
import { ContextAssembler } from "../../../src/engine/ContextAssembler.js";
import { MultiHopTraverser } from "../../../src/engine/MultiHopTraverser.js";
import { fixtureView, node } from "../../helpers/corpusFixtures.js";

const config = { dedupEmbeddingThreshold: 0.95, dedupLexicalThreshold: 0.8 };

function chunkEvidence(id: string, similarity: number, text: string, timestamp = "2024-01-01T00:00:00Z"): ChunkEvidence {
  return {
    kind: "chunk",
    id: `chunk:${id}`,
    chunkId: id,
    similarity,
    text,
    origin: `${id}.pdf`,
    timestamp: new Date(timestamp)
  };
}

function nodeEvidence(id: string, label: string, score: number): NodeEvidence {
  return { kind: "node", id: `node:${id}`, node: node(id, label, "company"), score, matchedTerms: [] };
}

describe("ContextAssembler", () => {
  it("keeps one of two near-duplicate chunks", () => {
    const embeddings = new Map([
      ["a", [0.9, 0.1, 0, 0]],
      ["b", [0.89, 0.12, 0, 0]]
    ]);
    const assembler = new ContextAssembler(config, (id) => embeddings.get(id));

    const context = assembler.assemble(
      [
        chunkEvidence("b", 0.93, "Company X raised its dividend by 5 percent in March."),
        chunkEvidence("a", 0.95, "Company X raised its dividend by 5 percent in March.")
      ],
      [],
      1000
    );

    expect(context.entries.map((entry) => entry.evidence.id)).toEqual(["chunk:a"]);
    expect(context.droppedDuplicateIds).toEqual(["chunk:b"]);
  });

  it("drops lexical near-duplicates even without embeddings", () => {
    const assembler = new ContextAssembler(config);

    const context = assembler.assemble(
      [
        chunkEvidence("a", 0.9, "Index Y rebalanced its technology sector weights in June."),
        chunkEvidence("b", 0.8, "In June, Index Y rebalanced its technology sector weights.")
      ],
      [],
      1000
    );

    expect(context.entries).toHaveLength(1);
    expect(context.droppedDuplicateIds).toEqual(["chunk:b"]);
  });

  it("drops a chunk whose content a graph path already carries", () => {
    const view = fixtureView();
    const [path] = new MultiHopTraverser(view.graph, {
      minEdgeConfidence: 0.5,
      maxPaths: 1,
      beamWidth: 8,
      pathAggregation: "product"
    }).traverse(["x"], 1);
    expect(path?.id).toBe("path:x/e1");
    const assembler = new ContextAssembler(config);

    const context = assembler.assemble(
      [chunkEvidence("restated", 0.5, "Company X operates in Sector S.")],
      path ? [path] : [],
      1000
    );

    expect(context.entries.map((entry) => entry.text)).toEqual(["Company X --[operates_in]--> Sector S"]);
    expect(context.droppedDuplicateIds).toEqual(["chunk:restated"]);
  });

  it("includes everything when the evidence fits the budget", () => {
    const assembler = new ContextAssembler(config);
    const retrieved = [
      chunkEvidence("a", 0.9, "Bank A reported a net interest margin of 3.1 percent."),
      chunkEvidence("b", 0.7, "Fund B cut its exposure to emerging market debt."),
      nodeEvidence("c", "Company C", 0.6)
    ];

    const context = assembler.assemble(retrieved, [], 500);

    expect(context.entries.map((entry) => entry.evidence.id)).toEqual(["chunk:a", "chunk:b", "node:c"]);
    expect(context.entries.every((entry) => !entry.truncated)).toBe(true);
    expect(context.usedChars).toBe(context.entries.reduce((total, entry) => total + entry.text.length, 0));
    expect(context.droppedOverBudgetIds).toEqual([]);
  });

  it("never exceeds the budget and skips items that do not fit", () => {
    const assembler = new ContextAssembler(config);
    const first = "Bank A reported a net interest margin of 3.1 percent.";
    const second = "Fund B cut its exposure to emerging market debt.";
    const third = "Company C [company]";

    const context = assembler.assemble(
      [chunkEvidence("a", 0.9, first), chunkEvidence("b", 0.7, second), nodeEvidence("c", "Company C", 0.6)],
      [],
      first.length + third.length
    );

    expect(context.entries.map((entry) => entry.evidence.id)).toEqual(["chunk:a", "node:c"]);
    expect(context.droppedOverBudgetIds).toEqual(["chunk:b"]);
    expect(context.usedChars).toBe(first.length + third.length);
    expect(context.usedChars).toBeLessThanOrEqual(context.budgetChars);
  });

  it("truncates the top item when it alone exceeds the budget", () => {
    const assembler = new ContextAssembler(config);

    const context = assembler.assemble(
      [chunkEvidence("a", 0.9, "Bank A reported a net interest margin of 3.1 percent.")],
      [],
      10
    );

    expect(context.entries).toHaveLength(1);
    expect(context.entries[0]).toMatchObject({ text: "Bank A rep", truncated: true });
    expect(context.usedChars).toBe(10);
  });

  it("returns an empty context for empty evidence", () => {
    const context = new ContextAssembler(config).assemble([], [], 100);

    expect(context).toEqual({
      entries: [],
      budgetChars: 100,
      usedChars: 0,
      droppedDuplicateIds: [],
      droppedOverBudgetIds: []
    });
  });
});
