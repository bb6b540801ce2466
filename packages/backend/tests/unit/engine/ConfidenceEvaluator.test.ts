import type { ContextEntry, PathEvidence, ReasoningContext } from "@finhop/shared";
import { describe, expect, it } from "vitest";
import { ConfidenceEvaluator, answerMetrics, tierFor } from "../../../src/engine/ConfidenceEvaluator.js";
import { edge, node } from "../../helpers/corpusFixtures.js";

const confidenceConfig = {
  weights: { grounding: 0.5, length: 0.2, evidence: 0.3 },
  expectedWords: { min: 30, max: 350 }
};

function contextOf(entries: ContextEntry[]): ReasoningContext {
  return {
    entries,
    budgetChars: 6000,
    usedChars: entries.reduce((total, entry) => total + entry.text.length, 0),
    droppedDuplicateIds: [],
    droppedOverBudgetIds: []
  };
}

const revenueChunk: ContextEntry = {
  evidence: {
    kind: "chunk",
    id: "chunk:c1",
    chunkId: "c1",
    similarity: 0.9,
    text: "Company X reported revenue growth of 12 percent in 2023.",
    origin: "report.pdf",
    timestamp: new Date("2024-03-01T00:00:00Z")
  },
  text: "Company X reported revenue growth of 12 percent in 2023.",
  truncated: false
};

function pathEntry(confidence: number): ContextEntry {
  const path: PathEvidence = {
    kind: "path",
    id: "path:x/e1",
    start: node("x", "Company X"),
    hops: [{ edge: edge("e1", "x", "s", "operates_in", confidence), direction: "outgoing", node: node("s", "Sector S") }],
    confidence,
    connectsAnchors: false
  };
  return { evidence: path, text: "Company X --[operates_in]--> Sector S", truncated: false };
}

describe("ConfidenceEvaluator", () => {
  const evaluator = new ConfidenceEvaluator(confidenceConfig);

  it("scores a grounded short answer", () => {
    const result = evaluator.evaluate("Company X reported revenue growth of 12 percent.", contextOf([revenueChunk]));

    expect(result.breakdown).toEqual({ grounding: 1, length: 0.2667, evidence: 0.9 });
    expect(result.score).toBeCloseTo(0.8233, 4);
    expect(result.tier).toBe("High");
  });

  it("uses path confidence for the evidence component when paths are present", () => {
    const result = evaluator.evaluate("Company X operates in Sector S.", contextOf([revenueChunk, pathEntry(0.6)]));

    expect(result.breakdown.evidence).toBe(0.6);
    expect(result.breakdown.grounding).toBe(1);
  });

  it("keeps an answer without evidence below High", () => {
    const longAnswer = Array.from({ length: 100 }, (_, index) => `word${index}`).join(" ");

    const result = evaluator.evaluate(longAnswer, contextOf([]));

    expect(result.breakdown).toEqual({ grounding: 0, length: 1, evidence: 0 });
    expect(result.score).toBeCloseTo(0.2, 10);
    expect(result.tier).toBe("Medium");
  });

  it("penalizes unbounded answers", () => {
    const veryLong = Array.from({ length: 700 }, () => "revenue").join(" ");

    const result = evaluator.evaluate(veryLong, contextOf([revenueChunk]));

    expect(result.breakdown.length).toBe(0.5);
    expect(result.breakdown.grounding).toBe(1);
  });

  it("gives zero length credit to an empty answer", () => {
    const result = evaluator.evaluate("   ", contextOf([revenueChunk]));

    expect(result.breakdown.length).toBe(0);
    expect(result.breakdown.grounding).toBe(0);
  });

  it("is deterministic and ties the tier to the 0.5 threshold", () => {
    const context = contextOf([revenueChunk, pathEntry(0.45)]);
    const answer = "Company X operates in Sector S and grew revenue.";

    const first = evaluator.evaluate(answer, context);
    const second = evaluator.evaluate(answer, context);

    expect(second).toEqual(first);
    expect(first.tier === "High").toBe(first.score >= 0.5);
    expect(tierFor(0.5)).toBe("High");
    expect(tierFor(0.4999)).toBe("Medium");
  });
});

describe("answerMetrics", () => {
  it("reports length, numbers and source attributions", () => {
    expect(answerMetrics("According to the filing, revenue rose 12 percent.")).toEqual({
      answerLength: 8,
      hasNumbers: true,
      hasSources: true
    });
    expect(answerMetrics("No figures here")).toEqual({
      answerLength: 3,
      hasNumbers: false,
      hasSources: false
    });
  });
});
