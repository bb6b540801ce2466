import { describe, expect, it } from "vitest";
import { IntentClassifier } from "../../../src/engine/IntentClassifier.js";

describe("IntentClassifier", () => {
  const classifier = new IntentClassifier();

  it("routes relational and comparative questions to multi-hop reasoning", () => {
    expect(classifier.classify("What is Company X's relationship to Market Index Y?")).toBe("multi_hop_reasoning");
    expect(classifier.classify("Compare the margins of Bank A versus Bank B")).toBe("multi_hop_reasoning");
    expect(classifier.classify("Did Fund F return more than the benchmark?")).toBe("multi_hop_reasoning");
    expect(classifier.classify("Which suppliers affect Company X earnings?")).toBe("multi_hop_reasoning");
  });

  it("routes why/how and definition questions to explanatory queries", () => {
    expect(classifier.classify("Why did the yield curve invert?")).toBe("explanatory_query");
    expect(classifier.classify("Explain the term duration risk")).toBe("explanatory_query");
    expect(classifier.classify("What does EBITDA mean?")).toBe("explanatory_query");
  });

  it("defaults to factual queries when no cue matches", () => {
    expect(classifier.classify("What was Company X revenue in 2023?")).toBe("factual_query");
    expect(classifier.classify("")).toBe("factual_query");
  });

  it("prefers the stronger cue and breaks ties by table order", () => {
    // explanatory opener (2) + causal cue (2): tie goes to multi-hop, listed first
    expect(classifier.classify("How do interest rates affect bank stocks?")).toBe("multi_hop_reasoning");
    // explanatory opener (2) beats a lone "through" (1)
    expect(classifier.classify("How is the dividend paid through the trust?")).toBe("explanatory_query");
  });

  it("resolves traversal depth per intent", () => {
    expect(classifier.strategyFor("multi_hop_reasoning").resolveDepth(1)).toBe(2);
    expect(classifier.strategyFor("multi_hop_reasoning").resolveDepth(3)).toBe(3);
    expect(classifier.strategyFor("explanatory_query").resolveDepth(3)).toBe(1);
    expect(classifier.strategyFor("factual_query").resolveDepth(2)).toBe(2);
  });

  it("accepts a custom strategy table", () => {
    const custom = new IntentClassifier([
      { intent: "explanatory_query", cues: [{ pattern: /\bguide\b/i, weight: 1 }], resolveDepth: () => 0 }
    ]);
    expect(custom.classify("a guide to bonds")).toBe("explanatory_query");
    expect(custom.classify("bond prices")).toBe("factual_query");
    expect(custom.strategyFor("factual_query").resolveDepth(4)).toBe(4);
  });
});
