import { describe, expect, it } from "vitest";
import { appConfig, loadAppConfig } from "../../../src/config.js";
import {
  engineConfigFromEnv,
  parseEngineConfig,
  resolveEngineConfig
} from "../../../src/engine/engineConfig.js";
import { ConfigurationError } from "../../../src/errors.js";

const defaults = engineConfigFromEnv({
  ...appConfig,
  RETRIEVAL_TOP_K: 5,
  SIMILARITY_THRESHOLD: 0.25,
  MAX_TRAVERSAL_DEPTH: 2,
  MIN_EDGE_CONFIDENCE: 0.5,
  MAX_PATHS: 12,
  MAX_ANCHORS: 5,
  CONTEXT_BUDGET_CHARS: 6000,
  HISTORY_TURNS: 3
});

function issuesOf(run: () => unknown): Array<{ path: string; message: string }> {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("engine configuration", () => {
  it("builds the defaults from the environment", () => {
    expect(defaults).toMatchObject({
      topK: 5,
      maxDepth: 2,
      minEdgeConfidence: 0.5,
      anchorMinOverlap: 0.6,
      pathAggregation: "product",
      confidence: {
        weights: { grounding: 0.5, length: 0.2, evidence: 0.3 },
        expectedWords: { min: 30, max: 350 }
      }
    });
  });

  it("reports an invalid environment value by field", () => {
    const issues = issuesOf(() => engineConfigFromEnv({ ...appConfig, RETRIEVAL_TOP_K: 0 }));

    expect(issues.map((issue) => issue.path)).toEqual(["topK"]);
  });

  it("requires the confidence weights to sum to 1", () => {
    const issues = issuesOf(() =>
      parseEngineConfig({
        ...defaults,
        confidence: { ...defaults.confidence, weights: { grounding: 0.5, length: 0.2, evidence: 0.2 } }
      })
    );

    expect(issues).toEqual([{ path: "confidence.weights", message: "confidence weights must sum to 1" }]);
  });

  it("keeps the length weight below the High threshold", () => {
    const issues = issuesOf(() =>
      parseEngineConfig({
        ...defaults,
        confidence: { ...defaults.confidence, weights: { grounding: 0.3, length: 0.5, evidence: 0.2 } }
      })
    );

    expect(issues.map((issue) => issue.path)).toEqual(["confidence.weights.length"]);
  });

  it("rejects an expected word range that is upside down", () => {
    const issues = issuesOf(() =>
      parseEngineConfig({
        ...defaults,
        confidence: { ...defaults.confidence, expectedWords: { min: 400, max: 350 } }
      })
    );

    expect(issues).toEqual([{ path: "confidence.expectedWords", message: "min must not exceed max" }]);
  });

  it("widens the traversal beam to the path cap", () => {
    expect(defaults.beamWidth).toBe(64);
    expect(engineConfigFromEnv({ ...appConfig, MAX_PATHS: 100 })).toMatchObject({ maxPaths: 100, beamWidth: 100 });
  });

  it("rejects a beam narrower than the path cap", () => {
    const issues = issuesOf(() => parseEngineConfig({ ...defaults, maxPaths: 100, beamWidth: 64 }));

    expect(issues).toEqual([{ path: "beamWidth", message: "beamWidth must be at least maxPaths" }]);
  });

  it("reads numeric tunables from environment strings", () => {
    const env = loadAppConfig({ MAX_PATHS: "20", SIMILARITY_THRESHOLD: "0.4" });

    expect(engineConfigFromEnv(env)).toMatchObject({ maxPaths: 20, similarityThreshold: 0.4, topK: 5 });
  });

  it("reports a non-numeric tunable as a configuration error", () => {
    const env = loadAppConfig({ MAX_PATHS: "abc" });

    expect(env.MAX_PATHS).toBe("abc");
    expect(issuesOf(() => engineConfigFromEnv(env)).map((issue) => issue.path)).toEqual(["maxPaths"]);
  });

  it("returns the base config untouched when no override is set", () => {
    expect(resolveEngineConfig(defaults)).toBe(defaults);
    expect(resolveEngineConfig(defaults, { topK: undefined })).toBe(defaults);
  });

  it("merges overrides and revalidates the result", () => {
    const resolved = resolveEngineConfig(defaults, { maxDepth: 3, contextBudgetChars: 500 });

    expect(resolved.maxDepth).toBe(3);
    expect(resolved.contextBudgetChars).toBe(500);
    expect(resolved.topK).toBe(5);
    expect(() => resolveEngineConfig(defaults, { similarityThreshold: 1.5 })).toThrow(ConfigurationError);
  });
});
