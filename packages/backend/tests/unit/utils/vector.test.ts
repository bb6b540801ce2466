import { describe, expect, it } from "vitest";
import { cosineSimilarity, dot, vectorNorm } from "../../../src/utils/vector.js";

describe("vector utilities", () => {
  it("computes norms and dot products", () => {
    expect(vectorNorm([3, 4])).toBe(5);
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
  });

  it("computes cosine similarity", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([1, 1], [2, 2])).toBeCloseTo(1, 10);
  });

  it("treats a zero vector as dissimilar to everything", () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});
