export type PathAggregation = "product" | "min";

export interface ConfidenceWeights {
  grounding: number;
  length: number;
  evidence: number;
}

export interface EngineConfig {
  topK: number;
  similarityThreshold: number;
  maxDepth: number;
  minEdgeConfidence: number;
  maxPaths: number;
  beamWidth: number;
  maxAnchors: number;
  anchorMinOverlap: number;
  anchorScoreWeight: number;
  contextBudgetChars: number;
  dedupEmbeddingThreshold: number;
  dedupLexicalThreshold: number;
  pathAggregation: PathAggregation;
  historyTurns: number;
  confidence: {
    weights: ConfidenceWeights;
    expectedWords: {
      min: number;
      max: number;
    };
  };
}

export interface QueryOverrides {
  contextBudgetChars?: number;
  maxDepth?: number;
  similarityThreshold?: number;
  minEdgeConfidence?: number;
  topK?: number;
}
