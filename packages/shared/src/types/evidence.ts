import type { GraphEdge, GraphNode } from "./corpus.js";

export type IntentCategory = "factual_query" | "multi_hop_reasoning" | "explanatory_query";

export type ConfidenceTier = "High" | "Medium";

export interface ChunkEvidence {
  kind: "chunk";
  id: string;
  chunkId: string;
  similarity: number;
  text: string;
  origin: string;
  timestamp: Date;
}

/** A graph anchor: a node whose label or alias matched the query terms. */
export interface NodeEvidence {
  kind: "node";
  id: string;
  node: GraphNode;
  score: number;
  matchedTerms: string[];
}

export interface PathHop {
  edge: GraphEdge;
  direction: "outgoing" | "incoming";
  node: GraphNode;
}

export interface PathEvidence {
  kind: "path";
  id: string;
  start: GraphNode;
  hops: PathHop[];
  confidence: number;
  /** True when the path starts and ends on two different anchors. */
  connectsAnchors: boolean;
}

export type RetrievedEvidence = ChunkEvidence | NodeEvidence;

export type EvidenceItem = ChunkEvidence | NodeEvidence | PathEvidence;

export interface ContextEntry {
  evidence: EvidenceItem;
  text: string;
  truncated: boolean;
}

export interface ReasoningContext {
  entries: ContextEntry[];
  budgetChars: number;
  usedChars: number;
  droppedDuplicateIds: string[];
  droppedOverBudgetIds: string[];
}

export interface ReasoningStep {
  index: number;
  statement: string;
  evidenceIds: string[];
}

export interface ConfidenceBreakdown {
  grounding: number;
  length: number;
  evidence: number;
}

export interface AnswerMetrics {
  answerLength: number;
  hasNumbers: boolean;
  hasSources: boolean;
}

export interface EvidenceSummary {
  id: string;
  kind: EvidenceItem["kind"];
  score: number;
  text: string;
  truncated: boolean;
}

export interface AnswerResult {
  text: string;
  chainOfThought: ReasoningStep[];
  supportingEvidence: string[];
  confidenceScore: number;
  confidenceTier: ConfidenceTier;
  confidence: ConfidenceBreakdown;
  intent: IntentCategory;
  corpusVersion: string;
  evidence: EvidenceSummary[];
  metrics: AnswerMetrics;
  degraded?: {
    kind: "empty_evidence";
    message: string;
  };
}
