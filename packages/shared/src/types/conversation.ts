import type { ConfidenceTier } from "./evidence.js";

export interface ConversationSession {
  id: string;
  title: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface ConversationTurn {
  id: string;
  sessionId: string;
  query: string;
  answer: string;
  confidenceScore: number;
  confidenceTier: ConfidenceTier;
  createdAt: Date;
}

export interface HistoryTurn {
  query: string;
  answer: string;
}
