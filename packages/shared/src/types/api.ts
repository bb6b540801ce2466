import type { EngineConfig, QueryOverrides } from "./config.js";
import type { ConversationSession, ConversationTurn, HistoryTurn } from "./conversation.js";
import type { CorpusStats } from "./corpus.js";
import type { AnswerResult } from "./evidence.js";

export type ErrorKind =
  | "empty_evidence"
  | "generation"
  | "corpus_unavailable"
  | "configuration";

export interface ApiErrorResponse {
  error: string;
  kind?: ErrorKind;
  details?: unknown;
}

export interface QueryRequest {
  query: string;
  sessionId?: string;
  history?: HistoryTurn[];
  overrides?: QueryOverrides;
}

export interface QueryResponse {
  result: AnswerResult;
}

export interface CorpusStatusResponse {
  corpus: CorpusStats;
}

export interface CorpusReloadResponse {
  corpus: CorpusStats;
  previousVersion: string | null;
}

export interface CorpusPathNode {
  id: string;
  label: string;
  entityType: string;
}

export interface CorpusPathsResponse {
  from: CorpusPathNode;
  to: CorpusPathNode;
  paths: CorpusPathNode[][];
}

export interface CreateSessionRequest {
  title?: string;
}

export interface CreateSessionResponse {
  session: ConversationSession;
}

export interface ListSessionsResponse {
  sessions: ConversationSession[];
}

export interface SessionDetailResponse {
  session: ConversationSession & {
    turns: ConversationTurn[];
  };
}

export interface GetConfigResponse {
  engine: EngineConfig;
  models: {
    provider: string;
    chat: string;
    embedding: string;
    embeddingDimensions: number;
  };
  corpusSource: string;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec?: number;
  checks?: {
    corpus: ServiceConnectionStatus;
    llm: ServiceConnectionStatus;
  };
  memoryUsage?: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
