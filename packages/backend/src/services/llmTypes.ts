export type PromptMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Ask the provider for a JSON object response. */
  jsonMode?: boolean;
}

/** Opaque text generation. Implementations reject on timeout, quota or network failure. */
export interface TextGenerator {
  generate(messages: PromptMessage[], options?: GenerateOptions): Promise<string>;
}

export interface QueryEmbedder {
  readonly dimensions: number;
  embed(text: string, options?: { signal?: AbortSignal }): Promise<number[]>;
}

export interface LLMServiceLike extends TextGenerator, QueryEmbedder {
  getUsageRecords?(limit?: number): TokenUsageRecord[];
}

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  embeddingApiKey?: string;
  embeddingBaseURL?: string;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export type TokenUsagePhase = "synthesis" | "embedding";

export interface TokenUsageRecord {
  phase: TokenUsagePhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  estimatedCost: number;
  timestamp: Date;
}

export interface UsageInfo {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ChatCompletionBody {
  model: string;
  messages: PromptMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: "json_object" };
}

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
  usage?: UsageInfo;
}

export interface EmbeddingBody {
  model: string;
  input: string;
  dimensions?: number;
}

export interface EmbeddingResult {
  data: Array<{ embedding: number[] }>;
  usage?: UsageInfo;
}

/** The slice of an OpenAI-compatible SDK client the service calls. */
export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(body: ChatCompletionBody, options?: RequestOptions): Promise<ChatCompletionResult>;
    };
  };
  embeddings: {
    create(body: EmbeddingBody, options?: RequestOptions): Promise<EmbeddingResult>;
  };
}
