import OpenAI from "openai";
import { appConfig } from "../config.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  GenerateOptions,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  PromptMessage,
  TokenUsagePhase,
  TokenUsageRecord,
  UsageInfo
} from "./llmTypes.js";

const modelCostPerThousandTokens: Record<TokenUsagePhase, { input: number; output: number }> = {
  synthesis: { input: 0.00015, output: 0.0006 },
  embedding: { input: 0.00002, output: 0 }
};

/** Oldest usage records are dropped beyond this many. */
export const MAX_USAGE_RECORDS = 1000;

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

/**
 * Wraps the official SDK in the narrow client interface. SDK-level retries are
 * off because the rate limiter owns retry and timeout policy.
 */
export function createOpenAIClient(options: { apiKey: string; baseURL: string }): OpenAICompatibleClient {
  const openai = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  return {
    chat: {
      completions: {
        create: (body, requestOptions) =>
          openai.chat.completions.create({ ...body, stream: false }, requestOptions)
      }
    },
    embeddings: {
      create: (body, requestOptions) => openai.embeddings.create(body, requestOptions)
    }
  };
}

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly embeddingClient: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      embeddingClient?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://api.openai.com/v1",
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 1500,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 60_000
    };

    this.client =
      deps?.client ?? createOpenAIClient({ apiKey: this.config.apiKey, baseURL: this.config.baseURL });

    // Embeddings may live behind a different provider than generation
    if (deps?.embeddingClient) {
      this.embeddingClient = deps.embeddingClient;
    } else if (config.embeddingApiKey && config.embeddingBaseURL) {
      this.embeddingClient = createOpenAIClient({
        apiKey: config.embeddingApiKey,
        baseURL: config.embeddingBaseURL
      });
    } else {
      this.embeddingClient = this.client;
    }

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    const provider = appConfig.LLM_PROVIDER;

    const config: LLMConfig = {
      apiKey: provider === "openai" ? appConfig.OPENAI_API_KEY : appConfig.GROQ_API_KEY,
      baseURL: provider === "openai" ? appConfig.OPENAI_BASE_URL : appConfig.GROQ_BASE_URL,
      chatModel: provider === "openai" ? appConfig.OPENAI_CHAT_MODEL : appConfig.GROQ_CHAT_MODEL,
      embeddingModel: appConfig.EMBEDDING_MODEL,
      embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS,
      temperature: 0.1,
      maxTokens: 1500
    };

    const embeddingApiKey = appConfig.EMBEDDING_API_KEY || appConfig.OPENAI_API_KEY;
    if (embeddingApiKey) {
      config.embeddingApiKey = embeddingApiKey;
      config.embeddingBaseURL = appConfig.EMBEDDING_BASE_URL;
    }

    return new LLMService(config);
  }

  get dimensions(): number {
    return this.config.embeddingDimensions;
  }

  get chatModel(): string {
    return this.config.chatModel;
  }

  get embeddingModel(): string {
    return this.config.embeddingModel;
  }

  async generate(messages: PromptMessage[], options: GenerateOptions = {}): Promise<string> {
    const response = await this.rateLimiter.run(
      (signal) =>
        this.client.chat.completions.create(
          {
            model: this.config.chatModel,
            temperature: this.config.temperature,
            max_tokens: this.config.maxTokens,
            messages,
            ...(options.jsonMode ? { response_format: { type: "json_object" as const } } : {})
          },
          { signal }
        ),
      options.signal ? { signal: options.signal } : {}
    );

    this.recordUsage("synthesis", this.config.chatModel, response.usage);
    return response.choices[0]?.message.content ?? "";
  }

  async embed(text: string, options: { signal?: AbortSignal } = {}): Promise<number[]> {
    const response = await this.rateLimiter.run(
      (signal) =>
        this.embeddingClient.embeddings.create(
          {
            model: this.config.embeddingModel,
            input: text,
            dimensions: this.config.embeddingDimensions
          },
          { signal }
        ),
      options.signal ? { signal: options.signal } : {}
    );

    this.recordUsage("embedding", this.config.embeddingModel, response.usage);
    return response.data[0]?.embedding ?? [];
  }

  getUsageRecords(limit = 200): TokenUsageRecord[] {
    const safeLimit = Math.max(1, limit);
    return this.usageRecords.slice(-safeLimit);
  }

  clearUsageRecords(): void {
    this.usageRecords.length = 0;
  }

  private recordUsage(phase: TokenUsagePhase, model: string, usage: UsageInfo | undefined): void {
    const promptTokens = usage?.prompt_tokens ?? 0;
    const completionTokens = usage?.completion_tokens ?? 0;

    const costSpec = modelCostPerThousandTokens[phase];
    const estimatedCost =
      (promptTokens / 1000) * costSpec.input + (completionTokens / 1000) * costSpec.output;

    this.usageRecords.push({
      phase,
      model,
      promptTokens,
      completionTokens,
      estimatedCost,
      timestamp: new Date()
    });
    if (this.usageRecords.length > MAX_USAGE_RECORDS) {
      this.usageRecords.splice(0, this.usageRecords.length - MAX_USAGE_RECORDS);
    }
  }
}
