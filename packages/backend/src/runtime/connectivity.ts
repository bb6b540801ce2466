import type { ServiceConnectionStatus } from "@finhop/shared";
import { appConfig, type AppConfig } from "../config.js";
import type { CorpusRegistry } from "../corpus/CorpusRegistry.js";
import type { QueryEmbedder } from "../services/llmTypes.js";
import { getCorpusRegistrySingleton, getLLMServiceSingleton } from "./engineRuntime.js";

/** The probe calls the embeddings endpoint, so it needs the key LLMService.fromEnv embeds with. */
export function isEmbeddingConfigured(env: AppConfig = appConfig): boolean {
  return (env.EMBEDDING_API_KEY || env.OPENAI_API_KEY).trim().length > 0;
}

interface CorpusCheckOptions {
  registry?: Pick<CorpusRegistry, "isLoaded">;
}

interface LlmCheckOptions {
  embedder?: QueryEmbedder;
  configured?: boolean;
  probeText?: string;
}

export async function checkCorpus(options: CorpusCheckOptions = {}): Promise<ServiceConnectionStatus> {
  const registry = options.registry ?? getCorpusRegistrySingleton();
  return registry.isLoaded() ? "ok" : "failed";
}

export async function checkLlmConnection(options: LlmCheckOptions = {}): Promise<ServiceConnectionStatus> {
  if (!(options.configured ?? isEmbeddingConfigured())) {
    return "not_configured";
  }

  const embedder = options.embedder ?? getLLMServiceSingleton();

  try {
    await embedder.embed(options.probeText ?? "ping");
    return "ok";
  } catch {
    return "failed";
  }
}
