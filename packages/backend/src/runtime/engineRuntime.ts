import type { CorpusSource, EngineConfig } from "@finhop/shared";
import { appConfig } from "../config.js";
import { CorpusRegistry } from "../corpus/CorpusRegistry.js";
import { FileCorpusSource } from "../corpus/FileCorpusSource.js";
import { Neo4jCorpusSource } from "../corpus/Neo4jCorpusSource.js";
import { engineConfigFromEnv } from "../engine/engineConfig.js";
import { ReasoningEngine } from "../engine/ReasoningEngine.js";
import { ConversationStore, type ConversationStoreLike } from "../services/ConversationStore.js";
import { InMemoryConversationStore } from "../services/InMemoryConversationStore.js";
import { LLMService } from "../services/LLMService.js";
import { logger } from "../utils/logger.js";

let engineConfigSingleton: EngineConfig | null = null;
let llmServiceSingleton: LLMService | null = null;
let corpusRegistrySingleton: CorpusRegistry | null = null;
let reasoningEngineSingleton: ReasoningEngine | null = null;
let conversationStoreSingleton: ConversationStoreLike | null = null;

/** Throws ConfigurationError on invalid tunables; the server treats that as fatal. */
export function getEngineConfig(): EngineConfig {
  if (!engineConfigSingleton) {
    engineConfigSingleton = engineConfigFromEnv();
  }
  return engineConfigSingleton;
}

export function getLLMServiceSingleton(): LLMService {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }
  return llmServiceSingleton;
}

export function createCorpusSource(): CorpusSource {
  return appConfig.CORPUS_SOURCE === "neo4j" ? Neo4jCorpusSource.fromEnv() : FileCorpusSource.fromEnv();
}

export function getCorpusRegistrySingleton(): CorpusRegistry {
  if (!corpusRegistrySingleton) {
    corpusRegistrySingleton = new CorpusRegistry(createCorpusSource(), {
      embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS
    });
  }
  return corpusRegistrySingleton;
}

export function getReasoningEngineSingleton(): ReasoningEngine {
  if (!reasoningEngineSingleton) {
    const llmService = getLLMServiceSingleton();
    reasoningEngineSingleton = new ReasoningEngine({
      corpus: getCorpusRegistrySingleton(),
      generator: llmService,
      embedder: llmService,
      config: getEngineConfig()
    });
  }
  return reasoningEngineSingleton;
}

export function getConversationStoreSingleton(): ConversationStoreLike {
  if (conversationStoreSingleton) {
    return conversationStoreSingleton;
  }

  try {
    conversationStoreSingleton = new ConversationStore({ dbPath: appConfig.CONVERSATION_DB_PATH });
  } catch (error) {
    logger.warn(
      {
        error: error instanceof Error ? error.message : String(error)
      },
      "SQLite ConversationStore unavailable, falling back to in-memory store"
    );
    conversationStoreSingleton = new InMemoryConversationStore();
  }

  return conversationStoreSingleton;
}

export async function ensureCorpusLoaded(
  registry: CorpusRegistry = getCorpusRegistrySingleton()
): Promise<void> {
  if (registry.isLoaded()) {
    return;
  }
  await registry.reload();
}

export async function closeRuntime(): Promise<void> {
  conversationStoreSingleton?.close();
  conversationStoreSingleton = null;
  if (corpusRegistrySingleton) {
    await corpusRegistrySingleton.close();
    corpusRegistrySingleton = null;
  }
  reasoningEngineSingleton = null;
}
