import { Router } from "express";
import type { EngineConfig, GetConfigResponse } from "@finhop/shared";
import { appConfig } from "../config.js";
import { getEngineConfig } from "../runtime/engineRuntime.js";

interface CreateConfigRouterOptions {
  engineConfig?: EngineConfig;
  models?: GetConfigResponse["models"];
  corpusSource?: string;
}

function modelsFromEnv(): GetConfigResponse["models"] {
  const provider = appConfig.LLM_PROVIDER;
  return {
    provider,
    chat: provider === "openai" ? appConfig.OPENAI_CHAT_MODEL : appConfig.GROQ_CHAT_MODEL,
    embedding: appConfig.EMBEDDING_MODEL,
    embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS
  };
}

/** Read-only view of the effective engine defaults; per-query overrides go on POST /api/query. */
export function createConfigRouter(options: CreateConfigRouterOptions = {}): Router {
  const engineConfig = options.engineConfig ?? getEngineConfig();
  const models = options.models ?? modelsFromEnv();
  const corpusSource = options.corpusSource ?? appConfig.CORPUS_SOURCE;

  const configRouter = Router();

  configRouter.get("/", (_req, res) => {
    const response: GetConfigResponse = {
      engine: engineConfig,
      models,
      corpusSource
    };
    res.json(response);
  });

  return configRouter;
}
