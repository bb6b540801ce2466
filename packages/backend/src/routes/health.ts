import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus } from "@finhop/shared";
import { checkCorpus, checkLlmConnection } from "../runtime/connectivity.js";

interface CreateHealthRouterOptions {
  checkCorpus?: () => Promise<ServiceConnectionStatus>;
  checkLlm?: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const corpusCheck = options.checkCorpus ?? (() => checkCorpus());
  const llmCheck = options.checkLlm ?? (() => checkLlmConnection());
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [corpus, llm] = await Promise.all([corpusCheck(), llmCheck()]);
    const status: HealthResponse["status"] =
      corpus === "failed" || llm === "failed" ? "degraded" : "ok";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        corpus,
        llm
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}
