import cors from "cors";
import express, { type Express } from "express";
import { appConfig } from "./config.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter } from "./middleware/rateLimiter.js";
import { createConfigRouter } from "./routes/config.js";
import { createCorpusRouter } from "./routes/corpus.js";
import { createHealthRouter } from "./routes/health.js";
import { createQueryRouter } from "./routes/query.js";
import { createSessionsRouter } from "./routes/sessions.js";

export function createApp(): Express {
  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: appConfig.CORS_ORIGIN }));
  app.use(express.json({ limit: "1mb" }));
  app.use(apiRateLimiter);

  app.use("/api/query", createQueryRouter());
  app.use("/api/sessions", createSessionsRouter());
  app.use("/api/corpus", createCorpusRouter());
  app.use("/api/config", createConfigRouter());
  app.use("/api/health", createHealthRouter());

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use(errorHandler);

  return app;
}
