import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { closeRuntime, ensureCorpusLoaded, getEngineConfig } from "./runtime/engineRuntime.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  try {
    getEngineConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.issues }, error.message);
      process.exit(1);
    }
    throw error;
  }

  try {
    await ensureCorpusLoaded();
  } catch (error) {
    // Queries answer 503 until POST /api/corpus/reload succeeds.
    logger.error({ err: error }, "Starting without a corpus snapshot");
  }

  const server = createApp().listen(appConfig.PORT, () => {
    logger.info(`Reasoning engine is running on http://localhost:${appConfig.PORT}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      closeRuntime()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, "Shutdown failed");
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Server failed to start");
  process.exit(1);
});
