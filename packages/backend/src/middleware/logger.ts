import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

/** One line per request; server errors log at error, client errors at warn. */
export const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = process.hrtime.bigint();

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const fields = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs)
    };

    if (res.statusCode >= 500) {
      logger.error(fields, "HTTP request");
    } else if (res.statusCode >= 400) {
      logger.warn(fields, "HTTP request");
    } else {
      logger.info(fields, "HTTP request");
    }
  });

  next();
};
