import type { ErrorRequestHandler } from "express";
import type { ApiErrorResponse } from "@finhop/shared";
import {
  ConfigurationError,
  CorpusUnavailableError,
  EngineError,
  GenerationError
} from "../errors.js";
import { SessionNotFoundError } from "../services/ConversationStore.js";
import { logger } from "../utils/logger.js";

/** Status for a client that went away before the answer was ready. */
export const CLIENT_CLOSED_REQUEST = 499;

export function statusForError(error: unknown): number {
  if (error instanceof ConfigurationError) {
    return 400;
  }
  if (error instanceof SessionNotFoundError) {
    return 404;
  }
  if (error instanceof CorpusUnavailableError) {
    return 503;
  }
  if (error instanceof GenerationError) {
    switch (error.reason) {
      case "timeout":
        return 504;
      case "aborted":
        return CLIENT_CLOSED_REQUEST;
      default:
        return 502;
    }
  }
  return 500;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = statusForError(err);

  if (status >= 500) {
    logger.error({ err, method: req.method, url: req.originalUrl }, "Request failed");
  } else {
    logger.warn(
      { method: req.method, url: req.originalUrl, error: err instanceof Error ? err.message : String(err) },
      "Request rejected"
    );
  }

  if (res.headersSent || res.writableEnded) {
    return;
  }

  let body: ApiErrorResponse;
  if (err instanceof ConfigurationError) {
    body = { error: err.message, kind: err.kind, details: err.issues };
  } else if (err instanceof GenerationError) {
    body = { error: err.message, kind: err.kind, details: { reason: err.reason } };
  } else if (err instanceof EngineError) {
    body = { error: err.message, kind: err.kind };
  } else if (err instanceof SessionNotFoundError) {
    body = { error: err.message };
  } else {
    body = { error: "Internal server error" };
  }
  res.status(status).json(body);
};
