import { Router } from "express";
import { z } from "zod";
import type { HistoryTurn, QueryResponse } from "@finhop/shared";
import { queryOverridesSchema } from "../engine/engineConfig.js";
import type { ReasoningEngine } from "../engine/ReasoningEngine.js";
import { validate } from "../middleware/validator.js";
import { getConversationStoreSingleton, getReasoningEngineSingleton } from "../runtime/engineRuntime.js";
import { SessionNotFoundError, type ConversationStoreLike } from "../services/ConversationStore.js";
import { logger } from "../utils/logger.js";

const queryBodySchema = z.object({
  query: z.string().trim().min(1).max(2000),
  sessionId: z.string().min(1).optional(),
  history: z
    .array(
      z.object({
        query: z.string(),
        answer: z.string()
      })
    )
    .max(50)
    .optional(),
  overrides: queryOverridesSchema.optional()
});

interface CreateQueryRouterOptions {
  engine?: ReasoningEngine;
  conversationStore?: ConversationStoreLike;
}

export function createQueryRouter(options: CreateQueryRouterOptions = {}): Router {
  const engine = options.engine ?? getReasoningEngineSingleton();
  const conversationStore = options.conversationStore ?? getConversationStoreSingleton();

  const queryRouter = Router();

  queryRouter.post("/", validate({ body: queryBodySchema }), async (req, res, next) => {
    const body = req.body as z.infer<typeof queryBodySchema>;

    // Abandoned requests cancel the in-flight generation call.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      let history: HistoryTurn[] | undefined = body.history;
      if (body.sessionId) {
        if (!conversationStore.getSessionById(body.sessionId)) {
          throw new SessionNotFoundError(body.sessionId);
        }
        history ??= conversationStore.recentHistory(body.sessionId, engine.config.historyTurns);
      }

      const result = await engine.answer({
        query: body.query,
        ...(history ? { history } : {}),
        ...(body.overrides ? { overrides: body.overrides } : {}),
        signal: controller.signal
      });

      if (body.sessionId) {
        try {
          conversationStore.addTurn({
            sessionId: body.sessionId,
            query: body.query,
            answer: result.text,
            confidenceScore: result.confidenceScore,
            confidenceTier: result.confidenceTier
          });
        } catch (error) {
          // The answer is still returned when memory persistence fails.
          logger.warn({ err: error, sessionId: body.sessionId }, "Failed to persist conversation turn");
        }
      }

      const response: QueryResponse = { result };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return queryRouter;
}
