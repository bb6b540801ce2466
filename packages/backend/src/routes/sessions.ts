import { Router } from "express";
import { z } from "zod";
import type {
  CreateSessionResponse,
  ListSessionsResponse,
  SessionDetailResponse
} from "@finhop/shared";
import { validate } from "../middleware/validator.js";
import { getConversationStoreSingleton } from "../runtime/engineRuntime.js";
import type { ConversationStoreLike } from "../services/ConversationStore.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

const createSessionBodySchema = z.object({
  title: z.string().trim().min(1).max(120).optional()
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(100)
});

interface CreateSessionsRouterOptions {
  conversationStore?: ConversationStoreLike;
}

export function createSessionsRouter(options: CreateSessionsRouterOptions = {}): Router {
  const conversationStore = options.conversationStore ?? getConversationStoreSingleton();

  const sessionsRouter = Router();

  sessionsRouter.post("/", validate({ body: createSessionBodySchema }), (req, res) => {
    const body = req.body as z.infer<typeof createSessionBodySchema>;
    const session = conversationStore.createSession({ title: body.title ?? "New conversation" });
    const response: CreateSessionResponse = { session };
    res.status(201).json(response);
  });

  sessionsRouter.get("/", validate({ query: listSessionsQuerySchema }), (req, res) => {
    const { limit } = req.query as unknown as z.infer<typeof listSessionsQuerySchema>;
    const response: ListSessionsResponse = {
      sessions: conversationStore.listSessions(limit)
    };
    res.json(response);
  });

  sessionsRouter.get("/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const { id } = req.params;
    const session = conversationStore.getSessionById(id);
    if (!session) {
      return res.status(404).json({ error: "Session not found" });
    }

    const response: SessionDetailResponse = {
      session: {
        ...session,
        turns: conversationStore.listTurns(id)
      }
    };
    return res.json(response);
  });

  sessionsRouter.delete("/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const deleted = conversationStore.deleteSession(req.params.id);
    if (!deleted) {
      return res.status(404).json({ error: "Session not found" });
    }
    return res.status(204).send();
  });

  return sessionsRouter;
}
