import { randomUUID } from "node:crypto";
import type { ConversationSession, ConversationTurn, HistoryTurn } from "@finhop/shared";
import { SessionNotFoundError, type ConversationStoreLike, type NewTurn } from "./ConversationStore.js";

/** Process-local fallback used when the SQLite file cannot be opened. */
export class InMemoryConversationStore implements ConversationStoreLike {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly sessionTurns = new Map<string, ConversationTurn[]>();

  close(): void {
    this.sessions.clear();
    this.sessionTurns.clear();
  }

  createSession(input: { title: string; id?: string }): ConversationSession {
    const now = new Date();
    const session: ConversationSession = {
      id: input.id ?? randomUUID(),
      title: input.title,
      createdAt: now,
      updatedAt: now
    };

    this.sessions.set(session.id, session);
    this.sessionTurns.set(session.id, []);
    return { ...session };
  }

  listSessions(limit = 100): ConversationSession[] {
    const safeLimit = Math.max(1, limit);
    return [...this.sessions.values()]
      .sort(
        (a, b) =>
          b.updatedAt.getTime() - a.updatedAt.getTime() || b.createdAt.getTime() - a.createdAt.getTime()
      )
      .slice(0, safeLimit)
      .map((session) => ({ ...session }));
  }

  getSessionById(id: string): ConversationSession | null {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  deleteSession(id: string): boolean {
    const existed = this.sessions.delete(id);
    this.sessionTurns.delete(id);
    return existed;
  }

  addTurn(input: NewTurn): ConversationTurn {
    const session = this.sessions.get(input.sessionId);
    const turns = this.sessionTurns.get(input.sessionId);
    if (!session || !turns) {
      throw new SessionNotFoundError(input.sessionId);
    }

    const turn: ConversationTurn = {
      id: input.id ?? randomUUID(),
      sessionId: input.sessionId,
      query: input.query,
      answer: input.answer,
      confidenceScore: input.confidenceScore,
      confidenceTier: input.confidenceTier,
      createdAt: new Date()
    };
    turns.push(turn);
    session.updatedAt = turn.createdAt;
    return { ...turn };
  }

  listTurns(sessionId: string): ConversationTurn[] {
    return (this.sessionTurns.get(sessionId) ?? []).map((turn) => ({ ...turn }));
  }

  recentHistory(sessionId: string, limit: number): HistoryTurn[] {
    if (limit <= 0) {
      return [];
    }
    return (this.sessionTurns.get(sessionId) ?? [])
      .slice(-limit)
      .map((turn) => ({ query: turn.query, answer: turn.answer }));
  }
}
