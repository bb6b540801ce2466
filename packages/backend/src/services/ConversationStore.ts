import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import type { ConfidenceTier, ConversationSession, ConversationTurn, HistoryTurn } from "@finhop/shared";

export class SessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Conversation session does not exist: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export interface ConversationStoreOptions {
  /** File path, or ":memory:" for a private in-process database. */
  dbPath?: string;
}

export interface NewTurn {
  sessionId: string;
  query: string;
  answer: string;
  confidenceScore: number;
  confidenceTier: ConfidenceTier;
  id?: string;
}

export interface ConversationStoreLike {
  close(): void;
  createSession(input: { title: string; id?: string }): ConversationSession;
  listSessions(limit?: number): ConversationSession[];
  getSessionById(id: string): ConversationSession | null;
  deleteSession(id: string): boolean;
  addTurn(input: NewTurn): ConversationTurn;
  listTurns(sessionId: string): ConversationTurn[];
  /** The last `limit` turns of a session, oldest first. */
  recentHistory(sessionId: string, limit: number): HistoryTurn[];
}

interface SessionRow {
  id: string;
  title: string;
  created_at: string;
  updated_at: string;
}

interface TurnRow {
  id: string;
  session_id: string;
  query: string;
  answer: string;
  confidence_score: number;
  confidence_tier: string;
  created_at: string;
}

const TURN_COLUMNS = "id, session_id, query, answer, confidence_score, confidence_tier, created_at";

export class ConversationStore implements ConversationStoreLike {
  private readonly db: Database.Database;

  constructor(options: ConversationStoreOptions = {}) {
    const dbPath = options.dbPath ?? "data/conversations.db";
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolute = resolve(dbPath);
      mkdirSync(dirname(absolute), { recursive: true });
      this.db = new Database(absolute);
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("foreign_keys = ON");

    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  createSession(input: { title: string; id?: string }): ConversationSession {
    const id = input.id ?? randomUUID();
    const now = new Date().toISOString();

    this.db
      .prepare<{ id: string; title: string; created_at: string; updated_at: string }>(
        `
        INSERT INTO conversation_sessions (id, title, created_at, updated_at)
        VALUES (@id, @title, @created_at, @updated_at)
        `
      )
      .run({ id, title: input.title, created_at: now, updated_at: now });

    return { id, title: input.title, createdAt: new Date(now), updatedAt: new Date(now) };
  }

  listSessions(limit = 100): ConversationSession[] {
    const safeLimit = Math.max(1, limit);
    const rows = this.db
      .prepare<[number], SessionRow>(
        `
        SELECT id, title, created_at, updated_at
        FROM conversation_sessions
        ORDER BY updated_at DESC, created_at DESC
        LIMIT ?
        `
      )
      .all(safeLimit);

    return rows.map((row) => this.mapSessionRow(row));
  }

  getSessionById(id: string): ConversationSession | null {
    const row = this.db
      .prepare<[string], SessionRow>(
        `
        SELECT id, title, created_at, updated_at
        FROM conversation_sessions
        WHERE id = ?
        LIMIT 1
        `
      )
      .get(id);

    return row ? this.mapSessionRow(row) : null;
  }

  deleteSession(id: string): boolean {
    const result = this.db
      .prepare<[string]>("DELETE FROM conversation_sessions WHERE id = ?")
      .run(id);
    return result.changes > 0;
  }

  addTurn(input: NewTurn): ConversationTurn {
    if (!this.getSessionById(input.sessionId)) {
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
    const createdAt = turn.createdAt.toISOString();

    const insert = this.db.transaction(() => {
      this.db
        .prepare<TurnRow>(
          `
          INSERT INTO conversation_turns (${TURN_COLUMNS})
          VALUES (@id, @session_id, @query, @answer, @confidence_score, @confidence_tier, @created_at)
          `
        )
        .run({
          id: turn.id,
          session_id: turn.sessionId,
          query: turn.query,
          answer: turn.answer,
          confidence_score: turn.confidenceScore,
          confidence_tier: turn.confidenceTier,
          created_at: createdAt
        });
      this.db
        .prepare<[string, string]>("UPDATE conversation_sessions SET updated_at = ? WHERE id = ?")
        .run(createdAt, turn.sessionId);
    });
    insert();

    return turn;
  }

  listTurns(sessionId: string): ConversationTurn[] {
    const rows = this.db
      .prepare<[string], TurnRow>(
        `
        SELECT ${TURN_COLUMNS}
        FROM conversation_turns
        WHERE session_id = ?
        ORDER BY created_at ASC, rowid ASC
        `
      )
      .all(sessionId);

    return rows.map((row) => this.mapTurnRow(row));
  }

  recentHistory(sessionId: string, limit: number): HistoryTurn[] {
    if (limit <= 0) {
      return [];
    }
    const rows = this.db
      .prepare<[string, number], Pick<TurnRow, "query" | "answer">>(
        `
        SELECT query, answer FROM (
          SELECT query, answer, created_at, rowid AS seq
          FROM conversation_turns
          WHERE session_id = ?
          ORDER BY created_at DESC, rowid DESC
          LIMIT ?
        )
        ORDER BY created_at ASC, seq ASC
        `
      )
      .all(sessionId, limit);

    return rows.map((row) => ({ query: row.query, answer: row.answer }));
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_sessions (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS conversation_turns (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL REFERENCES conversation_sessions(id) ON DELETE CASCADE,
        query TEXT NOT NULL,
        answer TEXT NOT NULL,
        confidence_score REAL NOT NULL,
        confidence_tier TEXT NOT NULL CHECK(confidence_tier IN ('High', 'Medium')),
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversation_turns_session_id
        ON conversation_turns(session_id, created_at);

      CREATE INDEX IF NOT EXISTS idx_conversation_sessions_updated_at
        ON conversation_sessions(updated_at DESC);
    `);
  }

  private mapSessionRow(row: SessionRow): ConversationSession {
    return {
      id: row.id,
      title: row.title,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    };
  }

  private mapTurnRow(row: TurnRow): ConversationTurn {
    return {
      id: row.id,
      sessionId: row.session_id,
      query: row.query,
      answer: row.answer,
      confidenceScore: row.confidence_score,
      confidenceTier: row.confidence_tier === "High" ? "High" : "Medium",
      createdAt: new Date(row.created_at)
    };
  }
}
