import { describe, expect, it } from "vitest";
import { SessionNotFoundError, type ConversationStoreLike } from "../../src/services/ConversationStore.js";

function turn(sessionId: string, query: string) {
  return {
    sessionId,
    query,
    answer: `answer to ${query}`,
    confidenceScore: 0.62,
    confidenceTier: "High" as const
  };
}

/** Behavior every conversation store backend must share. */
export function describeConversationStore(name: string, createStore: () => ConversationStoreLike, skip = false): void {
  describe.skipIf(skip)(name, () => {
    it("creates, reads and deletes a session", () => {
      const store = createStore();
      const session = store.createSession({ title: "Fund research", id: "s-1" });

      expect(store.getSessionById("s-1")).toEqual(session);
      expect(store.deleteSession("s-1")).toBe(true);
      expect(store.getSessionById("s-1")).toBeNull();
      expect(store.deleteSession("s-1")).toBe(false);
      store.close();
    });

    it("stores turns in order and returns the most recent history oldest first", () => {
      const store = createStore();
      store.createSession({ title: "Fund research", id: "s-1" });
      for (const query of ["q1", "q2", "q3"]) {
        store.addTurn(turn("s-1", query));
      }

      expect(store.listTurns("s-1").map((item) => item.query)).toEqual(["q1", "q2", "q3"]);
      expect(store.listTurns("s-1")[0]).toMatchObject({
        sessionId: "s-1",
        answer: "answer to q1",
        confidenceScore: 0.62,
        confidenceTier: "High"
      });
      expect(store.recentHistory("s-1", 2)).toEqual([
        { query: "q2", answer: "answer to q2" },
        { query: "q3", answer: "answer to q3" }
      ]);
      expect(store.recentHistory("s-1", 0)).toEqual([]);
      store.close();
    });

    it("refuses turns for an unknown session", () => {
      const store = createStore();

      expect(() => store.addTurn(turn("missing", "q1"))).toThrow(SessionNotFoundError);
      store.close();
    });

    it("drops a session's turns with the session", () => {
      const store = createStore();
      store.createSession({ title: "Fund research", id: "s-1" });
      store.addTurn(turn("s-1", "q1"));

      store.deleteSession("s-1");

      expect(store.listTurns("s-1")).toEqual([]);
      store.close();
    });

    it("limits the session list", () => {
      const store = createStore();
      store.createSession({ title: "First", id: "s-1" });
      store.createSession({ title: "Second", id: "s-2" });
      store.createSession({ title: "Third", id: "s-3" });

      expect(store.listSessions(2)).toHaveLength(2);
      expect(store.listSessions().map((session) => session.id).sort()).toEqual(["s-1", "s-2", "s-3"]);
      store.close();
    });
  });
}
