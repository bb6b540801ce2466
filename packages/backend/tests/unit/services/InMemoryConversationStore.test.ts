import { describe, expect, it } from "vitest";
import { InMemoryConversationStore } from "../../../src/services/InMemoryConversationStore.js";
import { describeConversationStore } from "../../helpers/conversationStoreContract.js";

describeConversationStore("InMemoryConversationStore", () => new InMemoryConversationStore());

describe("InMemoryConversationStore copies", () => {
  it("does not expose its stored session objects", () => {
    const store = new InMemoryConversationStore();
    const created = store.createSession({ title: "Original", id: "s-1" });

    created.title = "Changed";

    expect(store.getSessionById("s-1")?.title).toBe("Original");
  });
});
