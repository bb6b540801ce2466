import { ConversationStore } from "../../../src/services/ConversationStore.js";
import { describeConversationStore } from "../../helpers/conversationStoreContract.js";

// Needs the better-sqlite3 native binding, which not every sandbox builds.
const runSqliteTests = process.env.RUN_SQLITE_TESTS === "true";

describeConversationStore("ConversationStore", () => new ConversationStore({ dbPath: ":memory:" }), !runSqliteTests);
