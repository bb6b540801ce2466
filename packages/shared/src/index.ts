export type * from "./types/api.js";
export type * from "./types/config.js";
export type * from "./types/conversation.js";
export type * from "./types/corpus.js";
export type * from "./types/evidence.js";
export type { CorpusSource } from "./store.js";
