import type { CorpusSnapshotData } from "./types/corpus.js";

/**
 * Produces a complete corpus snapshot (chunk embeddings + graph). Loaded
 * wholesale; the engine never sees a partially built corpus.
 */
export interface CorpusSource {
  readonly name: string;
  load(): Promise<CorpusSnapshotData>;
  close?(): Promise<void>;
}
