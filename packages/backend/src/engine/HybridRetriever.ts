import type { ChunkEvidence, EngineConfig, NodeEvidence, RetrievedEvidence } from "@finhop/shared";
import type { ChunkStore } from "../corpus/ChunkStore.js";
import type { AnchorMatch } from "../corpus/KnowledgeGraph.js";
import { chunkEvidenceId, compareEvidence, nodeEvidenceId } from "./evidence.js";

type RetrieverConfig = Pick<EngineConfig, "similarityThreshold" | "anchorScoreWeight">;

/**
 * Merges cosine matches over the chunk store with lexical graph anchors into
 * one ranking. Pure with respect to the snapshot it was built over.
 */
export class HybridRetriever {
  constructor(
    private readonly chunks: ChunkStore,
    private readonly config: RetrieverConfig
  ) {}

  /**
   * At most `k` items, descending by score. A null embedding (the embedder was
   * unavailable) leaves only the anchor contribution.
   */
  retrieve(queryEmbedding: number[] | null, anchors: AnchorMatch[], k: number): RetrievedEvidence[] {
    if (k <= 0) {
      return [];
    }

    const chunkEvidence: ChunkEvidence[] = queryEmbedding
      ? this.chunks.search(queryEmbedding, this.config.similarityThreshold).map(({ chunk, similarity }) => ({
          kind: "chunk",
          id: chunkEvidenceId(chunk.id),
          chunkId: chunk.id,
          similarity,
          text: chunk.text,
          origin: chunk.sourceMetadata.origin,
          timestamp: chunk.sourceMetadata.timestamp
        }))
      : [];

    const nodeEvidence: NodeEvidence[] = anchors.map((anchor) => ({
      kind: "node",
      id: nodeEvidenceId(anchor.node.id),
      node: anchor.node,
      score: anchor.overlap * this.config.anchorScoreWeight,
      matchedTerms: anchor.matchedTerms
    }));

    const merged: RetrievedEvidence[] = [...chunkEvidence, ...nodeEvidence];
    return merged.sort(compareEvidence).slice(0, k);
  }
}
