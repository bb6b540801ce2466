import type { Chunk } from "@finhop/shared";
import { cosineSimilarity, vectorNorm } from "../utils/vector.js";

export class EmbeddingDimensionError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number,
    subject: string
  ) {
    super(`${subject} has ${actual} dimensions, expected ${expected}`);
    this.name = "EmbeddingDimensionError";
  }
}

export interface ChunkMatch {
  chunk: Chunk;
  similarity: number;
}

interface IndexedChunk {
  chunk: Chunk;
  norm: number;
}

/**
 * Read-only chunk embeddings with exact cosine search. Norms are computed once
 * at load so a query costs one dot product per chunk.
 */
export class ChunkStore {
  private readonly entries: IndexedChunk[];
  private readonly byId = new Map<string, IndexedChunk>();

  constructor(
    chunks: Chunk[],
    readonly dimensions: number
  ) {
    this.entries = chunks.map((chunk) => {
      if (chunk.embedding.length !== dimensions) {
        throw new EmbeddingDimensionError(dimensions, chunk.embedding.length, `Chunk ${chunk.id}`);
      }
      return { chunk, norm: vectorNorm(chunk.embedding) };
    });
    for (const entry of this.entries) {
      this.byId.set(entry.chunk.id, entry);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  getById(id: string): Chunk | null {
    return this.byId.get(id)?.chunk ?? null;
  }

  embeddingOf(id: string): number[] | undefined {
    return this.byId.get(id)?.chunk.embedding;
  }

  documentCount(): number {
    return new Set(this.entries.map((entry) => entry.chunk.sourceMetadata.origin)).size;
  }

  /** Every chunk at or above `threshold`, most similar first. */
  search(queryEmbedding: number[], threshold: number): ChunkMatch[] {
    if (queryEmbedding.length !== this.dimensions) {
      throw new EmbeddingDimensionError(this.dimensions, queryEmbedding.length, "Query embedding");
    }

    const queryNorm = vectorNorm(queryEmbedding);
    const matches: ChunkMatch[] = [];
    for (const entry of this.entries) {
      const similarity = cosineSimilarity(
        queryEmbedding,
        entry.chunk.embedding,
        queryNorm,
        entry.norm
      );
      if (similarity >= threshold) {
        matches.push({ chunk: entry.chunk, similarity });
      }
    }

    return matches.sort(
      (a, b) =>
        b.similarity - a.similarity ||
        b.chunk.sourceMetadata.timestamp.getTime() - a.chunk.sourceMetadata.timestamp.getTime() ||
        a.chunk.id.localeCompare(b.chunk.id)
    );
  }
}
