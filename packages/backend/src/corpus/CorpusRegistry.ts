import type { CorpusSnapshotData, CorpusSource, CorpusStats } from "@finhop/shared";
import { CorpusUnavailableError } from "../errors.js";
import { logger } from "../utils/logger.js";
import { ChunkStore } from "./ChunkStore.js";
import { KnowledgeGraph } from "./KnowledgeGraph.js";

/** An immutable, fully built corpus. Queries hold one for their whole lifetime. */
export interface CorpusView {
  readonly version: string;
  readonly loadedAt: Date;
  readonly chunks: ChunkStore;
  readonly graph: KnowledgeGraph;
  readonly stats: CorpusStats;
}

export interface CorpusProvider {
  acquire(): CorpusView;
}

export function buildCorpusView(
  data: CorpusSnapshotData,
  embeddingDimensions: number,
  loadedAt = new Date()
): CorpusView {
  const chunks = new ChunkStore(data.chunks, embeddingDimensions);
  const graph = new KnowledgeGraph(data.nodes, data.edges);

  return {
    version: data.version,
    loadedAt,
    chunks,
    graph,
    stats: {
      version: data.version,
      loadedAt,
      documentCount: chunks.documentCount(),
      chunkCount: chunks.size,
      nodeCount: graph.nodeCount,
      edgeCount: graph.edgeCount,
      averageDegree: Number(graph.averageDegree().toFixed(2)),
      weaklyConnected: graph.isWeaklyConnected()
    }
  };
}

interface CorpusRegistryOptions {
  embeddingDimensions: number;
}

/**
 * Holds the current corpus snapshot. A reload builds the replacement off to
 * the side and swaps a single reference, so readers see the old snapshot or the
 * new one and never a mix.
 */
export class CorpusRegistry implements CorpusProvider {
  private current: CorpusView | null = null;
  private reloading: Promise<CorpusView> | null = null;

  constructor(
    private readonly source: CorpusSource,
    private readonly options: CorpusRegistryOptions
  ) {}

  acquire(): CorpusView {
    if (!this.current) {
      throw new CorpusUnavailableError(
        this.reloading ? "Corpus snapshot is still loading" : "Corpus snapshot is not loaded"
      );
    }
    return this.current;
  }

  status(): CorpusStats | null {
    return this.current?.stats ?? null;
  }

  isLoaded(): boolean {
    return this.current !== null;
  }

  /** Concurrent callers share one in-flight load. A failed load keeps the old snapshot. */
  reload(): Promise<CorpusView> {
    if (this.reloading) {
      return this.reloading;
    }

    this.reloading = this.loadView().finally(() => {
      this.reloading = null;
    });
    return this.reloading;
  }

  async close(): Promise<void> {
    await this.source.close?.();
  }

  private async loadView(): Promise<CorpusView> {
    let view: CorpusView;
    try {
      const data = await this.source.load();
      view = buildCorpusView(data, this.options.embeddingDimensions);
    } catch (error) {
      logger.error(
        { err: error, source: this.source.name, retainedVersion: this.current?.version ?? null },
        "Corpus load failed"
      );
      throw new CorpusUnavailableError(
        `Corpus load from ${this.source.name} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (view.graph.danglingEdgeCount > 0) {
      logger.warn(
        { version: view.version, danglingEdges: view.graph.danglingEdgeCount },
        "Dropped edges whose endpoints are missing from the graph"
      );
    }

    this.current = view;
    logger.info(
      {
        version: view.version,
        chunks: view.stats.chunkCount,
        nodes: view.stats.nodeCount,
        edges: view.stats.edgeCount
      },
      "Corpus snapshot swapped in"
    );
    return view;
  }
}
