import { createHash } from "node:crypto";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { Chunk, CorpusSnapshotData, CorpusSource, GraphEdge, GraphNode } from "@finhop/shared";
import { appConfig } from "../config.js";

const graphRecordSchema = z.object({
  nodes: z.array(
    z.object({
      id: z.string().min(1),
      label: z.string().min(1),
      entityType: z.string().default("entity"),
      aliases: z.array(z.string()).default([]),
      frequency: z.number().nonnegative().optional(),
      pagerank: z.number().nonnegative().optional()
    })
  ),
  edges: z.array(
    z.object({
      id: z.string().min(1).optional(),
      source: z.string().min(1),
      target: z.string().min(1),
      relation: z.string().min(1).default("related_to"),
      weight: z.number().min(0).max(1)
    })
  )
});

const chunkRecordSchema = z.object({
  chunks: z.array(
    z.object({
      id: z.string().min(1),
      text: z.string(),
      embedding: z.array(z.number().finite()),
      metadata: z.object({
        origin: z.string().min(1),
        type: z.string().default("txt"),
        timestamp: z.coerce.date()
      })
    })
  )
});

export interface FileCorpusSourceOptions {
  graphPath: string;
  chunksPath: string;
}

/**
 * Loads the graph record and the chunk-embedding record written by the
 * ingestion and graph-build jobs. The version is a hash of both files.
 */
export class FileCorpusSource implements CorpusSource {
  readonly name = "file";

  constructor(private readonly options: FileCorpusSourceOptions) {}

  static fromEnv(): FileCorpusSource {
    return new FileCorpusSource({
      graphPath: resolve(appConfig.CORPUS_DIR, appConfig.CORPUS_GRAPH_FILE),
      chunksPath: resolve(appConfig.CORPUS_DIR, appConfig.CORPUS_CHUNKS_FILE)
    });
  }

  async load(): Promise<CorpusSnapshotData> {
    const [graphRaw, chunksRaw] = await Promise.all([
      readFile(this.options.graphPath, "utf8"),
      readFile(this.options.chunksPath, "utf8")
    ]);

    const graph = graphRecordSchema.parse(JSON.parse(graphRaw));
    const chunkRecord = chunkRecordSchema.parse(JSON.parse(chunksRaw));

    const nodes: GraphNode[] = graph.nodes.map((node) => {
      const mapped: GraphNode = {
        id: node.id,
        label: node.label,
        entityType: node.entityType,
        aliases: Array.from(new Set(node.aliases))
      };
      if (node.frequency !== undefined) {
        mapped.frequency = node.frequency;
      }
      if (node.pagerank !== undefined) {
        mapped.pagerank = node.pagerank;
      }
      return mapped;
    });

    const edges: GraphEdge[] = graph.edges.map((edge, index) => ({
      id: edge.id ?? `${edge.source}->${edge.target}#${index}`,
      sourceId: edge.source,
      targetId: edge.target,
      relationType: edge.relation,
      weight: edge.weight
    }));

    const chunks: Chunk[] = chunkRecord.chunks.map((chunk) => ({
      id: chunk.id,
      text: chunk.text,
      embedding: chunk.embedding,
      sourceMetadata: {
        origin: chunk.metadata.origin,
        type: chunk.metadata.type,
        timestamp: chunk.metadata.timestamp
      }
    }));

    const version = createHash("sha256")
      .update(graphRaw)
      .update("\u0000")
      .update(chunksRaw)
      .digest("hex")
      .slice(0, 12);

    return { version, chunks, nodes, edges };
  }
}
