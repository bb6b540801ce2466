export interface ChunkSourceMetadata {
  origin: string;
  type: string;
  timestamp: Date;
}

export interface Chunk {
  id: string;
  text: string;
  embedding: number[];
  sourceMetadata: ChunkSourceMetadata;
}

export interface GraphNode {
  id: string;
  label: string;
  entityType: string;
  aliases: string[];
  /** Number of chunks the entity was extracted from. */
  frequency?: number;
  pagerank?: number;
}

/**
 * Directed relationship between two entities. `weight` is the extraction
 * confidence in [0, 1]; duplicates and self-loops are kept as extracted.
 */
export interface GraphEdge {
  id: string;
  sourceId: string;
  targetId: string;
  relationType: string;
  weight: number;
}

export interface CorpusSnapshotData {
  version: string;
  chunks: Chunk[];
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface CorpusStats {
  version: string;
  loadedAt: Date;
  documentCount: number;
  chunkCount: number;
  nodeCount: number;
  edgeCount: number;
  averageDegree: number;
  weaklyConnected: boolean;
}
