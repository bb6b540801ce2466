import { createHash } from "node:crypto";
import { auth, driver as createDriver, isInt, type Driver, type SessionConfig } from "neo4j-driver";
import type { Chunk, CorpusSnapshotData, CorpusSource, GraphEdge, GraphNode } from "@finhop/shared";
import { appConfig } from "../config.js";

export interface CypherRecord {
  get(key: string): unknown;
}

/** Runs read-only queries inside a single transaction. */
export interface CypherReader {
  readAll(queries: string[]): Promise<CypherRecord[][]>;
  close(): Promise<void>;
}

export interface Neo4jConnectionConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

const NODES_QUERY = `
MATCH (e:Entity)
RETURN e.id AS id, e.name AS label, e.type AS entityType,
       coalesce(e.aliases, []) AS aliases, e.frequency AS frequency, e.pagerank AS pagerank
ORDER BY id
`;

const EDGES_QUERY = `
MATCH (s:Entity)-[r:RELATED_TO]->(t:Entity)
RETURN r.id AS id, s.id AS sourceId, t.id AS targetId, r.relationType AS relationType,
       coalesce(r.weight, r.confidence) AS weight
ORDER BY id
`;

const CHUNKS_QUERY = `
MATCH (c:Chunk)
WHERE c.embedding IS NOT NULL
OPTIONAL MATCH (d:Document)-[:HAS_CHUNK]->(c)
RETURN c.id AS id, c.content AS text, c.embedding AS embedding,
       coalesce(d.filename, c.documentId) AS origin, coalesce(d.fileType, "txt") AS type,
       coalesce(d.parsedAt, d.uploadedAt) AS timestamp
ORDER BY id
`;

export function createNeo4jReader(config: Neo4jConnectionConfig): CypherReader {
  let driver: Driver | null = null;

  return {
    async readAll(queries) {
      if (!driver) {
        driver = createDriver(config.uri, auth.basic(config.user, config.password));
      }
      const sessionConfig: SessionConfig = { defaultAccessMode: "READ" };
      if (config.database) {
        sessionConfig.database = config.database;
      }

      const session = driver.session(sessionConfig);
      try {
        return await session.executeRead(async (tx) => {
          const results: CypherRecord[][] = [];
          for (const query of queries) {
            const result = await tx.run(query);
            results.push(result.records);
          }
          return results;
        });
      } finally {
        await session.close();
      }
    },
    async close() {
      if (driver) {
        await driver.close();
        driver = null;
      }
    }
  };
}

/**
 * Reads the entity graph and embedded chunks wholesale from Neo4j. Edge weight
 * falls back to the extraction confidence when no weight was stored.
 */
export class Neo4jCorpusSource implements CorpusSource {
  readonly name = "neo4j";

  constructor(private readonly reader: CypherReader) {}

  static fromEnv(): Neo4jCorpusSource {
    return new Neo4jCorpusSource(
      createNeo4jReader({
        uri: appConfig.NEO4J_URI,
        user: appConfig.NEO4J_USER,
        password: appConfig.NEO4J_PASSWORD,
        database: appConfig.NEO4J_DATABASE
      })
    );
  }

  async load(): Promise<CorpusSnapshotData> {
    const [nodeRecords = [], edgeRecords = [], chunkRecords = []] = await this.reader.readAll([
      NODES_QUERY,
      EDGES_QUERY,
      CHUNKS_QUERY
    ]);

    const nodes = nodeRecords.map((record) => this.mapNode(record));
    const edges = edgeRecords.map((record, index) => this.mapEdge(record, index));
    const chunks = chunkRecords.map((record) => this.mapChunk(record));

    // Every mapped field feeds the version, embeddings included.
    const hash = createHash("sha256");
    for (const node of nodes) {
      hash.update(`n:${JSON.stringify(node)}\n`);
    }
    for (const edge of edges) {
      hash.update(`e:${JSON.stringify(edge)}\n`);
    }
    for (const chunk of chunks) {
      hash.update(`c:${JSON.stringify(chunk)}\n`);
    }

    return { version: hash.digest("hex").slice(0, 12), nodes, edges, chunks };
  }

  async close(): Promise<void> {
    await this.reader.close();
  }

  private mapNode(record: CypherRecord): GraphNode {
    const id = toString(record.get("id"), "");
    const node: GraphNode = {
      id,
      label: toString(record.get("label"), id),
      entityType: toString(record.get("entityType"), "entity"),
      aliases: toStringArray(record.get("aliases"))
    };
    const frequency = toOptionalNumber(record.get("frequency"));
    if (frequency !== undefined) {
      node.frequency = frequency;
    }
    const pagerank = toOptionalNumber(record.get("pagerank"));
    if (pagerank !== undefined) {
      node.pagerank = pagerank;
    }
    return node;
  }

  private mapEdge(record: CypherRecord, index: number): GraphEdge {
    const sourceId = toString(record.get("sourceId"), "");
    const targetId = toString(record.get("targetId"), "");
    return {
      id: toString(record.get("id"), `${sourceId}->${targetId}#${index}`),
      sourceId,
      targetId,
      relationType: toString(record.get("relationType"), "related_to"),
      weight: Math.min(1, Math.max(0, toNumber(record.get("weight"), 0.5)))
    };
  }

  private mapChunk(record: CypherRecord): Chunk {
    const rawEmbedding = record.get("embedding");
    return {
      id: toString(record.get("id"), ""),
      text: toString(record.get("text"), ""),
      embedding: Array.isArray(rawEmbedding) ? rawEmbedding.map((value) => toNumber(value, 0)) : [],
      sourceMetadata: {
        origin: toString(record.get("origin"), "unknown"),
        type: toString(record.get("type"), "txt"),
        timestamp: toDate(record.get("timestamp"))
      }
    };
  }
}

function toString(value: unknown, fallback: string): string {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return fallback;
}

function toStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map((item) => String(item));
}

function toNumber(value: unknown, fallback: number): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : fallback;
  }
  if (isInt(value)) {
    return value.toNumber();
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

function toOptionalNumber(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return toNumber(value, 0);
}

function toDate(value: unknown): Date {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value;
  }
  if (typeof value === "string" || typeof value === "number") {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }
  return new Date(0);
}
