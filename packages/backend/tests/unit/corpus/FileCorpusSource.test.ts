import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileCorpusSource } from "../../../src/corpus/FileCorpusSource.js";

const graphRecord = {
  nodes: [
    { id: "x", label: "Company X", entityType: "company", aliases: ["X Corp", "X Corp"], pagerank: 0.4 },
    { id: "s", label: "Sector S" }
  ],
  edges: [
    { id: "e1", source: "x", target: "s", relation: "operates_in", weight: 0.9 },
    { source: "s", target: "x", weight: 0.4 }
  ]
};

const chunkRecord = {
  chunks: [
    {
      id: "c1",
      text: "Company X reported revenue growth.",
      embedding: [1, 0, 0, 0],
      metadata: { origin: "x-annual-report.pdf", type: "pdf", timestamp: "2024-03-01T00:00:00Z" }
    }
  ]
};

describe("FileCorpusSource", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "corpus-source-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeRecords(graph: unknown, chunks: unknown): Promise<FileCorpusSource> {
    const graphPath = join(dir, "graph.json");
    const chunksPath = join(dir, "chunks.json");
    await writeFile(graphPath, JSON.stringify(graph));
    await writeFile(chunksPath, JSON.stringify(chunks));
    return new FileCorpusSource({ graphPath, chunksPath });
  }

  it("maps the graph and chunk records into a snapshot", async () => {
    const source = await writeRecords(graphRecord, chunkRecord);

    const data = await source.load();

    expect(data.nodes).toEqual([
      { id: "x", label: "Company X", entityType: "company", aliases: ["X Corp"], pagerank: 0.4 },
      { id: "s", label: "Sector S", entityType: "entity", aliases: [] }
    ]);
    expect(data.edges).toEqual([
      { id: "e1", sourceId: "x", targetId: "s", relationType: "operates_in", weight: 0.9 },
      { id: "s->x#1", sourceId: "s", targetId: "x", relationType: "related_to", weight: 0.4 }
    ]);
    expect(data.chunks[0]?.sourceMetadata).toEqual({
      origin: "x-annual-report.pdf",
      type: "pdf",
      timestamp: new Date("2024-03-01T00:00:00Z")
    });
    expect(data.version).toMatch(/^[0-9a-f]{12}$/);
  });

  it("derives the version from file contents", async () => {
    const first = await (await writeRecords(graphRecord, chunkRecord)).load();
    const same = await (await writeRecords(graphRecord, chunkRecord)).load();
    const changed = await (
      await writeRecords({ ...graphRecord, nodes: graphRecord.nodes.slice(0, 1) }, chunkRecord)
    ).load();

    expect(same.version).toBe(first.version);
    expect(changed.version).not.toBe(first.version);
  });

  it("rejects an edge weight outside [0, 1]", async () => {
    const source = await writeRecords(
      { nodes: graphRecord.nodes, edges: [{ source: "x", target: "s", weight: 1.5 }] },
      chunkRecord
    );

    await expect(source.load()).rejects.toThrow();
  });

  it("fails when a record file is missing", async () => {
    const source = new FileCorpusSource({ graphPath: join(dir, "absent.json"), chunksPath: join(dir, "absent.json") });

    await expect(source.load()).rejects.toMatchObject({ code: "ENOENT" });
  });
});
