import type { ChunkEvidence, EvidenceItem, NodeEvidence, PathEvidence } from "@finhop/shared";
import { normalizeWhitespace } from "../utils/text.js";

export function chunkEvidenceId(chunkId: string): string {
  return `chunk:${chunkId}`;
}

export function nodeEvidenceId(nodeId: string): string {
  return `node:${nodeId}`;
}

export function pathEvidenceId(startId: string, edgeIds: string[]): string {
  return `path:${startId}/${edgeIds.join("/")}`;
}

/** Ranking score: similarity for chunks, anchor score for nodes, confidence for paths. */
export function evidenceScore(item: EvidenceItem): number {
  switch (item.kind) {
    case "chunk":
      return item.similarity;
    case "node":
      return item.score;
    case "path":
      return item.confidence;
  }
}

function evidenceTimestamp(item: EvidenceItem): number {
  return item.kind === "chunk" ? item.timestamp.getTime() : Number.NEGATIVE_INFINITY;
}

/** Descending score; equal scores go to the more recent source, then to id order. */
export function compareEvidence(a: EvidenceItem, b: EvidenceItem): number {
  const byScore = evidenceScore(b) - evidenceScore(a);
  if (byScore !== 0) {
    return byScore;
  }
  const timeA = evidenceTimestamp(a);
  const timeB = evidenceTimestamp(b);
  if (timeA !== timeB) {
    return timeB > timeA ? 1 : -1;
  }
  return a.id.localeCompare(b.id);
}

export function renderPath(path: PathEvidence): string {
  let text = path.start.label;
  for (const hop of path.hops) {
    text +=
      hop.direction === "outgoing"
        ? ` --[${hop.edge.relationType}]--> ${hop.node.label}`
        : ` <--[${hop.edge.relationType}]-- ${hop.node.label}`;
  }
  return text;
}

function renderNode(item: NodeEvidence): string {
  const { node } = item;
  const aliases = node.aliases.filter((alias) => alias !== node.label);
  const aliasText = aliases.length > 0 ? ` (also: ${aliases.join(", ")})` : "";
  return `${node.label} [${node.entityType}]${aliasText}`;
}

function renderChunk(item: ChunkEvidence): string {
  return normalizeWhitespace(item.text);
}

/** Text an evidence item contributes to the context; its length is what the budget counts. */
export function renderEvidence(item: EvidenceItem): string {
  switch (item.kind) {
    case "chunk":
      return renderChunk(item);
    case "node":
      return renderNode(item);
    case "path":
      return renderPath(item);
  }
}
