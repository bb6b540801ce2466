import type {
  ContextEntry,
  EngineConfig,
  EvidenceItem,
  PathEvidence,
  ReasoningContext,
  RetrievedEvidence
} from "@finhop/shared";
import { containment, jaccard, termSet } from "../utils/text.js";
import { cosineSimilarity } from "../utils/vector.js";
import { compareEvidence, renderEvidence } from "./evidence.js";

type AssemblerConfig = Pick<EngineConfig, "dedupEmbeddingThreshold" | "dedupLexicalThreshold">;

export type EmbeddingLookup = (chunkId: string) => number[] | undefined;

interface Candidate {
  item: EvidenceItem;
  text: string;
  terms: Set<string>;
  embedding: number[] | undefined;
}

/**
 * Drops near-duplicate evidence, then fills the character budget greedily in
 * ranking order. Size is the length of each item's rendered text.
 */
export class ContextAssembler {
  constructor(
    private readonly config: AssemblerConfig,
    private readonly embeddingOf: EmbeddingLookup = () => undefined
  ) {}

  assemble(retrieved: RetrievedEvidence[], paths: PathEvidence[], budgetChars: number): ReasoningContext {
    const ranked: EvidenceItem[] = [...retrieved, ...paths].sort(compareEvidence);
    const selected: Candidate[] = [];
    const entries: ContextEntry[] = [];
    const droppedDuplicateIds: string[] = [];
    const droppedOverBudgetIds: string[] = [];
    let usedChars = 0;

    for (const item of ranked) {
      const text = renderEvidence(item);
      const candidate: Candidate = {
        item,
        text,
        terms: termSet(text),
        embedding: item.kind === "chunk" ? this.embeddingOf(item.chunkId) : undefined
      };

      if (selected.some((kept) => this.isDuplicate(candidate, kept))) {
        droppedDuplicateIds.push(item.id);
        continue;
      }

      if (usedChars + text.length <= budgetChars) {
        entries.push({ evidence: item, text, truncated: false });
        selected.push(candidate);
        usedChars += text.length;
      } else if (entries.length === 0) {
        const clipped = text.slice(0, budgetChars);
        entries.push({ evidence: item, text: clipped, truncated: true });
        selected.push(candidate);
        usedChars += clipped.length;
      } else {
        droppedOverBudgetIds.push(item.id);
      }
    }

    return { entries, budgetChars, usedChars, droppedDuplicateIds, droppedOverBudgetIds };
  }

  private isDuplicate(candidate: Candidate, kept: Candidate): boolean {
    if (candidate.embedding && kept.embedding) {
      if (cosineSimilarity(candidate.embedding, kept.embedding) >= this.config.dedupEmbeddingThreshold) {
        return true;
      }
    }
    if (jaccard(candidate.terms, kept.terms) >= this.config.dedupLexicalThreshold) {
      return true;
    }
    // A chunk restating what a graph path or node already carries adds nothing.
    return (
      candidate.item.kind === "chunk" &&
      kept.item.kind !== "chunk" &&
      containment(candidate.terms, kept.terms) >= this.config.dedupLexicalThreshold
    );
  }
}
