import type { ContextEntry, HistoryTurn } from "@finhop/shared";

export const SYNTHESIS_SYSTEM_PROMPT = `
You are a financial research assistant. Answer strictly from the evidence supplied with the question.

Rules:
1. Do not use outside knowledge. If the evidence is insufficient, say so plainly.
2. Relationship paths are written as A --[relation]--> B; cite them when the answer depends on more than one hop.
3. Every reasoning step must cite the evidence tags it relies on, e.g. "E1".
4. Respond with a single JSON object of the form:
{
  "answer": "final answer text",
  "steps": [
    { "statement": "one reasoning step", "evidence": ["E1", "E3"] }
  ]
}
Output only the JSON object.
`.trim();

export function evidenceTag(index: number): string {
  return `E${index + 1}`;
}

function provenance(entry: ContextEntry): string {
  const { evidence } = entry;
  switch (evidence.kind) {
    case "chunk":
      return `document ${evidence.origin}, ${evidence.timestamp.toISOString().slice(0, 10)}, similarity ${evidence.similarity.toFixed(2)}`;
    case "node":
      return `graph entity, match ${evidence.score.toFixed(2)}`;
    case "path":
      return `graph path, ${evidence.hops.length} hop(s), confidence ${evidence.confidence.toFixed(2)}`;
  }
}

export function buildEvidenceBlock(entries: ContextEntry[]): string {
  if (entries.length === 0) {
    return "(no evidence was found for this question)";
  }
  return entries
    .map((entry, index) => {
      const suffix = entry.truncated ? " [truncated]" : "";
      return `[${evidenceTag(index)}] (${provenance(entry)})${suffix}\n${entry.text}`;
    })
    .join("\n\n");
}

export function buildSynthesisUserPrompt(query: string, entries: ContextEntry[]): string {
  return `
Evidence:
${buildEvidenceBlock(entries)}

Question: ${query}
`.trim();
}

/** Answer text of a prior turn as replayed into the prompt. */
export function clipHistoryAnswer(turn: HistoryTurn, maxChars = 100): string {
  return turn.answer.length > maxChars ? `${turn.answer.slice(0, maxChars)}...` : turn.answer;
}
