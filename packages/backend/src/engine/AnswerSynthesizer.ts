import { z } from "zod";
import type { ContextEntry, HistoryTurn, ReasoningContext, ReasoningStep } from "@finhop/shared";
import { GenerationError } from "../errors.js";
import {
  SYNTHESIS_SYSTEM_PROMPT,
  buildSynthesisUserPrompt,
  clipHistoryAnswer
} from "../prompts/index.js";
import { LLMAbortError, LLMTimeoutError } from "../services/LLMRateLimiter.js";
import type { PromptMessage, TextGenerator } from "../services/llmTypes.js";
import { safeJsonParse } from "../utils/json.js";
import { containment, normalizeWhitespace, termSet } from "../utils/text.js";

const synthesisResponseSchema = z.object({
  answer: z.string(),
  steps: z
    .array(
      z.object({
        statement: z.string(),
        evidence: z.array(z.string()).default([])
      })
    )
    .default([])
});

export interface SynthesisOptions {
  history?: HistoryTurn[];
  signal?: AbortSignal;
}

export interface SynthesisResult {
  text: string;
  chainOfThought: ReasoningStep[];
  /** False when the model ignored the JSON format and steps were rebuilt from the text. */
  structured: boolean;
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export class AnswerSynthesizer {
  constructor(private readonly generator: TextGenerator) {}

  async synthesize(
    query: string,
    context: ReasoningContext,
    options: SynthesisOptions = {}
  ): Promise<SynthesisResult> {
    const messages = this.buildMessages(query, context.entries, options.history ?? []);
    const raw = await this.callGenerator(messages, options.signal);

    const parsed = synthesisResponseSchema.safeParse(safeJsonParse(raw));
    if (parsed.success && parsed.data.answer.trim().length > 0) {
      const text = parsed.data.answer.trim();
      const steps = parsed.data.steps
        .filter((step) => step.statement.trim().length > 0)
        .map((step, index) => ({
          index,
          statement: step.statement.trim(),
          evidenceIds: resolveTags(step.evidence, context.entries)
        }));
      // Steps that cite no known tag carry no grounding; pair sentences instead.
      const grounded = steps.some((step) => step.evidenceIds.length > 0);
      return {
        text,
        chainOfThought: grounded ? steps : reconstructSteps(text, context.entries),
        structured: grounded
      };
    }

    const text = raw.trim();
    if (text.length === 0) {
      throw new GenerationError("invalid_response", "Text generation returned an empty response");
    }
    return { text, chainOfThought: reconstructSteps(text, context.entries), structured: false };
  }

  private buildMessages(query: string, entries: ContextEntry[], history: HistoryTurn[]): PromptMessage[] {
    const messages: PromptMessage[] = [{ role: "system", content: SYNTHESIS_SYSTEM_PROMPT }];
    for (const turn of history) {
      messages.push({ role: "user", content: turn.query });
      messages.push({ role: "assistant", content: clipHistoryAnswer(turn) });
    }
    messages.push({ role: "user", content: buildSynthesisUserPrompt(query, entries) });
    return messages;
  }

  private async callGenerator(messages: PromptMessage[], signal: AbortSignal | undefined): Promise<string> {
    try {
      return await this.generator.generate(messages, signal ? { signal, jsonMode: true } : { jsonMode: true });
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      if (signal?.aborted || error instanceof LLMAbortError) {
        throw new GenerationError("aborted", "Answer generation was aborted", { cause: error });
      }
      if (error instanceof LLMTimeoutError) {
        throw new GenerationError("timeout", error.message, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new GenerationError("provider", `Answer generation failed: ${message}`, { cause: error });
    }
  }
}

function resolveTags(tags: string[], entries: ContextEntry[]): string[] {
  const ids = new Set<string>();
  for (const tag of tags) {
    const match = /E(\d+)/i.exec(tag);
    if (!match) {
      continue;
    }
    const entry = entries[Number(match[1]) - 1];
    if (entry) {
      ids.add(entry.evidence.id);
    }
  }
  return Array.from(ids);
}

/** Pairs each sentence of the answer with the context entry that covers most of its terms. */
export function reconstructSteps(text: string, entries: ContextEntry[]): ReasoningStep[] {
  const entryTerms = entries.map((entry) => termSet(entry.text));

  return splitSentences(text).map((sentence, index) => {
    const terms = termSet(sentence);
    let bestIndex = -1;
    let bestScore = 0;
    entryTerms.forEach((candidate, candidateIndex) => {
      const score = containment(terms, candidate);
      if (score > bestScore) {
        bestScore = score;
        bestIndex = candidateIndex;
      }
    });

    const best = bestIndex >= 0 ? entries[bestIndex] : undefined;
    return {
      index,
      statement: normalizeWhitespace(sentence),
      evidenceIds: best ? [best.evidence.id] : []
    };
  });
}
