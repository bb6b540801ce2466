import type {
  AnswerMetrics,
  ConfidenceBreakdown,
  ConfidenceTier,
  EngineConfig,
  ReasoningContext
} from "@finhop/shared";
import { contentTerms, countWords, termSet } from "../utils/text.js";
import { HIGH_CONFIDENCE_THRESHOLD } from "./engineConfig.js";
import { evidenceScore } from "./evidence.js";

export interface ConfidenceEvaluation {
  score: number;
  tier: ConfidenceTier;
  breakdown: ConfidenceBreakdown;
}

export function tierFor(score: number): ConfidenceTier {
  return score >= HIGH_CONFIDENCE_THRESHOLD ? "High" : "Medium";
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Weighted blend of grounding, length fit and evidence strength. A pure
 * function of the answer text and the context.
 */
export class ConfidenceEvaluator {
  constructor(private readonly config: EngineConfig["confidence"]) {}

  evaluate(answerText: string, context: ReasoningContext): ConfidenceEvaluation {
    const breakdown: ConfidenceBreakdown = {
      grounding: round(this.grounding(answerText, context)),
      length: round(this.lengthFit(answerText)),
      evidence: round(this.evidenceStrength(context))
    };

    const { weights } = this.config;
    const score = round(
      Math.min(
        1,
        Math.max(
          0,
          weights.grounding * breakdown.grounding +
            weights.length * breakdown.length +
            weights.evidence * breakdown.evidence
        )
      )
    );

    return { score, tier: tierFor(score), breakdown };
  }

  /** Share of the answer's content terms that occur somewhere in the context. */
  private grounding(answerText: string, context: ReasoningContext): number {
    const answerTerms = contentTerms(answerText);
    if (answerTerms.length === 0 || context.entries.length === 0) {
      return 0;
    }
    const vocabulary = termSet(context.entries.map((entry) => entry.text).join(" "));
    const grounded = answerTerms.filter((term) => vocabulary.has(term)).length;
    return grounded / answerTerms.length;
  }

  private lengthFit(answerText: string): number {
    const words = countWords(answerText);
    const { min, max } = this.config.expectedWords;
    if (words === 0) {
      return 0;
    }
    if (words < min) {
      return words / min;
    }
    if (words > max) {
      return max / words;
    }
    return 1;
  }

  /** Mean path confidence when paths were used, otherwise the mean retrieval score. */
  private evidenceStrength(context: ReasoningContext): number {
    const items = context.entries.map((entry) => entry.evidence);
    if (items.length === 0) {
      return 0;
    }
    const paths = items.filter((item) => item.kind === "path");
    const scored = paths.length > 0 ? paths : items;
    return scored.reduce((total, item) => total + evidenceScore(item), 0) / scored.length;
  }
}

export function answerMetrics(answerText: string): AnswerMetrics {
  return {
    answerLength: countWords(answerText),
    hasNumbers: /\d/.test(answerText),
    hasSources: /according to|source|based on/i.test(answerText)
  };
}
