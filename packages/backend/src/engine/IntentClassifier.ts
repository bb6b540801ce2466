import type { IntentCategory } from "@finhop/shared";

interface IntentCue {
  pattern: RegExp;
  weight: number;
}

export interface IntentStrategy {
  intent: IntentCategory;
  cues: IntentCue[];
  /** Maps the configured traversal depth to the depth this intent runs with. */
  resolveDepth(configuredDepth: number): number;
}

/**
 * Ordered strategy table. The intent with the highest cue weight wins; ties go
 * to the earlier row, and a query with no cue falls through to factual_query.
 */
export const intentStrategies: readonly IntentStrategy[] = [
  {
    intent: "multi_hop_reasoning",
    cues: [
      { pattern: /\b(relationship|relationships|related|relates?|connect(?:ed|ion|ions|s)?|link(?:ed|s)?)\b/i, weight: 2 },
      { pattern: /\b(compare[sd]?|comparison|versus|vs\.?|differ(?:s|ence|ences|ent)?)\b/i, weight: 2 },
      { pattern: /\b(?:more|less|higher|lower|better|worse|larger|smaller)\s+than\b/i, weight: 2 },
      { pattern: /\b(cause[sd]?|because|leads?\s+to|led\s+to|result(?:s|ed)?\s+in|impact(?:s|ed)?|affect(?:s|ed)?|influence[sd]?|drive[sn]?|exposure|exposed)\b/i, weight: 2 },
      { pattern: /\bbetween\b.+\band\b/i, weight: 1 },
      { pattern: /\b(through|via|indirectly|chain)\b/i, weight: 1 }
    ],
    resolveDepth: (configuredDepth) => Math.max(configuredDepth, 2)
  },
  {
    intent: "explanatory_query",
    cues: [
      { pattern: /^\s*(why|how)\b/i, weight: 2 },
      { pattern: /\b(explain|explains|explained|describe|definition|define|meaning|overview)\b/i, weight: 2 },
      { pattern: /\bwhat\s+does\b.+\bmean\b/i, weight: 2 }
    ],
    resolveDepth: (configuredDepth) => Math.min(configuredDepth, 1)
  },
  {
    intent: "factual_query",
    cues: [],
    resolveDepth: (configuredDepth) => configuredDepth
  }
];

export class IntentClassifier {
  private readonly byIntent: Map<IntentCategory, IntentStrategy>;

  constructor(private readonly strategies: readonly IntentStrategy[] = intentStrategies) {
    this.byIntent = new Map(strategies.map((strategy) => [strategy.intent, strategy]));
  }

  classify(query: string): IntentCategory {
    let best: { intent: IntentCategory; score: number } | null = null;

    for (const strategy of this.strategies) {
      const score = strategy.cues.reduce(
        (total, cue) => (cue.pattern.test(query) ? total + cue.weight : total),
        0
      );
      if (score > 0 && (!best || score > best.score)) {
        best = { intent: strategy.intent, score };
      }
    }

    return best?.intent ?? "factual_query";
  }

  strategyFor(intent: IntentCategory): IntentStrategy {
    const strategy = this.byIntent.get(intent);
    if (!strategy) {
      return { intent, cues: [], resolveDepth: (configuredDepth) => configuredDepth };
    }
    return strategy;
  }
}
