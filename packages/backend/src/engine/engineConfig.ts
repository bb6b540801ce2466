import { z } from "zod";
import type { EngineConfig, QueryOverrides } from "@finhop/shared";
import { appConfig, type AppConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

/** Fixed contract: a confidence score at or above this is tier High. */
export const HIGH_CONFIDENCE_THRESHOLD = 0.5;

const DEFAULT_BEAM_WIDTH = 64;

const unitInterval = z.number().min(0).max(1);

export const engineConfigSchema = z
  .object({
    topK: z.number().int().min(1),
    similarityThreshold: unitInterval,
    maxDepth: z.number().int().min(0),
    minEdgeConfidence: unitInterval,
    maxPaths: z.number().int().min(1),
    beamWidth: z.number().int().min(1),
    maxAnchors: z.number().int().min(1),
    anchorMinOverlap: unitInterval.refine((value) => value > 0, "must be greater than 0"),
    anchorScoreWeight: unitInterval,
    contextBudgetChars: z.number().int().min(1),
    dedupEmbeddingThreshold: unitInterval,
    dedupLexicalThreshold: unitInterval,
    pathAggregation: z.enum(["product", "min"]),
    historyTurns: z.number().int().min(0),
    confidence: z.object({
      weights: z.object({
        grounding: unitInterval,
        length: unitInterval.refine(
          (value) => value < HIGH_CONFIDENCE_THRESHOLD,
          `must stay below ${HIGH_CONFIDENCE_THRESHOLD} so ungrounded answers cannot reach High`
        ),
        evidence: unitInterval
      }),
      expectedWords: z.object({
        min: z.number().int().min(1),
        max: z.number().int().min(1)
      })
    })
  })
  .superRefine((config, ctx) => {
    if (config.beamWidth < config.maxPaths) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["beamWidth"],
        message: "beamWidth must be at least maxPaths"
      });
    }
    const { grounding, length, evidence } = config.confidence.weights;
    if (Math.abs(grounding + length + evidence - 1) > 1e-6) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["confidence", "weights"],
        message: "confidence weights must sum to 1"
      });
    }
    if (config.confidence.expectedWords.min > config.confidence.expectedWords.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["confidence", "expectedWords"],
        message: "min must not exceed max"
      });
    }
  });

export const queryOverridesSchema = z
  .object({
    contextBudgetChars: z.number().optional(),
    maxDepth: z.number().optional(),
    similarityThreshold: z.number().optional(),
    minEdgeConfidence: z.number().optional(),
    topK: z.number().optional()
  })
  .strict();

export function parseEngineConfig(input: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw ConfigurationError.fromZodIssues("Invalid engine configuration", parsed.error.issues);
  }
  return parsed.data;
}

export function engineConfigFromEnv(env: AppConfig = appConfig): EngineConfig {
  const maxPaths = env.MAX_PATHS;
  return parseEngineConfig({
    topK: env.RETRIEVAL_TOP_K,
    similarityThreshold: env.SIMILARITY_THRESHOLD,
    maxDepth: env.MAX_TRAVERSAL_DEPTH,
    minEdgeConfidence: env.MIN_EDGE_CONFIDENCE,
    maxPaths,
    beamWidth: typeof maxPaths === "number" ? Math.max(DEFAULT_BEAM_WIDTH, maxPaths) : DEFAULT_BEAM_WIDTH,
    maxAnchors: env.MAX_ANCHORS,
    anchorMinOverlap: 0.6,
    anchorScoreWeight: 0.75,
    contextBudgetChars: env.CONTEXT_BUDGET_CHARS,
    dedupEmbeddingThreshold: 0.95,
    dedupLexicalThreshold: 0.8,
    pathAggregation: "product",
    historyTurns: env.HISTORY_TURNS,
    confidence: {
      weights: { grounding: 0.5, length: 0.2, evidence: 0.3 },
      expectedWords: { min: 30, max: 350 }
    }
  });
}

/** Merges per-request overrides over the defaults and revalidates the result. */
export function resolveEngineConfig(base: EngineConfig, overrides: QueryOverrides = {}): EngineConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  if (Object.keys(defined).length === 0) {
    return base;
  }
  return parseEngineConfig({ ...base, ...defined });
}
