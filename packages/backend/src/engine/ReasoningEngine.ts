import type {
  AnswerResult,
  EngineConfig,
  HistoryTurn,
  QueryOverrides,
  ReasoningStep
} from "@finhop/shared";
import type { CorpusProvider, CorpusView } from "../corpus/CorpusRegistry.js";
import { EmptyEvidenceError, GenerationError } from "../errors.js";
import type { QueryEmbedder, TextGenerator } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { AnswerSynthesizer } from "./AnswerSynthesizer.js";
import { ConfidenceEvaluator, answerMetrics } from "./ConfidenceEvaluator.js";
import { ContextAssembler } from "./ContextAssembler.js";
import { resolveEngineConfig } from "./engineConfig.js";
import { evidenceScore } from "./evidence.js";
import { HybridRetriever } from "./HybridRetriever.js";
import { IntentClassifier } from "./IntentClassifier.js";
import { MultiHopTraverser } from "./MultiHopTraverser.js";

export interface AnswerRequest {
  query: string;
  history?: HistoryTurn[];
  overrides?: QueryOverrides;
  signal?: AbortSignal;
}

export interface ReasoningEngineDeps {
  corpus: CorpusProvider;
  generator: TextGenerator;
  embedder: QueryEmbedder;
  config: EngineConfig;
  classifier?: IntentClassifier;
}

/** Only evidence a step actually cites counts as support. */
function citedEvidence(steps: ReasoningStep[]): string[] {
  const cited = new Set<string>();
  for (const step of steps) {
    for (const id of step.evidenceIds) {
      cited.add(id);
    }
  }
  return Array.from(cited);
}

/**
 * Runs one query end to end against a single corpus snapshot: classify,
 * retrieve and traverse, assemble, synthesize, score.
 */
export class ReasoningEngine {
  private readonly classifier: IntentClassifier;
  private readonly synthesizer: AnswerSynthesizer;

  constructor(private readonly deps: ReasoningEngineDeps) {
    this.classifier = deps.classifier ?? new IntentClassifier();
    this.synthesizer = new AnswerSynthesizer(deps.generator);
  }

  get config(): EngineConfig {
    return this.deps.config;
  }

  async answer(request: AnswerRequest): Promise<AnswerResult> {
    const startedAt = Date.now();
    const config = resolveEngineConfig(this.deps.config, request.overrides);
    const view = this.deps.corpus.acquire();

    const intent = this.classifier.classify(request.query);
    const depth = this.classifier.strategyFor(intent).resolveDepth(config.maxDepth);

    const anchors = view.graph.findAnchors(request.query, {
      minOverlap: config.anchorMinOverlap,
      limit: config.maxAnchors
    });
    logger.debug({ intent, depth, anchors: anchors.map((anchor) => anchor.node.id) }, "Query classified");
    const queryEmbedding = await this.embedQuery(request.query, view, request.signal);

    const retrieved = new HybridRetriever(view.chunks, config).retrieve(queryEmbedding, anchors, config.topK);
    const paths = new MultiHopTraverser(view.graph, config).traverse(
      anchors.map((anchor) => anchor.node.id),
      depth
    );

    logger.debug(
      { chunkHits: retrieved.filter((item) => item.kind === "chunk").length, paths: paths.length },
      "Evidence gathered"
    );

    let degraded: AnswerResult["degraded"];
    if (retrieved.length === 0 && paths.length === 0) {
      const emptyEvidence = new EmptyEvidenceError(request.query);
      logger.warn({ corpusVersion: view.version, intent }, emptyEvidence.message);
      degraded = { kind: emptyEvidence.kind, message: emptyEvidence.message };
    }

    const context = new ContextAssembler(config, (chunkId) => view.chunks.embeddingOf(chunkId)).assemble(
      retrieved,
      paths,
      config.contextBudgetChars
    );

    logger.debug({ entries: context.entries.length, usedChars: context.usedChars }, "Context assembled");

    const history = config.historyTurns > 0 ? (request.history ?? []).slice(-config.historyTurns) : [];
    const synthesis = await this.synthesizer.synthesize(
      request.query,
      context,
      request.signal ? { history, signal: request.signal } : { history }
    );

    const evaluation = new ConfidenceEvaluator(config.confidence).evaluate(synthesis.text, context);

    const result: AnswerResult = {
      text: synthesis.text,
      chainOfThought: synthesis.chainOfThought,
      supportingEvidence: citedEvidence(synthesis.chainOfThought),
      confidenceScore: evaluation.score,
      confidenceTier: evaluation.tier,
      confidence: evaluation.breakdown,
      intent,
      corpusVersion: view.version,
      evidence: context.entries.map((entry) => ({
        id: entry.evidence.id,
        kind: entry.evidence.kind,
        score: evidenceScore(entry.evidence),
        text: entry.text,
        truncated: entry.truncated
      })),
      metrics: answerMetrics(synthesis.text)
    };
    if (degraded) {
      result.degraded = degraded;
    }

    logger.info(
      {
        intent,
        depth,
        corpusVersion: view.version,
        anchors: anchors.length,
        retrieved: retrieved.length,
        paths: paths.length,
        contextEntries: context.entries.length,
        droppedDuplicates: context.droppedDuplicateIds.length,
        droppedOverBudget: context.droppedOverBudgetIds.length,
        structuredSteps: synthesis.structured,
        confidence: evaluation.score,
        durationMs: Date.now() - startedAt
      },
      "Query answered"
    );

    return result;
  }

  /**
   * Query embedding failures degrade to anchor-only retrieval; only a caller
   * abort stops the query here.
   */
  private async embedQuery(
    query: string,
    view: CorpusView,
    signal: AbortSignal | undefined
  ): Promise<number[] | null> {
    if (view.chunks.size === 0) {
      return null;
    }

    try {
      const embedding = await this.deps.embedder.embed(query, signal ? { signal } : {});
      if (embedding.length !== view.chunks.dimensions) {
        logger.warn(
          { expected: view.chunks.dimensions, actual: embedding.length },
          "Query embedding dimension mismatch, skipping chunk retrieval"
        );
        return null;
      }
      return embedding;
    } catch (error) {
      if (signal?.aborted) {
        throw new GenerationError("aborted", "Query was aborted while embedding", { cause: error });
      }
      logger.warn({ err: error }, "Query embedding failed, falling back to graph anchors");
      return null;
    }
  }
}
