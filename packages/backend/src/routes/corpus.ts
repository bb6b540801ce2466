import { Router } from "express";
import { z } from "zod";
import type { CorpusPathNode, CorpusPathsResponse, CorpusReloadResponse, CorpusStatusResponse, GraphNode } from "@finhop/shared";
import type { CorpusRegistry, CorpusView } from "../corpus/CorpusRegistry.js";
import { validate } from "../middleware/validator.js";
import { getCorpusRegistrySingleton } from "../runtime/engineRuntime.js";

const pathsQuerySchema = z.object({
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  maxHops: z.coerce.number().int().min(1).max(6).default(3),
  limit: z.coerce.number().int().min(1).max(50).default(10)
});

interface CreateCorpusRouterOptions {
  registry?: CorpusRegistry;
}

function toPathNode(node: GraphNode): CorpusPathNode {
  return { id: node.id, label: node.label, entityType: node.entityType };
}

/** Accepts a node id, or a name that fully matches one label or alias. */
function resolveNode(view: CorpusView, ref: string): GraphNode | null {
  const byId = view.graph.getNode(ref);
  if (byId) {
    return byId;
  }
  const [anchor] = view.graph.findAnchors(ref, { minOverlap: 1, limit: 1 });
  return anchor?.node ?? null;
}

export function createCorpusRouter(options: CreateCorpusRouterOptions = {}): Router {
  const registry = options.registry ?? getCorpusRegistrySingleton();

  const corpusRouter = Router();

  corpusRouter.get("/", (_req, res) => {
    const stats = registry.status();
    if (!stats) {
      return res.status(503).json({ error: "Corpus snapshot is not loaded", kind: "corpus_unavailable" });
    }
    const response: CorpusStatusResponse = { corpus: stats };
    return res.json(response);
  });

  corpusRouter.post("/reload", async (_req, res, next) => {
    const previousVersion = registry.status()?.version ?? null;
    try {
      const view = await registry.reload();
      const response: CorpusReloadResponse = { corpus: view.stats, previousVersion };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  corpusRouter.get("/paths", validate({ query: pathsQuerySchema }), (req, res, next) => {
    const { from, to, maxHops, limit } = req.query as unknown as z.infer<typeof pathsQuerySchema>;

    let view: CorpusView;
    try {
      view = registry.acquire();
    } catch (error) {
      return next(error);
    }

    const source = resolveNode(view, from);
    const target = resolveNode(view, to);
    if (!source || !target) {
      return res.status(404).json({ error: `Unknown entity: ${source ? to : from}` });
    }

    const paths = view.graph.simplePaths(source.id, target.id, { maxHops, limit }).map((ids) =>
      ids.flatMap((id) => {
        const node = view.graph.getNode(id);
        return node ? [toPathNode(node)] : [];
      })
    );

    const response: CorpusPathsResponse = {
      from: toPathNode(source),
      to: toPathNode(target),
      paths
    };
    return res.json(response);
  });

  return corpusRouter;
}
