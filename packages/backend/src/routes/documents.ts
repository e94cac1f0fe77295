import { Router } from "express";
import { z } from "zod";
import type {
  IndexRunReport,
  IndexStatsResponse,
  ListDocumentsResponse,
  ProbeResult,
  VectorIndex
} from "@lorebase/shared";
import { appConfig } from "../config.js";
import { IndexRunInProgressError } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import type { IndexingPipeline } from "../pipeline/IndexingPipeline.js";
import {
  getIndexingPipelineSingleton,
  getRetrieverSingleton,
  getVectorIndexSingleton
} from "../runtime/ragRuntime.js";
import { trimSnippet } from "../services/ContextAssembler.js";
import type { Retriever } from "../services/Retriever.js";
import { logger } from "../utils/logger.js";

const documentParamsSchema = z.object({
  id: z.string().min(1)
});

const indexRunBodySchema = z.object({
  force: z.boolean().default(false),
  probe: z.string().trim().min(1).max(1000).optional()
});

const searchBodySchema = z.object({
  query: z.string().trim().min(1).max(4000),
  k: z.coerce.number().int().min(1).max(50).optional()
});

type IndexRunBody = z.infer<typeof indexRunBodySchema>;
type SearchBody = z.infer<typeof searchBodySchema>;

export interface CreateDocumentsRouterOptions {
  index?: VectorIndex;
  pipeline?: IndexingPipeline;
  retriever?: Retriever;
  documentsDir?: string;
  collection?: string;
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions = {}): Router {
  const index = options.index ?? getVectorIndexSingleton();
  const pipeline = options.pipeline ?? getIndexingPipelineSingleton();
  const retriever = options.retriever ?? getRetrieverSingleton();
  const documentsDir = options.documentsDir ?? appConfig.DOCUMENTS_DIR;
  const collection = options.collection ?? appConfig.COLLECTION_NAME;

  let activeRun: Promise<IndexRunReport> | null = null;

  const documentsRouter = Router();

  documentsRouter.get("/", async (_req, res, next) => {
    try {
      const response: ListDocumentsResponse = {
        documents: await index.listDocuments()
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  documentsRouter.get("/stats", async (_req, res, next) => {
    try {
      const [stats, model] = await Promise.all([index.stats(), index.getModelInfo()]);
      const response: IndexStatsResponse = {
        collection,
        documentCount: stats.documentCount,
        chunkCount: stats.chunkCount,
        embeddingModel: model?.model ?? null,
        dimensions: model?.dimensions ?? null
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  documentsRouter.post("/index", validate({ body: indexRunBodySchema }), async (req, res, next) => {
    const body: IndexRunBody = req.body;
    if (activeRun) {
      next(new IndexRunInProgressError());
      return;
    }

    const run = pipeline.run({
      directory: documentsDir,
      force: body.force,
      ...(body.probe ? { probe: body.probe } : {})
    });
    activeRun = run;

    try {
      const report = await run;
      res.json(report);
    } catch (error) {
      logger.error({ err: error, directory: documentsDir }, "Indexing run failed");
      next(error);
    } finally {
      activeRun = null;
    }
  });

  documentsRouter.post("/search", validate({ body: searchBodySchema }), async (req, res, next) => {
    const body: SearchBody = req.body;
    try {
      const results = await retriever.search(body.query, body.k ?? retriever.defaultTopK);
      const response: ProbeResult = {
        query: body.query,
        hits: results.map((item) => ({
          chunkId: item.chunk.id,
          documentName: item.document.name,
          score: item.score,
          excerpt: trimSnippet(item.chunk.text, 240)
        }))
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  documentsRouter.get("/:id", validate({ params: documentParamsSchema }), async (req, res, next) => {
    try {
      const documentId = req.params.id ?? "";
      const document = await index.getDocument(documentId);
      if (!document) {
        res.status(404).json({ error: "Document not found" });
        return;
      }

      const chunks = await index.getChunksByDocument(documentId);
      res.json({ document, chunks: chunks.map((item) => item.chunk) });
    } catch (error) {
      next(error);
    }
  });

  documentsRouter.delete("/:id", validate({ params: documentParamsSchema }), async (req, res, next) => {
    try {
      const deleted = await pipeline.removeDocument(req.params.id ?? "");
      if (!deleted) {
        res.status(404).json({ error: "Document not found" });
        return;
      }

      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return documentsRouter;
}
