import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus, VectorIndex } from "@lorebase/shared";
import { checkEmbeddingConnection, checkGenerationConnection } from "../runtime/connectivity.js";
import {
  getEmbeddingGatewaySingleton,
  getGeneratorSingleton,
  getVectorIndexSingleton
} from "../runtime/ragRuntime.js";

export interface CreateHealthRouterOptions {
  index?: VectorIndex;
  checkEmbedding?: () => Promise<ServiceConnectionStatus>;
  checkGeneration?: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const index = options.index ?? getVectorIndexSingleton();
  const checkEmbedding =
    options.checkEmbedding ?? (() => checkEmbeddingConnection(getEmbeddingGatewaySingleton()));
  const checkGeneration =
    options.checkGeneration ?? (() => checkGenerationConnection(getGeneratorSingleton()));
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res, next) => {
    try {
      const [embedding, generation, stats] = await Promise.all([
        checkEmbedding(),
        checkGeneration(),
        index.stats()
      ]);
      const status: HealthResponse["status"] =
        embedding === "failed" || generation === "failed" ? "degraded" : "ok";

      const mem = process.memoryUsage();
      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
        checks: {
          embedding,
          generation
        },
        index: {
          documentCount: stats.documentCount,
          chunkCount: stats.chunkCount
        },
        memoryUsage: {
          rss: mem.rss,
          heapUsed: mem.heapUsed,
          heapTotal: mem.heapTotal
        }
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return healthRouter;
}
