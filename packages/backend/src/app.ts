import cors from "cors";
import express, { type Express } from "express";
import { appConfig } from "./config.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter, type ApiRateLimitOptions } from "./middleware/rateLimiter.js";
import { createChatRouter, type CreateChatRouterOptions } from "./routes/chat.js";
import { createDocumentsRouter, type CreateDocumentsRouterOptions } from "./routes/documents.js";
import { createHealthRouter, type CreateHealthRouterOptions } from "./routes/health.js";

export interface CreateAppOptions {
  chat?: CreateChatRouterOptions;
  documents?: CreateDocumentsRouterOptions;
  health?: CreateHealthRouterOptions;
  corsOrigin?: string;
  /** `false` turns the limiter off. */
  rateLimit?: ApiRateLimitOptions | false;
}

export function createApp(options: CreateAppOptions = {}): Express {
  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: options.corsOrigin ?? appConfig.CORS_ORIGIN
    })
  );
  app.use(express.json({ limit: "1mb" }));
  if (options.rateLimit !== false) {
    app.use(createApiRateLimiter(options.rateLimit));
  }

  app.use("/api/documents", createDocumentsRouter(options.documents));
  app.use("/api/chat", createChatRouter(options.chat));
  app.use("/api/health", createHealthRouter(options.health));

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use(errorHandler);

  return app;
}
