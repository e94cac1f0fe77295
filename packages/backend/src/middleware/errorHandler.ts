import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import type { ApiErrorResponse } from "@lorebase/shared";
import { isRagError, userMessage, type RagError } from "../errors.js";
import { DocumentDirectoryNotFoundError } from "../pipeline/DocumentLoader.js";
import { logger } from "../utils/logger.js";
import { validationErrorResponse } from "./validator.js";

export class IndexRunInProgressError extends Error {
  constructor() {
    super("An indexing run is already in progress");
    this.name = "IndexRunInProgressError";
  }
}

const statusByCode: Record<RagError["code"], number> = {
  INGESTION_FAILED: 422,
  EMBEDDING_SERVICE_FAILED: 502,
  INDEX_MODEL_MISMATCH: 409,
  GENERATION_SERVICE_FAILED: 502,
  EMPTY_KNOWLEDGE_BASE: 409,
  SESSION_NOT_FOUND: 404
};

export function toErrorResponse(error: unknown): { status: number; body: ApiErrorResponse } {
  if (error instanceof ZodError) {
    return { status: 400, body: validationErrorResponse(error) };
  }

  if (isRagError(error)) {
    return {
      status: statusByCode[error.code],
      body: { error: userMessage(error), code: error.code, stage: error.stage }
    };
  }

  if (error instanceof DocumentDirectoryNotFoundError) {
    return {
      status: 400,
      body: { error: error.message, code: "DOCUMENTS_DIR_NOT_FOUND", stage: "ingestion" }
    };
  }

  if (error instanceof IndexRunInProgressError) {
    return { status: 409, body: { error: error.message, code: "INDEX_RUN_IN_PROGRESS" } };
  }

  if (error instanceof SyntaxError && "body" in error) {
    return { status: 400, body: { error: "Malformed JSON body", code: "VALIDATION_FAILED", stage: "request" } };
  }

  return { status: 500, body: { error: "Internal server error" } };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const { status, body } = toErrorResponse(err);
  if (status >= 500) {
    logger.error({ err, url: req.originalUrl }, "Request failed");
  } else {
    logger.warn({ url: req.originalUrl, code: body.code, error: body.error }, "Request rejected");
  }
  res.status(status).json(body);
};
